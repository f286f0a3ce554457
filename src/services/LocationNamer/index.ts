export * from "./LocationNamer";
export * from "./LocationNamerNominatim";
