export * from "./FileMover";
export * from "./FileMoverDefault";
