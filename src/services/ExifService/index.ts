export * from "./Exif";
export * from "./ExifService";
export * from "./ExifServiceExifTool";
