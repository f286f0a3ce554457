export * from "./FileSystemScanner";
export * from "./FileSystemScannerDefault";
