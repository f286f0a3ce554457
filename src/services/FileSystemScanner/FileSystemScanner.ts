import type { Result } from "~shared/utils/Result";

export type ScanError = {
  type: "SCAN_FAILED";
  message: string;
};

export type ScanOptions = {
  /** 預設只掃描單層 */
  recursive?: boolean;
  allowExts?: readonly string[];
};

export interface FileSystemScanner {
  /**
   * 列出目錄下的檔案完整路徑，依路徑 code unit 排序，
   * 讓不同平台的列舉順序得到相同結果。
   */
  scan(rootPath: string, options?: ScanOptions): Promise<Result<string[], ScanError>>;
}
