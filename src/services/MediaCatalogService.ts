import type { MediaRecord } from "@/types";

export interface MediaCatalogService {
  /**
   * 從檔案路徑建立 MediaRecord。
   * 不符合 img_YYYYMMDD_HHmmss_N 命名的檔案直接忽略；
   * 日期無效的檔案列入 skipped。
   */
  load(filePaths: string[]): Promise<MediaCatalog>;
}

export interface MediaCatalog {
  records: MediaRecord[];
  ignored: string[];
  skipped: SkippedFile[];
}

export interface SkippedFile {
  filePath: string;
  type: "INVALID_DATE";
  message: string;
}
