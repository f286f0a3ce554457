import type { MoveFile } from "@/types";

export type StampSource = "EXIF" | "MTIME";

export type RenameCandidate = {
  filePath: string;
  /** yyyyMMdd_HHmmss */
  stamp: string;
  source: StampSource;
};

export interface RenamePlan {
  renames: MoveFile[];
  /** 檔名已是目標名稱 */
  unchanged: string[];
}

export interface RenamePlanService {
  /** 取得每個檔案的拍攝時間戳，EXIF 優先，否則用修改時間 */
  resolveStamps(filePaths: string[]): Promise<RenameCandidate[]>;

  /**
   * 規劃 img_YYYYMMDD_HHmmss_N.ext 檔名，N 取最小且未被占用的非負整數。
   * existingNames 為資料夾內目前所有檔名。
   */
  plan(candidates: RenameCandidate[], existingNames: Iterable<string>): RenamePlan;
}
