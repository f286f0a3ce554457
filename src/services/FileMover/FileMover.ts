import type { ArrangePlan, MoveFile } from "@/types";

export type ApplyOptions = {
  /** true 時只輸出報告，不動檔案系統 */
  dryRun: boolean;
};

export type MoveFailure = {
  path: string;
  operation: "mkdir" | "move" | "remove";
  message: string;
};

export type ApplyResult = {
  dryRun: boolean;
  createdFolders: number;
  moved: number;
  removed: number;
  bytesFreed: number;
  failures: MoveFailure[];
};

export interface FileMover {
  /**
   * 先刪除重複檔，再建立資料夾並搬移檔案。
   * 單一檔案失敗只記錄，不中止整批；已搬移的檔案不會回滾。
   */
  apply(plan: ArrangePlan, options: ApplyOptions): Promise<ApplyResult>;

  /** 逐一搬移（或改名），目標已存在時不覆蓋 */
  moveFiles(moves: MoveFile[], options: ApplyOptions): Promise<ApplyResult>;
}

export function emptyApplyResult(dryRun: boolean): ApplyResult {
  return {
    dryRun,
    createdFolders: 0,
    moved: 0,
    removed: 0,
    bytesFreed: 0,
    failures: [],
  };
}
