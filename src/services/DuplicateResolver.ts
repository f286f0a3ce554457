import type { MediaRecord } from "@/types";

export interface DuplicateResolver {
  /**
   * 依 (namingPrefix, sizeBytes) 分組，每組保留輸入順序中的第一筆，
   * 其餘標記為待移除。本身不做任何 I/O。
   */
  resolve(records: MediaRecord[]): DuplicateResolution;
}

export interface DuplicateResolution {
  /** 只列出多於一筆的群組 */
  groups: DuplicateGroup[];
  toRemove: Set<string>;
  warnings: DuplicateWarning[];
}

export interface DuplicateGroup {
  namingPrefix: string;
  sizeBytes: number;
  /** 依輸入順序，第一筆為保留者 */
  identifiers: string[];
  retained: string;
  toRemove: string[];
}

export interface DuplicateWarning {
  identifier: string;
  type: "UNKNOWN_SIZE";
  message: string;
}
