import type { ArrangePlan, MediaRecord } from "@/types";

import type { DuplicateGroup } from "./DuplicateResolver";

export interface TripArrangeService {
  /**
   * 去除重複 → 讀 GPS → 依年份分旅程 → 反查地名 → 命名資料夾，
   * 產生交給 FileMover 的計畫。不修改檔案系統。
   */
  arrange(records: MediaRecord[]): Promise<TripArrangeResult>;
}

export interface TripArrangeResult {
  plan: ArrangePlan;
  duplicates: DuplicateGroup[];
  trips: TripSummary[];
}

export interface TripSummary {
  year: number;
  folderName: string;
  placeName: string;
  start: Date;
  end: Date;
  count: number;
}
