import type { FolderAssignment, Trip } from "@/types";

/**
 * 以「一次執行、一個年份」為範圍的命名紀錄。
 * - counters：每個 base name 下一個要嘗試的後綴編號
 * - assigned：已發出的完整資料夾名稱
 */
export type UsedBaseNames = {
  counters: Map<string, number>;
  assigned: Set<string>;
};

export interface FolderNamer {
  /**
   * 依旅程順序產生 YYYY_MM_LOCATION[_N] 資料夾名稱，同一年內不重複。
   * usedBaseNames 由呼叫端持有並傳入，本身不保留狀態。
   */
  assign(trips: Trip[], year: number, usedBaseNames: UsedBaseNames): FolderAssignment[];
}

export function createUsedBaseNames(): UsedBaseNames {
  return { counters: new Map(), assigned: new Set() };
}
