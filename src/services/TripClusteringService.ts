import type { MediaRecord, Trip } from "@/types";

export interface TripClusteringService {
  /**
   * 將同一年份、已依拍攝時間排序的相片切成多段旅程。
   * 只比較相鄰兩筆，因此旅程可以逐步「漂移」日期與地點。
   */
  cluster(records: MediaRecord[]): Trip[];
}
