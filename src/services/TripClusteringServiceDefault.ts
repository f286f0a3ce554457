import { differenceInCalendarDays } from "date-fns";

import { sameLocationThresholdKm } from "@/constants";
import type { MediaRecord, Trip } from "@/types";
import { distanceKm } from "@/utils/geo";

import type { TripClusteringService } from "./TripClusteringService";

export class TripClusteringServiceDefault implements TripClusteringService {
  constructor(
    private readonly thresholdKm: number = sameLocationThresholdKm
  ) {}

  cluster(records: MediaRecord[]): Trip[] {
    if (records.length === 0) return [];

    const trips: Trip[] = [];
    let current: Trip = [records[0]];

    for (let i = 1; i < records.length; i++) {
      const prev = records[i - 1];
      const curr = records[i];
      if (this.isAdjacent(prev, curr)) {
        current.push(curr);
      } else {
        trips.push(current);
        current = [curr];
      }
    }
    trips.push(current);

    return trips;
  }

  /** 相差 0 或 1 個日曆天，且判定為同一地點 */
  isAdjacent(prev: MediaRecord, curr: MediaRecord) {
    const dateDiff = differenceInCalendarDays(curr.capturedAt, prev.capturedAt);
    return (dateDiff === 0 || dateDiff === 1) && this.isSameLocation(prev, curr);
  }

  /**
   * 兩筆都有座標：距離小於門檻。
   * 兩筆都沒座標：視為同一地點；只有呼叫端事先替兩筆都填好
   * resolvedPlaceName 時才改比地名。TripArrangeService 在分旅程之後才反查地名，
   * 因此它的流程一律走「都沒座標即相同」。
   */
  isSameLocation(prev: MediaRecord, curr: MediaRecord) {
    if (prev.location && curr.location) {
      return distanceKm(prev.location, curr.location) < this.thresholdKm;
    }
    if (!prev.location && !curr.location) {
      if (
        prev.resolvedPlaceName !== undefined &&
        curr.resolvedPlaceName !== undefined
      ) {
        return prev.resolvedPlaceName === curr.resolvedPlaceName;
      }
      return true;
    }
    return false;
  }
}
