import { format } from "date-fns";

import { unknownLocationLabel } from "@/constants";
import type { FolderAssignment, Trip } from "@/types";

import type { FolderNamer, UsedBaseNames } from "./FolderNamer";

export function sanitizeLocation(location: string) {
  return location.replace(/[^\p{L}\p{N}_-]/gu, "_");
}

/**
 * 第一個使用 base name 的旅程取得原名，
 * 之後依序為 base_0、base_1…，跳過同年已發出的名稱。
 */
export class FolderNamerDefault implements FolderNamer {
  assign(
    trips: Trip[],
    year: number,
    usedBaseNames: UsedBaseNames
  ): FolderAssignment[] {
    return trips.map((trip) => {
      const first = trip[0];
      const month = format(first.capturedAt, "MM");
      const location = sanitizeLocation(
        first.resolvedPlaceName ?? unknownLocationLabel
      );
      const baseName = `${year}_${month}_${location}`;

      const { counters, assigned } = usedBaseNames;
      let next = counters.get(baseName);
      let folderName: string;
      if (next === undefined && !assigned.has(baseName)) {
        folderName = baseName;
        next = 0;
      } else {
        // 後綴名稱可能已被其他地點的原名占用
        next ??= 0;
        while (assigned.has(`${baseName}_${next}`)) next++;
        folderName = `${baseName}_${next}`;
        next++;
      }
      counters.set(baseName, next);
      assigned.add(folderName);
      return { trip, folderName };
    });
  }
}
