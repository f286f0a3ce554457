import type { MediaRecord } from "@/types";

import type {
  DuplicateGroup,
  DuplicateResolution,
  DuplicateResolver,
  DuplicateWarning,
} from "./DuplicateResolver";

/**
 * 同一秒連拍、序號不同但位元組大小相同的檔案視為重複。
 * 保留者取決於輸入順序；呼叫端應先排序掃描結果，讓結果可重現。
 */
export class DuplicateResolverDefault implements DuplicateResolver {
  resolve(records: MediaRecord[]): DuplicateResolution {
    const byKey = new Map<string, { prefix: string; size: number; ids: string[] }>();
    const warnings: DuplicateWarning[] = [];

    for (const record of records) {
      if (record.sizeBytes === undefined) {
        warnings.push({
          identifier: record.identifier,
          type: "UNKNOWN_SIZE",
          message: `無法取得檔案大小，不列入重複判定: ${record.identifier}`,
        });
        continue;
      }
      const key = `${record.namingPrefix}::${record.sizeBytes}`;
      const entry = byKey.get(key);
      if (entry) {
        entry.ids.push(record.identifier);
      } else {
        byKey.set(key, {
          prefix: record.namingPrefix,
          size: record.sizeBytes,
          ids: [record.identifier],
        });
      }
    }

    const groups: DuplicateGroup[] = [];
    const toRemove = new Set<string>();
    for (const { prefix, size, ids } of byKey.values()) {
      if (ids.length < 2) continue;
      const [retained, ...rest] = ids;
      for (const id of rest) toRemove.add(id);
      groups.push({
        namingPrefix: prefix,
        sizeBytes: size,
        identifiers: ids,
        retained,
        toRemove: rest,
      });
    }

    return { groups, toRemove, warnings };
  }
}
