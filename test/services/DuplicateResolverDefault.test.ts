import { describe, expect, test } from "vitest";

import { DuplicateResolverDefault } from "@/services/DuplicateResolverDefault";

import { record } from "~test/builders/MediaRecordBuilder";

describe("DuplicateResolverDefault", () => {
  const resolver = new DuplicateResolverDefault();

  test("同前綴同大小只保留第一筆，大小不同的不算重複", () => {
    const records = [
      record("img_20240601_120000_0.jpg", { sizeBytes: 2048 }),
      record("img_20240601_120000_1.jpg", { sizeBytes: 2048 }),
      record("img_20240601_120000_2.jpg", { sizeBytes: 4096 }),
    ];

    const result = resolver.resolve(records);

    expect(result.groups).toEqual([
      {
        namingPrefix: "img_20240601_120000",
        sizeBytes: 2048,
        identifiers: ["/photos/img_20240601_120000_0.jpg", "/photos/img_20240601_120000_1.jpg"],
        retained: "/photos/img_20240601_120000_0.jpg",
        toRemove: ["/photos/img_20240601_120000_1.jpg"],
      },
    ]);
    expect([...result.toRemove]).toEqual(["/photos/img_20240601_120000_1.jpg"]);
    expect(result.warnings).toEqual([]);
  });

  test("保留者依輸入順序決定", () => {
    const a = record("img_20240601_120000_0.jpg", { sizeBytes: 10 });
    const b = record("img_20240601_120000_1.jpg", { sizeBytes: 10 });
    const result = resolver.resolve([b, a]);
    expect(result.groups[0].retained).toBe(b.identifier);
    expect([...result.toRemove]).toEqual([a.identifier]);
  });

  test("不同前綴即使大小相同也不算重複", () => {
    const result = resolver.resolve([
      record("img_20240601_120000_0.jpg", { sizeBytes: 10 }),
      record("img_20240601_120001_0.jpg", { sizeBytes: 10 }),
    ]);
    expect(result.groups).toEqual([]);
    expect(result.toRemove.size).toBe(0);
  });

  test("沒有大小的檔案不參與分組並產生警告", () => {
    const unknown = record("img_20240601_120000_1.jpg");
    const result = resolver.resolve([
      record("img_20240601_120000_0.jpg", { sizeBytes: 10 }),
      unknown,
    ]);
    expect(result.toRemove.size).toBe(0);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]).toMatchObject({
      identifier: unknown.identifier,
      type: "UNKNOWN_SIZE",
    });
  });

  test("對保留下來的集合再跑一次不會再移除任何檔案", () => {
    const records = [
      record("img_20240601_120000_0.jpg", { sizeBytes: 1 }),
      record("img_20240601_120000_1.jpg", { sizeBytes: 1 }),
      record("img_20240601_120000_2.jpg", { sizeBytes: 1 }),
      record("img_20240602_080000_0.jpg", { sizeBytes: 5 }),
      record("img_20240602_080000_1.jpg", { sizeBytes: 6 }),
    ];
    const first = resolver.resolve(records);
    expect(first.toRemove.size).toBe(2);

    const retained = records.filter((r) => !first.toRemove.has(r.identifier));
    const second = resolver.resolve(retained);
    expect(second.toRemove.size).toBe(0);
    expect(second.groups).toEqual([]);
  });
});
