import { describe, expect, test } from "vitest";

import { buildTestLogger } from "~shared/testkit/TestLogger";

import { DuplicateResolverDefault } from "@/services/DuplicateResolverDefault";
import { FolderNamerDefault } from "@/services/FolderNamerDefault";
import { TripArrangeServiceDefault } from "@/services/TripArrangeServiceDefault";
import { TripClusteringServiceDefault } from "@/services/TripClusteringServiceDefault";
import type { MediaRecord } from "@/types";

import { record } from "~test/builders/MediaRecordBuilder";
import { ExifServiceFake } from "~test/fakes/ExifServiceFake";
import { LocationNamerFake } from "~test/fakes/LocationNamerFake";

function buildContext() {
  const exifService = new ExifServiceFake();
  const locationNamer = new LocationNamerFake()
    .set(48.8566, 2.3522, "Paris")
    .set(45.764, 4.8357, "Lyon");
  const service = new TripArrangeServiceDefault({
    exifService,
    duplicateResolver: new DuplicateResolverDefault(),
    clustering: new TripClusteringServiceDefault(),
    locationNamer,
    folderNamer: new FolderNamerDefault(),
    outputRoot: "/photos",
    logger: buildTestLogger(),
  });
  return { service, exifService, locationNamer };
}

function at(exifService: ExifServiceFake, r: MediaRecord, lat: number, lon: number) {
  exifService.setLocation(r.identifier, lat, lon);
  return r;
}

describe("TripArrangeServiceDefault", () => {
  test("去除重複後依旅程產生資料夾計畫", async () => {
    const { service, exifService, locationNamer } = buildContext();
    const records = [
      at(exifService, record("img_20240601_100000_0.jpg", { sizeBytes: 10 }), 48.8566, 2.3522),
      at(exifService, record("img_20240601_100000_1.jpg", { sizeBytes: 10 }), 48.8566, 2.3522),
      at(exifService, record("img_20240602_090000_0.jpg", { sizeBytes: 20 }), 48.86, 2.35),
      at(exifService, record("img_20240603_090000_0.jpg", { sizeBytes: 30 }), 45.764, 4.8357),
      at(exifService, record("img_20240620_090000_0.jpg", { sizeBytes: 40 }), 48.8566, 2.3522),
    ];

    const { plan, duplicates, trips } = await service.arrange(records);

    expect(plan.removals).toEqual([
      { path: "/photos/img_20240601_100000_1.jpg", sizeBytes: 10 },
    ]);
    expect(plan.bytesToFree).toBe(10);
    expect(duplicates).toHaveLength(1);
    expect(plan.folders.map((f) => [f.targetDir, f.moves.map((m) => m.to)])).toEqual([
      [
        "/photos/2024/2024_06_Paris",
        [
          "/photos/2024/2024_06_Paris/img_20240601_100000_0.jpg",
          "/photos/2024/2024_06_Paris/img_20240602_090000_0.jpg",
        ],
      ],
      ["/photos/2024/2024_06_Lyon", ["/photos/2024/2024_06_Lyon/img_20240603_090000_0.jpg"]],
      [
        "/photos/2024/2024_06_Paris_0",
        ["/photos/2024/2024_06_Paris_0/img_20240620_090000_0.jpg"],
      ],
    ]);
    expect(trips.map((t) => [t.folderName, t.placeName, t.count])).toEqual([
      ["2024_06_Paris", "Paris", 2],
      ["2024_06_Lyon", "Lyon", 1],
      ["2024_06_Paris_0", "Paris", 1],
    ]);
    // 每趟旅程只反查一次
    expect(locationNamer.calls).toEqual([
      [48.8566, 2.3522],
      [45.764, 4.8357],
      [48.8566, 2.3522],
    ]);
    // 被移除的重複檔不讀 EXIF
    expect(exifService.reads).not.toContain("/photos/img_20240601_100000_1.jpg");
  });

  test("年份分開處理，名稱計數每年重置，輸入順序不影響結果", async () => {
    const { service, exifService } = buildContext();
    const a = at(exifService, record("img_20240105_100000_0.jpg"), 48.8566, 2.3522);
    const b = at(exifService, record("img_20230105_100000_0.jpg"), 48.8566, 2.3522);
    const c = at(exifService, record("img_20230120_100000_0.jpg"), 48.8566, 2.3522);

    const { plan } = await service.arrange([a, c, b]);

    expect(plan.folders.map((f) => [f.year, f.folderName])).toEqual([
      [2023, "2023_01_Paris"],
      [2023, "2023_01_Paris_0"],
      [2024, "2024_01_Paris"],
    ]);
  });

  test("讀不到 EXIF 的相片歸入 Unknown", async () => {
    const { service, exifService, locationNamer } = buildContext();
    const r1 = record("img_20240301_100000_0.jpg");
    const r2 = record("img_20240301_110000_0.jpg");
    exifService.setReadError(r2.identifier, { type: "READ_FAILED", message: "壞檔" });

    const { plan } = await service.arrange([r1, r2]);

    expect(plan.folders.map((f) => [f.folderName, f.moves.length])).toEqual([
      ["2024_03_Unknown", 2],
    ]);
    expect(locationNamer.calls).toEqual([]);
  });

  test("無法反查的座標使用帶座標的備援名稱", async () => {
    const { service, exifService } = buildContext();
    const r = at(exifService, record("img_20240401_100000_0.jpg"), 10.5, -20.25);

    const { plan } = await service.arrange([r]);

    expect(plan.folders[0].folderName).toBe("2024_04_Unknown_10_5_-20_25");
  });

  test("沒有大小的檔案不會被當成重複刪除", async () => {
    const { service } = buildContext();
    const { plan } = await service.arrange([
      record("img_20240501_100000_0.jpg", { sizeBytes: 10 }),
      record("img_20240501_100000_1.jpg"),
    ]);
    expect(plan.removals).toEqual([]);
    expect(plan.warnings).toHaveLength(1);
    expect(plan.folders[0].moves).toHaveLength(2);
  });
});
