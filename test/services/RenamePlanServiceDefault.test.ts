import { describe, expect, test } from "vitest";

import { buildTestLogger } from "~shared/testkit/TestLogger";

import type { RenameCandidate } from "@/services/RenamePlanService";
import { RenamePlanServiceDefault } from "@/services/RenamePlanServiceDefault";

import { ExifServiceFake } from "~test/fakes/ExifServiceFake";

function buildService(mtimes: Record<string, Date> = {}) {
  const exifService = new ExifServiceFake();
  const service = new RenamePlanServiceDefault({
    exifService,
    logger: buildTestLogger(),
    mtimeOf: async (filePath) => {
      const mtime = mtimes[filePath];
      if (!mtime) throw new Error(`ENOENT: ${filePath}`);
      return mtime;
    },
  });
  return { service, exifService };
}

function candidate(fileName: string, stamp: string): RenameCandidate {
  return { filePath: `/photos/${fileName}`, stamp, source: "EXIF" };
}

describe("RenamePlanServiceDefault.resolveStamps", () => {
  test("EXIF 優先，否則用修改時間，都沒有則略過", async () => {
    const { service, exifService } = buildService({
      "/photos/b.png": new Date(2022, 11, 24, 18, 30, 0),
    });
    exifService.setExif("/photos/a.jpg", {
      captureStamp: "20230501_101500",
    });

    const candidates = await service.resolveStamps([
      "/photos/a.jpg",
      "/photos/b.png",
      "/photos/c.gif",
    ]);

    expect(candidates).toEqual([
      { filePath: "/photos/a.jpg", stamp: "20230501_101500", source: "EXIF" },
      { filePath: "/photos/b.png", stamp: "20221224_183000", source: "MTIME" },
    ]);
  });
});

describe("RenamePlanServiceDefault.plan", () => {
  test("取最小且未被占用的序號", () => {
    const { service } = buildService();
    const plan = service.plan(
      [
        candidate("DSC_0001.JPG", "20230501_101500"),
        candidate("DSC_0002.JPG", "20230501_101500"),
        candidate("DSC_0003.jpg", "20230502_080000"),
      ],
      ["DSC_0001.JPG", "DSC_0002.JPG", "DSC_0003.jpg", "img_20230501_101500_0.JPG"]
    );

    expect(plan.renames).toEqual([
      { from: "/photos/DSC_0001.JPG", to: "/photos/img_20230501_101500_1.JPG" },
      { from: "/photos/DSC_0002.JPG", to: "/photos/img_20230501_101500_2.JPG" },
      { from: "/photos/DSC_0003.jpg", to: "/photos/img_20230502_080000_0.jpg" },
    ]);
    expect(plan.unchanged).toEqual([]);
  });

  test("已是目標名稱的檔案不改名", () => {
    const { service } = buildService();
    const plan = service.plan(
      [candidate("img_20230501_101500_0.jpg", "20230501_101500")],
      ["img_20230501_101500_0.jpg"]
    );
    expect(plan.renames).toEqual([]);
    expect(plan.unchanged).toEqual(["/photos/img_20230501_101500_0.jpg"]);
  });

  test("釋出的舊檔名可被後面的檔案使用", () => {
    const { service } = buildService();
    const plan = service.plan(
      [
        candidate("img_20230501_101500_0.jpg", "20230601_090000"),
        candidate("x.jpg", "20230501_101500"),
      ],
      ["img_20230501_101500_0.jpg", "x.jpg"]
    );
    expect(plan.renames).toEqual([
      { from: "/photos/img_20230501_101500_0.jpg", to: "/photos/img_20230601_090000_0.jpg" },
      { from: "/photos/x.jpg", to: "/photos/img_20230501_101500_0.jpg" },
    ]);
  });
});
