import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { beforeEach, describe, expect, test } from "vitest";

import { buildTestLogger } from "~shared/testkit/TestLogger";

import { FileMoverDefault } from "@/services/FileMover";
import type { ArrangePlan } from "@/types";
import { exists } from "@/utils/helper";

import { snapshotTree } from "~test/helpers/FsSnapshot";

const tmpDir = "test/tmp/mover";

function buildPlan(): ArrangePlan {
  const target = join(tmpDir, "2024", "2024_06_Paris");
  return {
    folders: [
      {
        year: 2024,
        folderName: "2024_06_Paris",
        targetDir: target,
        moves: [
          {
            from: join(tmpDir, "img_20240601_120000_0.jpg"),
            to: join(target, "img_20240601_120000_0.jpg"),
          },
          {
            from: join(tmpDir, "img_20240602_120000_0.jpg"),
            to: join(target, "img_20240602_120000_0.jpg"),
          },
        ],
      },
    ],
    removals: [{ path: join(tmpDir, "img_20240601_120000_1.jpg"), sizeBytes: 4 }],
    bytesToFree: 4,
    warnings: [],
  };
}

describe("FileMoverDefault", () => {
  beforeEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
    await mkdir(tmpDir, { recursive: true });
    await writeFile(join(tmpDir, "img_20240601_120000_0.jpg"), "aaaa");
    await writeFile(join(tmpDir, "img_20240601_120000_1.jpg"), "aaaa");
    await writeFile(join(tmpDir, "img_20240602_120000_0.jpg"), "bb");
  });

  test("試跑不改動檔案系統，但回報預計結果", async () => {
    const before = await snapshotTree(tmpDir);
    const mover = new FileMoverDefault({ logger: buildTestLogger() });

    const result = await mover.apply(buildPlan(), { dryRun: true });

    expect(result).toEqual({
      dryRun: true,
      createdFolders: 1,
      moved: 2,
      removed: 1,
      bytesFreed: 4,
      failures: [],
    });
    expect(await snapshotTree(tmpDir)).toEqual(before);
  });

  test("實際執行：刪除重複、建立資料夾並搬移", async () => {
    const mover = new FileMoverDefault({ logger: buildTestLogger() });

    const result = await mover.apply(buildPlan(), { dryRun: false });

    expect(result).toEqual({
      dryRun: false,
      createdFolders: 1,
      moved: 2,
      removed: 1,
      bytesFreed: 4,
      failures: [],
    });
    expect(await snapshotTree(tmpDir)).toEqual({
      "2024/": "",
      "2024/2024_06_Paris/": "",
      "2024/2024_06_Paris/img_20240601_120000_0.jpg": Buffer.from("aaaa").toString("base64"),
      "2024/2024_06_Paris/img_20240602_120000_0.jpg": Buffer.from("bb").toString("base64"),
    });
  });

  test("單一檔案失敗時繼續處理其他檔案", async () => {
    await rm(join(tmpDir, "img_20240601_120000_0.jpg"));
    const mover = new FileMoverDefault({ logger: buildTestLogger() });

    const result = await mover.apply(buildPlan(), { dryRun: false });

    expect(result.moved).toBe(1);
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0]).toMatchObject({
      path: join(tmpDir, "img_20240601_120000_0.jpg"),
      operation: "move",
    });
    expect(
      await exists(join(tmpDir, "2024", "2024_06_Paris", "img_20240602_120000_0.jpg"))
    ).toBe(true);
  });

  test("目標已存在時不覆蓋", async () => {
    const target = join(tmpDir, "taken.jpg");
    await writeFile(target, "keep");
    const mover = new FileMoverDefault({ logger: buildTestLogger() });

    const result = await mover.moveFiles(
      [{ from: join(tmpDir, "img_20240602_120000_0.jpg"), to: target }],
      { dryRun: false }
    );

    expect(result.moved).toBe(0);
    expect(result.failures[0].message).toBe(`目標已存在: ${target}`);
    expect(await readFile(target, "utf8")).toBe("keep");
    expect(await exists(join(tmpDir, "img_20240602_120000_0.jpg"))).toBe(true);
  });

  test("刪除失敗會記錄並繼續", async () => {
    const plan = buildPlan();
    plan.removals = [{ path: join(tmpDir, "missing.jpg"), sizeBytes: 9 }];
    const mover = new FileMoverDefault({ logger: buildTestLogger() });

    const result = await mover.apply(plan, { dryRun: false });

    expect(result.removed).toBe(0);
    expect(result.bytesFreed).toBe(0);
    expect(result.failures.map((f) => f.operation)).toEqual(["remove"]);
    expect(result.moved).toBe(2);
  });
});
