import type { CAC } from "cac";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import { imageExtensions } from "@/constants";
import { type ExifService, ExifServiceExifTool } from "@/services/ExifService";
import { type ApplyResult, FileMoverDefault } from "@/services/FileMover";
import {
  type FileSystemScanner,
  FileSystemScannerDefault,
} from "@/services/FileSystemScanner";
import type { RenamePlan } from "@/services/RenamePlanService";
import { type MtimeReader, RenamePlanServiceDefault } from "@/services/RenamePlanServiceDefault";

import { type CommandOptions, type UsageError, resolveFolder } from "./common";

export type RenameByDateDeps = {
  logger: Logger;
  exifService: ExifService;
  scanner?: FileSystemScanner;
  mtimeOf?: MtimeReader;
};

export type RenameByDateOutcome = {
  result: ApplyResult;
  plan: RenamePlan;
};

export function registerRenameByDate(cli: CAC, baseLogger: Logger) {
  cli
    .command("rename <folder>", "依拍攝時間將相片改名為 img_YYYYMMDD_HHmmss_N")
    .option("--dry-run", "只輸出計劃，不動檔案", { default: false })
    .action(async (folder: string, options: CommandOptions) => {
      const logger = baseLogger.extend("rename", { folder });
      const exifService = new ExifServiceExifTool();
      try {
        const outcome = await runRenameByDate(folder, options, { logger, exifService });
        if (isErr(outcome)) process.exitCode = 1;
      } finally {
        await exifService[Symbol.asyncDispose]();
      }
    });
}

export async function runRenameByDate(
  folder: string,
  options: CommandOptions,
  deps: RenameByDateDeps
): Promise<Result<RenameByDateOutcome, UsageError>> {
  const { logger } = deps;
  const dryRun = options.dryRun ?? false;

  const rootRes = await resolveFolder(folder, logger);
  if (isErr(rootRes)) return rootRes;

  const scanner = deps.scanner ?? new FileSystemScannerDefault();
  const allRes = await scanner.scan(rootRes.value);
  if (isErr(allRes)) {
    logger.error({ emoji: "❌", error: allRes.error.message })`掃描來源目錄失敗`;
    return err(allRes.error);
  }
  const images = await scanner.scan(rootRes.value, { allowExts: imageExtensions });
  if (isErr(images)) return err(images.error);

  const planner = new RenamePlanServiceDefault({
    exifService: deps.exifService,
    logger,
    mtimeOf: deps.mtimeOf,
  });
  const candidates = await planner.resolveStamps(images.value);
  const plan = planner.plan(
    candidates,
    allRes.value.map((p) => path.basename(p))
  );
  logger.info({
    emoji: "🏷️",
    unchanged: plan.unchanged.length,
  })`${images.value.length} 張相片，${plan.renames.length} 張需要改名`;

  const result = await new FileMoverDefault({ logger }).moveFiles(plan.renames, { dryRun });
  if (result.failures.length > 0) {
    logger.warn({ failed: result.failures.length })`${result.failures.length} 個檔案改名失敗`;
  }
  logger.info({
    event: "done",
    emoji: dryRun ? "🧪" : "✅",
  })`${dryRun ? "試跑完成：將改名" : "完成：已改名"} ${result.moved} 個檔案`;
  return ok({ result, plan });
}
