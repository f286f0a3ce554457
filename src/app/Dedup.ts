import type { CAC } from "cac";

import type { DumpWriter } from "~shared/DumpWriter/DumpWriter";
import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import type { DuplicateGroup } from "@/services/DuplicateResolver";
import { DuplicateResolverDefault } from "@/services/DuplicateResolverDefault";
import { type ApplyResult, FileMoverDefault, emptyApplyResult } from "@/services/FileMover";
import {
  type FileSystemScanner,
  FileSystemScannerDefault,
} from "@/services/FileSystemScanner";
import { MediaCatalogServiceDefault, type SizeReader } from "@/services/MediaCatalogServiceDefault";
import type { ArrangePlan, RemoveFile } from "@/types";
import { formatBytes } from "@/utils/helper";

import { type CommandOptions, type UsageError, logApplyResult, resolveFolder } from "./common";

export type DedupDeps = {
  logger: Logger;
  scanner?: FileSystemScanner;
  sizeOf?: SizeReader;
  reporter?: DumpWriter;
};

export type DedupOutcome = {
  result: ApplyResult;
  groups: DuplicateGroup[];
};

export function registerDedup(cli: CAC, baseLogger: Logger) {
  cli
    .command("dedup <folder>", "刪除同一秒、大小相同的重複相片")
    .option("--dry-run", "只輸出計劃，不動檔案", { default: false })
    .action(async (folder: string, options: CommandOptions) => {
      const logger = baseLogger.extend("dedup", { folder });
      const outcome = await runDedup(folder, options, {
        logger,
        reporter: new DumpWriterDefault(logger),
      });
      if (isErr(outcome)) process.exitCode = 1;
    });
}

export async function runDedup(
  folder: string,
  options: CommandOptions,
  deps: DedupDeps
): Promise<Result<DedupOutcome, UsageError>> {
  const { logger } = deps;
  const dryRun = options.dryRun ?? false;

  const rootRes = await resolveFolder(folder, logger);
  if (isErr(rootRes)) return rootRes;

  const scanner = deps.scanner ?? new FileSystemScannerDefault();
  const scanRes = await scanner.scan(rootRes.value);
  if (isErr(scanRes)) {
    logger.error({ emoji: "❌", error: scanRes.error.message })`掃描來源目錄失敗`;
    return err(scanRes.error);
  }

  const catalog = await new MediaCatalogServiceDefault({
    logger,
    sizeOf: deps.sizeOf,
  }).load(scanRes.value);

  const resolution = new DuplicateResolverDefault().resolve(catalog.records);
  for (const warning of resolution.warnings) {
    logger.warn({ emoji: "⚠️" }, warning.message);
  }
  if (resolution.groups.length === 0) {
    logger.info({ emoji: "✨" })`沒有重複的相片`;
    return ok({ result: emptyApplyResult(dryRun), groups: [] });
  }

  const sizes = new Map(catalog.records.map((r) => [r.identifier, r.sizeBytes]));
  const removals: RemoveFile[] = [];
  for (const group of resolution.groups) {
    for (const id of group.toRemove) {
      removals.push({ path: id, sizeBytes: sizes.get(id) ?? group.sizeBytes });
    }
  }
  const plan: ArrangePlan = {
    folders: [],
    removals,
    bytesToFree: removals.reduce((sum, r) => sum + r.sizeBytes, 0),
    warnings: resolution.warnings.map((w) => w.message),
  };
  logger.info({
    emoji: "🧹",
    groups: resolution.groups.length,
  })`${resolution.groups.length} 組重複，可釋放 ${formatBytes(plan.bytesToFree)}`;
  await deps.reporter?.dump("dedup-plan", {
    dryRun,
    bytesToFree: plan.bytesToFree,
    groups: resolution.groups,
  });

  const result = await new FileMoverDefault({ logger }).apply(plan, { dryRun });
  logApplyResult(logger, result);
  return ok({ result, groups: resolution.groups });
}
