import type { CAC } from "cac";
import { format } from "date-fns";

import type { DumpWriter } from "~shared/DumpWriter/DumpWriter";
import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import { getAppConfig } from "@/config";
import { DuplicateResolverDefault } from "@/services/DuplicateResolverDefault";
import { type ExifService, ExifServiceExifTool } from "@/services/ExifService";
import { type ApplyResult, FileMoverDefault, emptyApplyResult } from "@/services/FileMover";
import {
  type FileSystemScanner,
  FileSystemScannerDefault,
} from "@/services/FileSystemScanner";
import { FolderNamerDefault } from "@/services/FolderNamerDefault";
import { type LocationNamer, LocationNamerNominatim } from "@/services/LocationNamer";
import { MediaCatalogServiceDefault, type SizeReader } from "@/services/MediaCatalogServiceDefault";
import type { TripArrangeResult } from "@/services/TripArrangeService";
import { TripArrangeServiceDefault } from "@/services/TripArrangeServiceDefault";
import { TripClusteringServiceDefault } from "@/services/TripClusteringServiceDefault";

import { type CommandOptions, type UsageError, logApplyResult, resolveFolder } from "./common";

export type ArrangeTripsDeps = {
  logger: Logger;
  exifService: ExifService;
  locationNamer: LocationNamer;
  scanner?: FileSystemScanner;
  sizeOf?: SizeReader;
  reporter?: DumpWriter;
};

export type ArrangeTripsOutcome = {
  result: ApplyResult;
  arrangement?: TripArrangeResult;
};

export function registerArrangeTrips(cli: CAC, baseLogger: Logger) {
  cli
    .command("trips <folder>", "去除重複後，依日期與 GPS 將相片分到 YYYY/YYYY_MM_地點 資料夾")
    .option("--dry-run", "只輸出計劃，不動檔案", { default: false })
    .action(async (folder: string, options: CommandOptions) => {
      const logger = baseLogger.extend("trips", { folder });
      const exifService = new ExifServiceExifTool();
      try {
        const outcome = await runArrangeTrips(folder, options, {
          logger,
          exifService,
          locationNamer: new LocationNamerNominatim({
            logger,
            userAgent: getAppConfig().GEOCODER_USER_AGENT,
          }),
          reporter: new DumpWriterDefault(logger),
        });
        if (isErr(outcome)) process.exitCode = 1;
      } finally {
        await exifService[Symbol.asyncDispose]();
      }
    });
}

export async function runArrangeTrips(
  folder: string,
  options: CommandOptions,
  deps: ArrangeTripsDeps
): Promise<Result<ArrangeTripsOutcome, UsageError>> {
  const { logger } = deps;
  const dryRun = options.dryRun ?? false;

  const rootRes = await resolveFolder(folder, logger);
  if (isErr(rootRes)) return rootRes;
  const root = rootRes.value;
  logger.info({ emoji: "📁", dryRun })`來源: ${root}${dryRun ? "（試跑）" : ""}`;

  // 1) 掃描檔案
  const scanner = deps.scanner ?? new FileSystemScannerDefault();
  const scanRes = await scanner.scan(root);
  if (isErr(scanRes)) {
    logger.error({ emoji: "❌", error: scanRes.error.message })`掃描來源目錄失敗`;
    return err(scanRes.error);
  }

  // 2) 解析檔名、取得大小
  const catalog = await new MediaCatalogServiceDefault({
    logger,
    sizeOf: deps.sizeOf,
  }).load(scanRes.value);
  if (catalog.records.length === 0) {
    logger.warn({ emoji: "🟡" })`沒有符合 img_YYYYMMDD_HHmmss_N 命名的相片`;
    return ok({ result: emptyApplyResult(dryRun) });
  }
  logger.info({
    emoji: "🔎",
    ignored: catalog.ignored.length,
    skipped: catalog.skipped.length,
  })`掃描完成，共 ${catalog.records.length} 張相片`;

  // 3) 產生計劃
  const arranger = new TripArrangeServiceDefault({
    exifService: deps.exifService,
    duplicateResolver: new DuplicateResolverDefault(),
    clustering: new TripClusteringServiceDefault(),
    locationNamer: deps.locationNamer,
    folderNamer: new FolderNamerDefault(),
    outputRoot: root,
    logger,
  });
  const arrangement = await arranger.arrange(catalog.records);
  for (const warning of arrangement.plan.warnings) {
    logger.warn({ emoji: "⚠️" }, warning);
  }
  await deps.reporter?.dump("trips-plan", {
    dryRun,
    bytesToFree: arrangement.plan.bytesToFree,
    trips: arrangement.trips.map((t) => ({
      folder: `${t.year}/${t.folderName}`,
      place: t.placeName,
      from: format(t.start, "yyyy-MM-dd HH:mm:ss"),
      to: format(t.end, "yyyy-MM-dd HH:mm:ss"),
      count: t.count,
    })),
    duplicates: arrangement.duplicates.map((g) => ({
      retained: g.retained,
      toRemove: g.toRemove,
      sizeBytes: g.sizeBytes,
    })),
    skipped: catalog.skipped,
  });

  // 4) 執行或試跑
  const mover = new FileMoverDefault({ logger });
  const result = await mover.apply(arrangement.plan, { dryRun });
  logApplyResult(logger, result);
  return ok({ result, arrangement });
}
