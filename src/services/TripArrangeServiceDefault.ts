import path from "node:path";

import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import { unknownLocationLabel } from "@/constants";
import type { ArrangePlan, MediaRecord, PlannedFolder, RemoveFile, Trip } from "@/types";
import { compareCodeUnits } from "@/utils/helper";

import type { DuplicateResolver } from "./DuplicateResolver";
import type { ExifService } from "./ExifService";
import { type FolderNamer, createUsedBaseNames } from "./FolderNamer";
import type { LocationNamer } from "./LocationNamer";
import type { TripArrangeResult, TripArrangeService, TripSummary } from "./TripArrangeService";
import type { TripClusteringService } from "./TripClusteringService";

export class TripArrangeServiceDefault implements TripArrangeService {
  private readonly exifService: ExifService;
  private readonly duplicateResolver: DuplicateResolver;
  private readonly clustering: TripClusteringService;
  private readonly locationNamer: LocationNamer;
  private readonly folderNamer: FolderNamer;
  private readonly outputRoot: string;
  private readonly logger: Logger;

  constructor(deps: {
    exifService: ExifService;
    duplicateResolver: DuplicateResolver;
    clustering: TripClusteringService;
    locationNamer: LocationNamer;
    folderNamer: FolderNamer;
    outputRoot: string;
    logger: Logger;
  }) {
    this.exifService = deps.exifService;
    this.duplicateResolver = deps.duplicateResolver;
    this.clustering = deps.clustering;
    this.locationNamer = deps.locationNamer;
    this.folderNamer = deps.folderNamer;
    this.outputRoot = deps.outputRoot;
    this.logger = deps.logger.extend("TripArrangeServiceDefault");
  }

  async arrange(records: MediaRecord[]): Promise<TripArrangeResult> {
    const warnings: string[] = [];

    // 1) 去除重複
    const resolution = this.duplicateResolver.resolve(records);
    warnings.push(...resolution.warnings.map((w) => w.message));
    const removals: RemoveFile[] = [];
    const retained: MediaRecord[] = [];
    for (const record of records) {
      if (resolution.toRemove.has(record.identifier) && record.sizeBytes !== undefined) {
        removals.push({ path: record.identifier, sizeBytes: record.sizeBytes });
      } else {
        retained.push(record);
      }
    }
    if (removals.length > 0) {
      this.logger.info({
        emoji: "🧹",
        groups: resolution.groups.length,
      })`發現 ${removals.length} 個重複檔`;
    }

    // 2) 讀取 GPS，讀不到視為未知地點
    const located: MediaRecord[] = [];
    for (const record of retained) {
      const exif = await this.exifService.readExif(record.identifier);
      if (isErr(exif)) {
        this.logger.warn({
          emoji: "📷",
          type: exif.error.type,
        })`${record.fileName} 無法讀取 EXIF，視為未知地點`;
        located.push({ ...record, location: undefined });
        continue;
      }
      located.push({ ...record, location: exif.value.location });
    }

    // 3) 依年份分組，每年獨立分旅程與命名
    const byYear = located.reduce((map, record) => {
      const year = record.capturedAt.getFullYear();
      const list = map.get(year) ?? [];
      list.push(record);
      map.set(year, list);
      return map;
    }, new Map<number, MediaRecord[]>());

    const folders: PlannedFolder[] = [];
    const summaries: TripSummary[] = [];
    for (const year of [...byYear.keys()].sort((a, b) => a - b)) {
      const sorted = [...(byYear.get(year) ?? [])].sort(
        (a, b) =>
          a.capturedAt.getTime() - b.capturedAt.getTime() ||
          compareCodeUnits(a.identifier, b.identifier)
      );
      const trips = this.clustering.cluster(sorted);
      this.logger.info({ emoji: "🧭", year })`${year} 年共 ${trips.length} 趟旅程`;

      const named = await this.nameTrips(trips);
      const assignments = this.folderNamer.assign(named, year, createUsedBaseNames());
      for (const { trip, folderName } of assignments) {
        const targetDir = path.join(this.outputRoot, String(year), folderName);
        folders.push({
          year,
          folderName,
          targetDir,
          moves: trip.map((r) => ({
            from: r.identifier,
            to: path.join(targetDir, r.fileName),
          })),
        });
        summaries.push({
          year,
          folderName,
          placeName: trip[0].resolvedPlaceName ?? unknownLocationLabel,
          start: trip[0].capturedAt,
          end: trip[trip.length - 1].capturedAt,
          count: trip.length,
        });
      }
    }

    const plan: ArrangePlan = {
      folders,
      removals,
      bytesToFree: removals.reduce((sum, r) => sum + r.sizeBytes, 0),
      warnings,
    };
    return { plan, duplicates: resolution.groups, trips: summaries };
  }

  /** 每趟旅程只以第一張的座標反查一次 */
  private async nameTrips(trips: Trip[]): Promise<Trip[]> {
    const named: Trip[] = [];
    for (const trip of trips) {
      const [first, ...rest] = trip;
      const placeName = first.location
        ? await this.locationNamer.resolve(first.location.latitude, first.location.longitude)
        : unknownLocationLabel;
      named.push([{ ...first, resolvedPlaceName: placeName }, ...rest]);
    }
    return named;
  }
}
