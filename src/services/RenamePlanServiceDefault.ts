import { stat } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import type { MoveFile } from "@/types";

import type { ExifService } from "./ExifService";
import { buildCanonicalName, toCaptureStamp } from "./MediaNaming";
import type { RenameCandidate, RenamePlan, RenamePlanService } from "./RenamePlanService";

export type MtimeReader = (filePath: string) => Promise<Date>;

const statMtime: MtimeReader = async (filePath) => (await stat(filePath)).mtime;

export class RenamePlanServiceDefault implements RenamePlanService {
  private readonly exifService: ExifService;
  private readonly mtimeOf: MtimeReader;
  private readonly logger: Logger;

  constructor(deps: { exifService: ExifService; logger: Logger; mtimeOf?: MtimeReader }) {
    this.exifService = deps.exifService;
    this.mtimeOf = deps.mtimeOf ?? statMtime;
    this.logger = deps.logger.extend("RenamePlanServiceDefault");
  }

  async resolveStamps(filePaths: string[]): Promise<RenameCandidate[]> {
    const candidates: RenameCandidate[] = [];
    for (const filePath of filePaths) {
      const exif = await this.exifService.readExif(filePath);
      if (!isErr(exif) && exif.value.captureStamp) {
        candidates.push({ filePath, stamp: exif.value.captureStamp, source: "EXIF" });
        continue;
      }
      if (isErr(exif)) {
        this.logger.warn({ emoji: "📷", type: exif.error.type })`${path.basename(filePath)} 無法讀取 EXIF，改用修改時間`;
      }
      try {
        const mtime = await this.mtimeOf(filePath);
        candidates.push({ filePath, stamp: toCaptureStamp(mtime), source: "MTIME" });
      } catch (error) {
        this.logger.warn({ emoji: "⏭️", error })`無法判斷 ${path.basename(filePath)} 的日期，略過`;
      }
    }
    return candidates;
  }

  plan(candidates: RenameCandidate[], existingNames: Iterable<string>): RenamePlan {
    const taken = new Set(existingNames);
    const renames: MoveFile[] = [];
    const unchanged: string[] = [];

    for (const candidate of candidates) {
      const dir = path.dirname(candidate.filePath);
      const fileName = path.basename(candidate.filePath);
      const ext = path.extname(fileName);

      let sequence = 0;
      let target = buildCanonicalName(candidate.stamp, sequence, ext);
      while (target !== fileName && taken.has(target)) {
        sequence++;
        target = buildCanonicalName(candidate.stamp, sequence, ext);
      }
      if (target === fileName) {
        unchanged.push(candidate.filePath);
        continue;
      }

      // 依序改名：舊檔名釋出，新檔名占用
      taken.delete(fileName);
      taken.add(target);
      renames.push({ from: candidate.filePath, to: path.join(dir, target) });
    }

    return { renames, unchanged };
  }
}
