import { stat } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import type { MediaRecord } from "@/types";

import type { MediaCatalog, MediaCatalogService, SkippedFile } from "./MediaCatalogService";
import { parseCanonicalName } from "./MediaNaming";

export type SizeReader = (filePath: string) => Promise<Result<number, string>>;

export const statSize: SizeReader = async (filePath) => {
  try {
    return ok((await stat(filePath)).size);
  } catch (e) {
    return err(e instanceof Error ? e.message : String(e));
  }
};

export class MediaCatalogServiceDefault implements MediaCatalogService {
  private readonly logger: Logger;
  private readonly sizeOf: SizeReader;

  constructor(deps: { logger: Logger; sizeOf?: SizeReader }) {
    this.logger = deps.logger.extend("MediaCatalogServiceDefault");
    this.sizeOf = deps.sizeOf ?? statSize;
  }

  async load(filePaths: string[]): Promise<MediaCatalog> {
    const records: MediaRecord[] = [];
    const ignored: string[] = [];
    const skipped: SkippedFile[] = [];

    for (const filePath of filePaths) {
      const fileName = path.basename(filePath);
      const parsed = parseCanonicalName(fileName);
      if (isErr(parsed)) {
        if (parsed.error.type === "NOT_CANONICAL") {
          ignored.push(filePath);
        } else {
          skipped.push({ filePath, type: "INVALID_DATE", message: parsed.error.message });
          this.logger.warn({ emoji: "⏭️" })`略過日期無效的檔案 ${fileName}`;
        }
        continue;
      }

      const size = await this.sizeOf(filePath);
      if (isErr(size)) {
        this.logger.warn({ emoji: "⚠️", error: size.error })`無法取得 ${fileName} 的大小`;
      }
      records.push({
        identifier: filePath,
        fileName,
        capturedAt: parsed.value.capturedAt,
        namingPrefix: parsed.value.namingPrefix,
        sizeBytes: size.ok ? size.value : undefined,
      });
    }

    this.logger.debug({
      records: records.length,
      ignored: ignored.length,
      skipped: skipped.length,
    })`載入 ${records.length} 筆相片`;
    return { records, ignored, skipped };
  }
}
