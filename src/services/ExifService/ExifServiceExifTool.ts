import { ExifDateTime, type Tags, exiftool } from "exiftool-vendored";

import { type Result, err, ok } from "~shared/utils/Result";

import type { GeoPoint } from "@/types";

import type { Exif, ReadError } from "./Exif";
import { getTime, getWallClockStamp } from "./ExifDateTimeHelper";
import type { ExifService } from "./ExifService";

export class ExifServiceExifTool implements ExifService, AsyncDisposable {
  async readExif(filePath: string): Promise<Result<Exif, ReadError>> {
    let tags: Tags;
    try {
      tags = await exiftool.read(filePath);
    } catch (e) {
      const code = e instanceof Error && "code" in e ? e.code : undefined;
      if (code === "ENOENT") {
        return err({ type: "FILE_NOT_FOUND", message: `找不到檔案: ${filePath}` });
      }
      return err({
        type: "READ_FAILED",
        message: `讀取 EXIF 失敗: ${filePath}`,
      });
    }
    if (tags.errors && tags.errors.length > 0 && !tags.DateTimeOriginal) {
      return err({
        type: "NO_EXIF_DATA",
        message: `無 EXIF 資料: ${filePath} (${tags.errors.join("; ")})`,
      });
    }

    const original = toExifDateTime(tags.DateTimeOriginal);
    return ok({
      filePath,
      captureTime: getTime(original),
      captureStamp: getWallClockStamp(original),
      location: getLocation(tags),
      cameraModel: tags.Model,
      lensModel: tags.LensModel,
    });
  }

  async [Symbol.asyncDispose]() {
    await exiftool.end();
  }
}

function toExifDateTime(value: unknown): ExifDateTime | string | undefined {
  if (value instanceof ExifDateTime || typeof value === "string") return value;
  return undefined;
}

/** exiftool 的 GPS 數值可能未帶正負號，需依 Ref 修正 */
export function getLocation(
  tags: Pick<Tags, "GPSLatitude" | "GPSLongitude" | "GPSLatitudeRef" | "GPSLongitudeRef">
): GeoPoint | undefined {
  const lat = toNumber(tags.GPSLatitude);
  const lon = toNumber(tags.GPSLongitude);
  if (lat === undefined || lon === undefined) return undefined;
  const south = /^s/i.test(String(tags.GPSLatitudeRef ?? ""));
  const west = /^w/i.test(String(tags.GPSLongitudeRef ?? ""));
  return {
    latitude: south && lat > 0 ? -lat : lat,
    longitude: west && lon > 0 ? -lon : lon,
  };
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value === "string") {
    const n = Number(value);
    return value.trim() !== "" && Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}
