import type { CAC } from "cac";
import { format } from "date-fns";

import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import { ExifServiceExifTool } from "@/services/ExifService";
import { expandHome } from "@/utils/helper";

export function registerInspectExif(cli: CAC, baseLogger: Logger) {
  cli
    .command("exif <file>", "顯示單一檔案的拍攝時間、座標與相機資訊")
    .action(async (file: string) => {
      const logger = baseLogger.extend("exif");
      const exifService = new ExifServiceExifTool();
      try {
        const res = await exifService.readExif(expandHome(file));
        if (isErr(res)) {
          logger.error({ emoji: "❌", type: res.error.type }, res.error.message);
          process.exitCode = 1;
          return;
        }
        const exif = res.value;
        logger.info({
          emoji: "📷",
          captureTime: exif.captureTime
            ? format(exif.captureTime, "yyyy-MM-dd HH:mm:ss")
            : null,
          captureStamp: exif.captureStamp ?? null,
          latitude: exif.location?.latitude ?? null,
          longitude: exif.location?.longitude ?? null,
          camera: exif.cameraModel ?? null,
          lens: exif.lensModel ?? null,
        })`${exif.filePath}`;
      } finally {
        await exifService[Symbol.asyncDispose]();
      }
    });
}
