import { format, isValid, parse } from "date-fns";

import { type Result, err, ok } from "~shared/utils/Result";

/** img_YYYYMMDD_HHmmss_N.ext */
export const canonicalNameRegex = /^img_(\d{8}_\d{6})_(\d+)\.(\w+)$/;

export const captureStampFormat = "yyyyMMdd_HHmmss";

export type CanonicalName = {
  /** img_YYYYMMDD_HHmmss，同一連拍的共同前綴 */
  namingPrefix: string;
  stamp: string;
  capturedAt: Date;
  sequence: number;
  extension: string;
};

export type NameParseError =
  | { type: "NOT_CANONICAL"; message: string }
  | { type: "INVALID_DATE"; message: string };

export function parseCanonicalName(
  fileName: string
): Result<CanonicalName, NameParseError> {
  const match = canonicalNameRegex.exec(fileName);
  if (!match) {
    return err({
      type: "NOT_CANONICAL",
      message: `檔名不符合 img_YYYYMMDD_HHmmss_N 格式: ${fileName}`,
    });
  }
  const [, stamp, sequence, extension] = match;
  const capturedAt = parse(stamp, captureStampFormat, new Date(0));
  if (!isValid(capturedAt)) {
    return err({
      type: "INVALID_DATE",
      message: `檔名中的日期無效: ${fileName}`,
    });
  }
  return ok({
    namingPrefix: `img_${stamp}`,
    stamp,
    capturedAt,
    sequence: parseInt(sequence, 10),
    extension,
  });
}

export function toCaptureStamp(date: Date) {
  return format(date, captureStampFormat);
}

/** extension 需含開頭的點，例如 ".JPG" */
export function buildCanonicalName(
  stamp: string,
  sequence: number,
  extension: string
) {
  return `img_${stamp}_${sequence}${extension}`;
}
