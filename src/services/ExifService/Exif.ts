import type { GeoPoint } from "@/types";

export type Exif = {
  /** 檔案完整路徑 */
  filePath: string;

  /** 拍攝時間 */
  captureTime?: Date;

  /** 相機上的牆上時間 yyyyMMdd_HHmmss，不做時區換算 */
  captureStamp?: string;

  /** GPS 座標（十進位度數，南緯/西經為負） */
  location?: GeoPoint;

  /** 相機型號 */
  cameraModel?: string;

  /** 鏡頭名稱 */
  lensModel?: string;
};

export type ReadError =
  | { type: "FILE_NOT_FOUND"; message: string }
  | { type: "READ_FAILED"; message: string }
  | { type: "NO_EXIF_DATA"; message: string };
