import { type Result, err, ok } from "~shared/utils/Result";

import type { Exif, ExifService, ReadError } from "@/services/ExifService";

/** 以路徑為 key 的記憶體 EXIF，未設定的檔案一律回傳 NO_EXIF_DATA */
export class ExifServiceFake implements ExifService {
  private readonly records = new Map<string, Result<Exif, ReadError>>();
  readonly reads: string[] = [];

  async readExif(filePath: string): Promise<Result<Exif, ReadError>> {
    this.reads.push(filePath);
    return (
      this.records.get(filePath) ??
      err({ type: "NO_EXIF_DATA", message: `沒有 EXIF: ${filePath}` })
    );
  }

  setExif(filePath: string, exif: Omit<Exif, "filePath">) {
    this.records.set(filePath, ok({ filePath, ...exif }));
  }

  setLocation(filePath: string, latitude: number, longitude: number) {
    this.setExif(filePath, { location: { latitude, longitude } });
  }

  setReadError(filePath: string, error: ReadError) {
    this.records.set(filePath, err(error));
  }
}
