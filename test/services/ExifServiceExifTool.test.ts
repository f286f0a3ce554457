import { describe, expect, test } from "vitest";

import { getTime, getWallClockStamp } from "@/services/ExifService/ExifDateTimeHelper";
import { getLocation } from "@/services/ExifService/ExifServiceExifTool";

describe("getLocation", () => {
  test("依 Ref 補上南緯與西經的負號", () => {
    expect(
      getLocation({
        GPSLatitude: 33.8688,
        GPSLatitudeRef: "S",
        GPSLongitude: 70.6693,
        GPSLongitudeRef: "West",
      })
    ).toEqual({ latitude: -33.8688, longitude: -70.6693 });
  });

  test("已帶負號的數值不重複取負", () => {
    expect(
      getLocation({
        GPSLatitude: -33.8688,
        GPSLatitudeRef: "S",
        GPSLongitude: 151.2093,
        GPSLongitudeRef: "E",
      })
    ).toEqual({ latitude: -33.8688, longitude: 151.2093 });
  });

  test("缺少任一座標時回傳 undefined", () => {
    expect(getLocation({ GPSLatitude: 25.03 })).toBeUndefined();
    expect(getLocation({})).toBeUndefined();
  });
});

describe("ExifDateTimeHelper", () => {
  test("牆上時間不做時區換算", () => {
    expect(getWallClockStamp("2024:08:17 19:26:57")).toBe("20240817_192657");
  });

  test("無法解析的字串", () => {
    expect(getWallClockStamp("not a date")).toBeUndefined();
    expect(getTime("not a date")).toBeUndefined();
    expect(getTime(undefined)).toBeUndefined();
  });
});
