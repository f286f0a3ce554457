export const imageExtensions = [
  ".jpg",
  ".jpeg",
  ".png",
  ".gif",
  ".bmp",
  ".tiff",
  ".heic",
] as const;

/** 判定為同一地點的距離上限（公里，不含） */
export const sameLocationThresholdKm = 50;

export const earthRadiusKm = 6371;

/** 無座標或無法反查時使用的地點標籤 */
export const unknownLocationLabel = "Unknown";
