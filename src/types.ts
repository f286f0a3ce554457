export type GeoPoint = {
  latitude: number;
  longitude: number;
};

/**
 * 單一待整理的相片。
 * identifier 為來源檔案的完整路徑，在同一次執行內唯一。
 */
export type MediaRecord = {
  identifier: string;
  fileName: string;
  /** 由檔名解析出的拍攝時間（本地時間） */
  capturedAt: Date;
  location?: GeoPoint;
  /** 每趟旅程只替第一筆反查一次 */
  resolvedPlaceName?: string;
  /** 無法取得大小時為 undefined，不參與重複判定 */
  sizeBytes?: number;
  /** img_YYYYMMDD_HHmmss */
  namingPrefix: string;
};

/** 依日期排序、連續且非空的一段相片 */
export type Trip = MediaRecord[];

export type FolderAssignment = {
  trip: Trip;
  folderName: string;
};

export type MoveFile = { from: string; to: string };

export type RemoveFile = { path: string; sizeBytes: number };

export type PlannedFolder = {
  year: number;
  folderName: string;
  targetDir: string;
  moves: MoveFile[];
};

export type ArrangePlan = {
  folders: PlannedFolder[];
  removals: RemoveFile[];
  bytesToFree: number;
  warnings: string[];
};
