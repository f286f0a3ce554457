import type { Result } from "~shared/utils/Result";

export interface LocationNamer {
  /**
   * 取得座標所在的城市/鄉鎮名稱。
   * 反查失敗時不會丟出錯誤，而是回傳帶座標的備援標籤。
   */
  resolve(latitude: number, longitude: number): Promise<string>;
}

export type GeocodeError =
  | { type: "GEOCODE_FAILED"; message: string }
  | { type: "NO_ADDRESS"; message: string };

export interface ReverseGeocoder {
  reverse(latitude: number, longitude: number): Promise<Result<string, GeocodeError>>;
}

export function fallbackLocationLabel(latitude: number, longitude: number) {
  return `Unknown_${latitude}_${longitude}`;
}
