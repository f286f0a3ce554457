import { format } from "date-fns";
import type { ExifDateTime } from "exiftool-vendored";

const RAW_BASIC_RE = /^(\d{4}):(\d{2}):(\d{2})\s+(\d{2}):(\d{2}):(\d{2})/;

/**
 * 將 ExifDateTime 轉為 JS Date。
 * 規則：
 * 1) 若 rawValue = "YYYY:MM:DD HH:mm:ss" 且具 tzoffsetMinutes，使用 raw + tzoffsetMinutes 建立正確的 UTC 時間。
 * 2) 否則 fallback 使用 time.toDate()。
 * 3) 無效資料回傳 undefined。
 */
export function getTime(
  time: ExifDateTime | string | undefined
): Date | undefined {
  if (!time) return undefined;
  if (typeof time === "string") {
    const d = new Date(time);
    return Number.isNaN(d.getTime()) ? undefined : d;
  }
  if (!time.isValid) return undefined;

  const parts = parseRaw(time.rawValue);
  const tz = time.tzoffsetMinutes;
  if (parts && typeof tz === "number" && Number.isFinite(tz)) {
    // 先當作「目標時區的本地時間」建立 UTC 毫秒，再扣掉偏移
    const baseUtcMs = Date.UTC(
      parts.year,
      parts.month - 1,
      parts.day,
      parts.hour,
      parts.minute,
      parts.second
    );
    const d = new Date(baseUtcMs - tz * 60 * 1000);
    return Number.isNaN(d.getTime()) ? undefined : d;
  }

  try {
    const d = time.toDate();
    if (!Number.isNaN(d.getTime())) return d;
  } catch {
    // exiftool 無法轉換的日期視為無效
  }
  return undefined;
}

/**
 * 取得相機記錄的牆上時間 yyyyMMdd_HHmmss。
 * 檔名以拍攝地的當地時間命名，因此不做時區換算。
 */
export function getWallClockStamp(
  time: ExifDateTime | string | undefined
): string | undefined {
  if (!time) return undefined;
  const raw = typeof time === "string" ? time : time.rawValue;
  const parts = parseRaw(raw);
  if (parts) {
    const pad = (n: number, l = 2) => String(n).padStart(l, "0");
    return `${pad(parts.year, 4)}${pad(parts.month)}${pad(parts.day)}_${pad(parts.hour)}${pad(parts.minute)}${pad(parts.second)}`;
  }
  const d = getTime(time);
  return d ? format(d, "yyyyMMdd_HHmmss") : undefined;
}

function parseRaw(raw: string | undefined) {
  const m = raw ? RAW_BASIC_RE.exec(raw) : null;
  if (!m) return undefined;
  const [year, month, day, hour, minute, second] = m.slice(1, 7).map(Number);
  if (month < 1 || month > 12 || day < 1 || day > 31) return undefined;
  return { year, month, day, hour, minute, second };
}
