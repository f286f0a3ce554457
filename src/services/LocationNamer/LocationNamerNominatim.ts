import { Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import axios, { type AxiosInstance } from "axios";
import { setTimeout as sleep } from "node:timers/promises";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import { unknownLocationLabel } from "@/constants";

import {
  type GeocodeError,
  type LocationNamer,
  type ReverseGeocoder,
  fallbackLocationLabel,
} from "./LocationNamer";

const reverseResponseSchema = t.Object({
  address: t.Optional(
    t.Object({
      city: t.Optional(t.String()),
      town: t.Optional(t.String()),
      village: t.Optional(t.String()),
    })
  ),
  error: t.Optional(t.String()),
});

export type LocationNamerNominatimOptions = {
  logger: Logger;
  userAgent: string;
  http?: AxiosInstance;
  baseUrl?: string;
  timeoutMs?: number;
  /** Nominatim 使用政策：每秒最多一次請求 */
  minIntervalMs?: number;
};

/**
 * 以 OpenStreetMap Nominatim 反查地名。
 * 同一座標在一次執行中只查一次。
 */
export class LocationNamerNominatim implements LocationNamer, ReverseGeocoder {
  private readonly logger: Logger;
  private readonly http: AxiosInstance;
  private readonly userAgent: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly minIntervalMs: number;
  private readonly cache = new Map<string, string>();
  private lastRequestAt = 0;

  constructor(options: LocationNamerNominatimOptions) {
    this.logger = options.logger.extend("LocationNamerNominatim");
    this.http = options.http ?? axios.create();
    this.userAgent = options.userAgent;
    this.baseUrl = options.baseUrl ?? "https://nominatim.openstreetmap.org";
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.minIntervalMs = options.minIntervalMs ?? 1_000;
  }

  async resolve(latitude: number, longitude: number): Promise<string> {
    const key = `${latitude},${longitude}`;
    const cached = this.cache.get(key);
    if (cached !== undefined) return cached;

    const result = await this.reverse(latitude, longitude);
    let name: string;
    if (isErr(result)) {
      name = fallbackLocationLabel(latitude, longitude);
      this.logger.warn({
        emoji: "🌐",
        error: result.error.message,
        fallback: name,
      })`反查地名失敗 (${latitude}, ${longitude})，改用 ${name}`;
    } else {
      name = result.value;
      this.logger.debug({ emoji: "📍" })`(${latitude}, ${longitude}) → ${name}`;
    }
    this.cache.set(key, name);
    return name;
  }

  async reverse(
    latitude: number,
    longitude: number
  ): Promise<Result<string, GeocodeError>> {
    await this.throttle();
    let data: unknown;
    try {
      const response = await this.http.get<unknown>(`${this.baseUrl}/reverse`, {
        params: {
          lat: latitude,
          lon: longitude,
          format: "json",
          "accept-language": "en",
        },
        headers: {
          "User-Agent": this.userAgent,
          Accept: "application/json",
        },
        timeout: this.timeoutMs,
      });
      data = response.data;
    } catch (error) {
      return err({
        type: "GEOCODE_FAILED",
        message: error instanceof Error ? error.message : String(error),
      });
    } finally {
      this.lastRequestAt = Date.now();
    }

    if (!Value.Check(reverseResponseSchema, data)) {
      return err({
        type: "GEOCODE_FAILED",
        message: "Nominatim 回應格式不符",
      });
    }
    if (!data.address) {
      return err({
        type: "NO_ADDRESS",
        message: data.error ?? "Nominatim 回應沒有 address",
      });
    }
    const { city, town, village } = data.address;
    return ok(city ?? town ?? village ?? unknownLocationLabel);
  }

  private async throttle() {
    if (this.minIntervalMs <= 0 || this.lastRequestAt === 0) return;
    const wait = this.lastRequestAt + this.minIntervalMs - Date.now();
    if (wait > 0) await sleep(wait);
  }
}
