import { earthRadiusKm } from "@/constants";
import type { GeoPoint } from "@/types";

const toRadians = (deg: number) => (deg * Math.PI) / 180;

/** 兩點大圓距離（公里） */
export function haversine(
  lat1: number,
  lon1: number,
  lat2: number,
  lon2: number
): number {
  const dLat = toRadians(lat2 - lat1);
  const dLon = toRadians(lon2 - lon1);
  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(lat1)) * Math.cos(toRadians(lat2)) * Math.sin(dLon / 2) ** 2;
  return 2 * earthRadiusKm * Math.asin(Math.sqrt(a));
}

export function distanceKm(a: GeoPoint, b: GeoPoint) {
  return haversine(a.latitude, a.longitude, b.latitude, b.longitude);
}
