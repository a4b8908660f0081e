/**
 * Geo Resolver
 * Great-circle distances and nearest meteo station selection
 */

import { EmptyRegistryError } from '../errors';

export const EARTH_RADIUS_KM = 6371;

export interface Coordinates {
  longitude: number;
  latitude: number;
}

export interface StationRecord extends Coordinates {
  code: string;
  name?: string;
}

function toRad(deg: number): number {
  return (deg * Math.PI) / 180;
}

/**
 * Haversine distance in kilometers between two points given in decimal degrees
 */
export function haversineKm(a: Coordinates, b: Coordinates): number {
  const lat1 = toRad(a.latitude);
  const lat2 = toRad(b.latitude);
  const dLat = lat2 - lat1;
  const dLon = toRad(b.longitude) - toRad(a.longitude);

  const h = Math.sin(dLat / 2) ** 2 + Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLon / 2) ** 2;
  // rounding can push h a hair above 1 for antipodal points
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.sqrt(Math.min(1, h)));
}

/**
 * Pick the station closest to `target`. On exact ties the station that
 * comes first in registry order wins.
 */
export function nearestStation<T extends StationRecord>(stations: readonly T[], target: Coordinates): T {
  if (stations.length === 0) {
    throw new EmptyRegistryError('Cannot resolve nearest station: registry is empty', {
      longitude: target.longitude,
      latitude: target.latitude,
    });
  }

  let best = stations[0];
  let bestDistance = haversineKm(best, target);
  for (let i = 1; i < stations.length; i++) {
    const d = haversineKm(stations[i], target);
    if (d < bestDistance) {
      bestDistance = d;
      best = stations[i];
    }
  }
  return best;
}
