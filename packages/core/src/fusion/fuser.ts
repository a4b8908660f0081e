/**
 * Fuser
 * Joins power samples with aligned weather rows and stamps site metadata
 */

import type { Site } from '../site/site';
import type { WeatherObservation } from '../weather/types';
import type { FusedRecord, PowerSample } from './types';

/**
 * Inner join on exact timestamp. Samples without an aligned weather row are
 * dropped; output keeps the power series' order.
 */
export function fuse(
  power: readonly PowerSample[],
  weather: readonly WeatherObservation[],
  site: Site
): FusedRecord[] {
  const byTime = new Map<number, WeatherObservation>();
  for (const row of weather) byTime.set(row.timestamp.getTime(), row);

  const fused: FusedRecord[] = [];
  for (const sample of power) {
    const w = byTime.get(sample.timestamp.getTime());
    if (!w) continue;

    fused.push({
      timestamp: sample.timestamp,
      powerKw: sample.powerKw,
      clouds: w.clouds,
      windSpeed: w.windSpeed,
      windDir: w.windDir,
      sun: w.sun,
      temp: w.temp,
      resourceType: site.resourceType,
      name: site.name,
      installedPower: site.installedPower,
    });
  }
  return fused;
}
