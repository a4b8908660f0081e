/**
 * Flat row view of fused records, keyed by the published column headers
 */

import type { FusedRecord } from './types';

export const FUSED_COLUMNS = [
  'sample time',
  'power lvl',
  'clouds',
  'wind speed',
  'wind dir',
  'sun',
  'temp',
  'RES type',
  'name',
  'installed power',
] as const;

export type FusedColumn = (typeof FUSED_COLUMNS)[number];

export type FusedRow = Record<FusedColumn, string | number | null>;

export function toFusedRow(record: FusedRecord): FusedRow {
  return {
    'sample time': record.timestamp.toISOString(),
    'power lvl': record.powerKw,
    clouds: record.clouds,
    'wind speed': record.windSpeed,
    'wind dir': record.windDir,
    sun: record.sun,
    temp: record.temp,
    'RES type': record.resourceType,
    name: record.name,
    'installed power': record.installedPower,
  };
}
