/**
 * Station registry loader
 * One row per meteo station: code, latitude, longitude (and optionally name).
 * Read from CSV or from the first sheet of a spreadsheet.
 */

import { promises as fs } from 'fs';
import * as Papa from 'papaparse';
import { ValidationError } from '../errors';
import type { StationRecord } from '../geo/geo-resolver';
import { cellNumber, cellText, isSpreadsheetPath, readFirstSheet, SheetRow } from './spreadsheet';

const COLUMN_ALIASES = {
  code: ['code', 'station_code', 'id'],
  latitude: ['latitude', 'lat'],
  longitude: ['longitude', 'lon', 'lng'],
  name: ['name', 'station_name'],
} as const;

function pickColumn(header: readonly string[], aliases: readonly string[]): number {
  const alias = aliases.find(a => header.includes(a));
  return alias === undefined ? -1 : header.indexOf(alias);
}

/**
 * Header row first, then one station per row
 */
export function parseStationRows(rows: readonly SheetRow[], source = 'station registry'): StationRecord[] {
  const header = (rows[0] ?? []).map(h => cellText(h).toLowerCase());
  const codeCol = pickColumn(header, COLUMN_ALIASES.code);
  const latCol = pickColumn(header, COLUMN_ALIASES.latitude);
  const lonCol = pickColumn(header, COLUMN_ALIASES.longitude);
  const nameCol = pickColumn(header, COLUMN_ALIASES.name);

  if (codeCol < 0 || latCol < 0 || lonCol < 0) {
    throw new ValidationError(`${source} must have code, latitude and longitude columns`, {
      source,
      columns: header.join(','),
    });
  }

  return rows.slice(1).map((row, i) => {
    // header is line 1
    const line = i + 2;
    const code = cellText(row[codeCol]);
    const latitude = cellNumber(row[latCol]);
    const longitude = cellNumber(row[lonCol]);

    if (!code) {
      throw new ValidationError('Station code is empty', { source, line });
    }
    if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
      throw new ValidationError(`Station ${code} has invalid coordinates`, { source, line, code });
    }

    const station: StationRecord = { code, latitude, longitude };
    const name = nameCol < 0 ? '' : cellText(row[nameCol]);
    if (name) station.name = name;
    return station;
  });
}

export function parseStationRegistry(text: string, source = 'station registry'): StationRecord[] {
  const result = Papa.parse<string[]>(text, { header: false, skipEmptyLines: 'greedy' });
  return parseStationRows(result.data, source);
}

export async function loadStationRegistry(filePath: string): Promise<StationRecord[]> {
  if (isSpreadsheetPath(filePath)) {
    return parseStationRows(readFirstSheet(await fs.readFile(filePath), filePath), filePath);
  }
  const text = await fs.readFile(filePath, 'utf-8');
  return parseStationRegistry(text, filePath);
}
