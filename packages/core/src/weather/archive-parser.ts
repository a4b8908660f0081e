/**
 * Synop archive parser
 * Turns the tabular text of one extracted station/year archive into
 * WeatherObservation rows. No I/O happens here.
 */

import * as Papa from 'papaparse';
import { ArchiveError, ErrorContext } from '../errors';
import type { WeatherField, WeatherObservation } from './types';

/** Column positions (0-based) of the timestamp parts */
export const DATE_COLUMNS = { year: 2, month: 3, day: 4, hour: 5 } as const;

/** Column positions (0-based) of the kept weather fields */
export const FIELD_COLUMNS: Record<WeatherField, number> = {
  clouds: 21,
  windDir: 23,
  windSpeed: 25,
  temp: 29,
  sun: 69,
};

const MIN_COLUMNS = Math.max(...Object.values(FIELD_COLUMNS), ...Object.values(DATE_COLUMNS)) + 1;

function parseCell(raw: string | undefined): number | null {
  const v = (raw ?? '').trim();
  if (v === '') return null;
  const n = Number(v);
  return Number.isFinite(n) ? n : null;
}

function parseIntPart(raw: string | undefined, lo: number, hi: number): number | null {
  const v = (raw ?? '').trim();
  if (!/^\d+$/.test(v)) return null;
  const n = parseInt(v, 10);
  return n >= lo && n <= hi ? n : null;
}

/**
 * Build a UTC timestamp from the positional year/month/day/hour columns.
 * Returns null when any part is missing or the date does not exist.
 */
export function parseRowTimestamp(row: readonly string[]): Date | null {
  const year = parseIntPart(row[DATE_COLUMNS.year], 1000, 9999);
  const month = parseIntPart(row[DATE_COLUMNS.month], 1, 12);
  const day = parseIntPart(row[DATE_COLUMNS.day], 1, 31);
  const hour = parseIntPart(row[DATE_COLUMNS.hour], 0, 23);
  if (year === null || month === null || day === null || hour === null) return null;

  const ts = new Date(Date.UTC(year, month - 1, day, hour));
  // Date.UTC rolls 31 April over into 1 May
  if (ts.getUTCMonth() !== month - 1 || ts.getUTCDate() !== day) return null;
  return ts;
}

/**
 * Parse archive text into observations sorted by timestamp.
 *
 * @throws ArchiveError on malformed quoting, short rows or bad date parts
 */
export function parseSynopArchive(text: string, context: ErrorContext = {}): WeatherObservation[] {
  const result = Papa.parse<string[]>(text, {
    delimiter: ',',
    header: false,
    skipEmptyLines: 'greedy',
  });

  const quoteError = result.errors.find(e => e.type === 'Quotes');
  if (quoteError) {
    throw new ArchiveError(`Malformed archive text: ${quoteError.message}`, {
      ...context,
      line: quoteError.row === undefined ? undefined : quoteError.row + 1,
    });
  }

  const observations: WeatherObservation[] = result.data.map((row, i) => {
    const line = i + 1;
    if (row.length < MIN_COLUMNS) {
      throw new ArchiveError(
        `Archive row has ${row.length} columns, expected at least ${MIN_COLUMNS}`,
        { ...context, line }
      );
    }

    const timestamp = parseRowTimestamp(row);
    if (!timestamp) {
      const parts = [DATE_COLUMNS.year, DATE_COLUMNS.month, DATE_COLUMNS.day, DATE_COLUMNS.hour]
        .map(c => row[c])
        .join('/');
      throw new ArchiveError(`Unparseable timestamp components "${parts}"`, { ...context, line });
    }

    return {
      timestamp,
      clouds: parseCell(row[FIELD_COLUMNS.clouds]),
      windDir: parseCell(row[FIELD_COLUMNS.windDir]),
      windSpeed: parseCell(row[FIELD_COLUMNS.windSpeed]),
      temp: parseCell(row[FIELD_COLUMNS.temp]),
      sun: parseCell(row[FIELD_COLUMNS.sun]),
    };
  });

  // Array.prototype.sort is stable, so equal timestamps keep file order
  return observations.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
}
