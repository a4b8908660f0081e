/**
 * Historical power loader
 *
 * Two columns with a header row: sample datetime (in order of occurrence)
 * and power level in kW. Read from CSV or from the first sheet of a
 * spreadsheet. Rows are returned in file order.
 */

import { promises as fs } from 'fs';
import { DateTime } from 'luxon';
import * as Papa from 'papaparse';
import { ValidationError } from '../errors';
import type { PowerSample } from '../fusion/types';
import { cellNumber, cellText, isSpreadsheetPath, readFirstSheet, serialToWallClockMs, SheetRow } from './spreadsheet';

const FALLBACK_FORMATS = [
  'dd.MM.yyyy HH:mm:ss',
  'dd.MM.yyyy HH:mm',
  'yyyy/MM/dd HH:mm:ss',
  'yyyy/MM/dd HH:mm',
];

const HALF_DAY_MS = 12 * 60 * 60 * 1000;

export interface PowerHistoryOptions {
  /** IANA zone for datetimes without an explicit offset */
  zone?: string;
}

interface ParsedTimestamp {
  date: Date;
  /** Wall-clock value interpreted in the configured zone */
  local: boolean;
}

function hasExplicitOffset(isoish: string): boolean {
  const time = isoish.split('T')[1] ?? '';
  return /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i.test(time);
}

function parseTimestampText(raw: string, zone: string): ParsedTimestamp | null {
  const s = raw.trim();
  if (!s) return null;

  const isoish = s.includes('T') ? s : s.replace(' ', 'T');
  const iso = DateTime.fromISO(isoish, { zone });
  if (iso.isValid) return { date: iso.toJSDate(), local: !hasExplicitOffset(isoish) };

  for (const format of FALLBACK_FORMATS) {
    const dt = DateTime.fromFormat(s, format, { zone });
    if (dt.isValid) return { date: dt.toJSDate(), local: true };
  }
  return null;
}

/**
 * Parse a sample datetime. ISO-like values (`T` or space separated) are tried
 * first, then common day-first and slash formats. Explicit offsets win over `zone`.
 */
export function parsePowerTimestamp(raw: string, zone = 'utc'): Date | null {
  return parseTimestampText(raw, zone)?.date ?? null;
}

/**
 * Whether the wall-clock time of `date` in `zone` also names another instant,
 * as the repeated hour does when daylight saving time ends
 */
export function isAmbiguousLocalTime(date: Date, zone: string): boolean {
  const ms = date.getTime();
  const wall = ms + DateTime.fromMillis(ms, { zone }).offset * 60000;

  for (const nearby of [ms - HALF_DAY_MS, ms + HALF_DAY_MS]) {
    const offset = DateTime.fromMillis(nearby, { zone }).offset;
    const candidate = wall - offset * 60000;
    if (candidate !== ms && DateTime.fromMillis(candidate, { zone }).offset === offset) return true;
  }
  return false;
}

function parseTimestampCell(value: unknown, zone: string): ParsedTimestamp | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : { date: value, local: false };
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    const dt = DateTime.fromMillis(serialToWallClockMs(value), { zone: 'utc' }).setZone(zone, { keepLocalTime: true });
    return dt.isValid ? { date: dt.toJSDate(), local: true } : null;
  }
  return parseTimestampText(cellText(value), zone);
}

/**
 * Header row first, then datetime and power in the first two columns.
 * Datetime cells may be text, spreadsheet date serials or Date instants.
 *
 * @throws ValidationError naming the line of a bad cell, or of a local time
 * that `zone` repeats at a daylight saving change
 */
export function parsePowerRows(
  rows: readonly SheetRow[],
  options: PowerHistoryOptions = {},
  source = 'power history'
): PowerSample[] {
  const zone = options.zone ?? 'utc';
  if (!DateTime.local().setZone(zone).isValid) {
    throw new ValidationError(`Unknown time zone "${zone}"`, { source, zone });
  }

  return rows.slice(1).map((row, i) => {
    const line = i + 2;
    const [rawDatetime, rawPower] = row;

    const parsed = parseTimestampCell(rawDatetime, zone);
    if (!parsed) {
      throw new ValidationError(`Unparseable datetime "${cellText(rawDatetime)}"`, { source, line });
    }
    if (parsed.local && isAmbiguousLocalTime(parsed.date, zone)) {
      throw new ValidationError(
        `Ambiguous local time "${cellText(rawDatetime)}" in ${zone}; use datetimes with an explicit offset`,
        { source, line, zone }
      );
    }

    const power = cellNumber(rawPower);
    if (!Number.isFinite(power)) {
      throw new ValidationError(`Invalid power value "${cellText(rawPower)}"`, { source, line });
    }

    return { timestamp: parsed.date, powerKw: power };
  });
}

export function parsePowerHistory(
  text: string,
  options: PowerHistoryOptions = {},
  source = 'power history'
): PowerSample[] {
  const result = Papa.parse<string[]>(text, { header: false, skipEmptyLines: 'greedy' });
  return parsePowerRows(result.data, options, source);
}

export async function loadPowerHistory(
  filePath: string,
  options: PowerHistoryOptions = {}
): Promise<PowerSample[]> {
  if (isSpreadsheetPath(filePath)) {
    return parsePowerRows(readFirstSheet(await fs.readFile(filePath), filePath), options, filePath);
  }
  const text = await fs.readFile(filePath, 'utf-8');
  return parsePowerHistory(text, options, filePath);
}
