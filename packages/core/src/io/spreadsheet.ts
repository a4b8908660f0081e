/**
 * Spreadsheet input
 * First worksheet of an .xlsx/.xls file as raw cell rows (SheetJS)
 */

import * as path from 'path';
import * as XLSX from 'xlsx';
import { ValidationError } from '../errors';

export type SheetRow = unknown[];

const SPREADSHEET_EXTENSIONS = ['.xlsx', '.xls'];

/** Days between the 1900 spreadsheet epoch (1899-12-30) and 1970-01-01 */
const SERIAL_EPOCH_OFFSET_DAYS = 25569;
const DAY_MS = 24 * 60 * 60 * 1000;

export function isSpreadsheetPath(filePath: string): boolean {
  return SPREADSHEET_EXTENSIONS.includes(path.extname(filePath).toLowerCase());
}

/**
 * Rows of the first sheet, blank rows dropped. Numbers (date cells included)
 * stay numeric; empty cells are null.
 */
export function readFirstSheet(bytes: Buffer, source: string): SheetRow[] {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(bytes, { type: 'buffer', cellDates: false });
  } catch (error) {
    throw new ValidationError(`Unreadable spreadsheet ${source}`, { source }, error);
  }

  const first = workbook.SheetNames[0];
  const sheet = first === undefined ? undefined : workbook.Sheets[first];
  if (!sheet) {
    throw new ValidationError(`Spreadsheet ${source} has no sheets`, { source });
  }

  return XLSX.utils.sheet_to_json<SheetRow>(sheet, { header: 1, raw: true, defval: null, blankrows: false });
}

export function cellText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  return String(value).trim();
}

export function cellNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  const text = cellText(value);
  return text === '' ? NaN : Number(text);
}

/**
 * Wall-clock time of a 1900-system date serial, expressed as UTC epoch ms and
 * rounded to the second
 */
export function serialToWallClockMs(serial: number): number {
  const ms = (serial - SERIAL_EPOCH_OFFSET_DAYS) * DAY_MS;
  return Math.round(ms / 1000) * 1000;
}
