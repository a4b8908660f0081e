/**
 * Test fixtures: synop archive rows, in-memory zips and a scripted fetcher
 */

import AdmZip from 'adm-zip';
import * as XLSX from 'xlsx';
import type { ArchiveFetcher, FetchedArchive } from '../weather/types';

export const SYNOP_COLUMN_COUNT = 107;

export interface SynopRowInput {
  year: number | string;
  month: number | string;
  day: number | string;
  hour: number | string;
  clouds?: number | string | null;
  windDir?: number | string | null;
  windSpeed?: number | string | null;
  temp?: number | string | null;
  sun?: number | string | null;
  stationCode?: string;
}

function cell(value: number | string | null | undefined): string {
  return value === null || value === undefined ? '' : String(value);
}

function pad2(value: number | string): string {
  return typeof value === 'number' ? String(value).padStart(2, '0') : value;
}

export function synopRow(input: SynopRowInput, columns = SYNOP_COLUMN_COUNT): string {
  const cols = new Array<string>(columns).fill('');
  cols[0] = input.stationCode ?? '353140200';
  cols[1] = '"TEST STATION"';
  cols[2] = String(input.year);
  cols[3] = pad2(input.month);
  cols[4] = pad2(input.day);
  cols[5] = pad2(input.hour);
  cols[21] = cell(input.clouds);
  cols[23] = cell(input.windDir);
  cols[25] = cell(input.windSpeed);
  cols[29] = cell(input.temp);
  if (columns > 69) cols[69] = cell(input.sun);
  return cols.join(',');
}

export function synopText(rows: SynopRowInput[]): string {
  return rows.map(r => synopRow(r)).join('\r\n') + '\r\n';
}

export function buildZip(entries: Record<string, string | Buffer>): Buffer {
  const zip = new AdmZip();
  for (const [name, content] of Object.entries(entries)) {
    zip.addFile(name, typeof content === 'string' ? Buffer.from(content, 'utf-8') : content);
  }
  return zip.toBuffer();
}

/**
 * Single-sheet .xlsx workbook holding `rows` as written
 */
export function buildWorkbook(rows: unknown[][]): Buffer {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), 'Sheet1');
  const bytes: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  return bytes;
}

/** Spreadsheet date serial (1900 system) of a UTC ISO datetime */
export function toSerial(iso: string): number {
  return Date.parse(iso) / 86400000 + 25569;
}

export function okArchive(data: Buffer): FetchedArchive {
  return { status: 200, ok: true, data };
}

export function failedArchive(status: number): FetchedArchive {
  return { status, ok: false, data: Buffer.alloc(0) };
}

/**
 * Fetcher answering from a handler and recording every requested URL
 */
export class ScriptedFetcher implements ArchiveFetcher {
  readonly urls: string[] = [];

  constructor(private readonly handler: (url: string) => FetchedArchive) {}

  async fetch(url: string): Promise<FetchedArchive> {
    this.urls.push(url);
    return this.handler(url);
  }
}
