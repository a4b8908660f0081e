export {
  isAmbiguousLocalTime,
  loadPowerHistory,
  parsePowerHistory,
  parsePowerRows,
  parsePowerTimestamp,
} from './power-history';
export type { PowerHistoryOptions } from './power-history';
export { isSpreadsheetPath, readFirstSheet } from './spreadsheet';
export type { SheetRow } from './spreadsheet';
export { loadStationRegistry, parseStationRegistry, parseStationRows } from './station-registry';
