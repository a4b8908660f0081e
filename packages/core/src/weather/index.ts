/**
 * Weather archives: transport, extraction, parsing and per-year aggregation
 */

export * from './archive-loader';
export * from './archive-parser';
export * from './http-fetcher';
export * from './series-builder';
export { WEATHER_FIELDS } from './types';
export type {
    WeatherField,
    WeatherValues,
    WeatherObservation,
    WeatherTable,
    FetchedArchive,
    ArchiveFetcher,
} from './types';
