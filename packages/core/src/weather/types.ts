/**
 * Weather Types for site fusion
 */

export const WEATHER_FIELDS = ['clouds', 'windDir', 'windSpeed', 'temp', 'sun'] as const;

export type WeatherField = (typeof WEATHER_FIELDS)[number];

export type WeatherValues = Record<WeatherField, number | null>;

export interface WeatherObservation extends WeatherValues {
    timestamp: Date;
}

/** Time-ordered weather observations (or resampled rows) */
export type WeatherTable = WeatherObservation[];

export interface FetchedArchive {
    status: number;
    ok: boolean;
    data: Buffer;
}

/**
 * Transport for raw archive bytes. Implementations must not throw on HTTP
 * status codes; the loader decides what counts as success.
 */
export interface ArchiveFetcher {
    fetch(url: string): Promise<FetchedArchive>;
}
