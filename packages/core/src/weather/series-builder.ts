/**
 * Weather Series Builder
 * Concatenates per-year archives into one continuous weather table
 */

import { AlignmentError } from '../errors';
import { createLogger, Logger } from '../utils/logger';
import type { WeatherArchiveLoader } from './archive-loader';
import type { WeatherTable } from './types';

/**
 * Inclusive list of UTC years spanned by the first and last power samples.
 * Works whether the series is stored oldest-first or latest-first.
 */
export function yearRange(samples: ReadonlyArray<{ timestamp: Date }>): number[] {
    if (samples.length === 0) {
        throw new AlignmentError('Cannot derive year range from an empty power series');
    }
    const a = samples[0].timestamp.getUTCFullYear();
    const b = samples[samples.length - 1].timestamp.getUTCFullYear();
    const from = Math.min(a, b);
    const to = Math.max(a, b);

    const years: number[] = [];
    for (let y = from; y <= to; y++) years.push(y);
    return years;
}

/**
 * Sort by timestamp and keep the last row for repeated timestamps
 */
export function mergeWeatherTables(tables: readonly WeatherTable[]): WeatherTable {
    const byTime = new Map<number, WeatherTable[number]>();
    for (const table of tables) {
        for (const row of table) byTime.set(row.timestamp.getTime(), row);
    }
    return [...byTime.entries()].sort(([a], [b]) => a - b).map(([, row]) => row);
}

export class WeatherSeriesBuilder {
    constructor(
        private readonly loader: Pick<WeatherArchiveLoader, 'load'>,
        private readonly logger: Logger = createLogger('WeatherSeriesBuilder')
    ) {}

    /**
     * Load every year in order, one at a time. The first failing year aborts the build.
     */
    async build(stationCode: string, years: readonly number[]): Promise<WeatherTable> {
        const tables: WeatherTable[] = [];
        for (const year of years) {
            tables.push(await this.loader.load(stationCode, year));
        }

        const series = mergeWeatherTables(tables);
        this.logger.info('Built weather series', {
            action: 'build',
            stationCode,
            years: years.join(','),
            rows: series.length,
        });
        return series;
    }
}
