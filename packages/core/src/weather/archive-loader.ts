/**
 * Weather Archive Loader
 * Fetches one station/year synop archive, extracts it inside a scoped temp
 * directory and parses it into WeatherObservation rows.
 */

import AdmZip from 'adm-zip';
import { promises as fs } from 'fs';
import * as path from 'path';
import type { PipelineConfig } from '../config';
import { ArchiveError, ErrorContext, FetchError } from '../errors';
import { createLogger, Logger } from '../utils/logger';
import { withTempDir } from '../utils/temp-dir';
import { parseSynopArchive } from './archive-parser';
import type { ArchiveFetcher, WeatherObservation } from './types';

export type ArchiveLoaderOptions = Pick<PipelineConfig, 'tempDir' | 'archiveBaseUrl' | 'archiveEncoding'>;

export function archiveFileName(stationCode: string, year: number): string {
    return `${year}_${stationCode}_s.zip`;
}

/** Base name (no extension) of the table inside the archive */
export function archiveEntryName(stationCode: string, year: number): string {
    return `s_t_${stationCode}_${year}`;
}

/**
 * Remote location of a station/year archive: `{base}/{year}/{year}_{code}_s.zip`
 */
export function buildArchiveUrl(baseUrl: string, stationCode: string, year: number): string {
    return `${baseUrl.replace(/\/+$/, '')}/${year}/${archiveFileName(stationCode, year)}`;
}

/**
 * Decode archive bytes; bytes invalid for `encoding` become U+FFFD instead of failing
 */
export function decodeArchiveText(bytes: Uint8Array, encoding: string): string {
    return new TextDecoder(encoding, { fatal: false }).decode(bytes);
}

function stripExtension(name: string): string {
    const dot = name.lastIndexOf('.');
    return dot > 0 ? name.slice(0, dot) : name;
}

/**
 * Extract the `entryBase` table from the zip at `zipPath` into `dir`
 * and return the extracted file path
 */
function extractTable(zipPath: string, dir: string, entryBase: string, context: ErrorContext): string {
    let zip: AdmZip;
    try {
        zip = new AdmZip(zipPath);
    } catch (error) {
        throw new ArchiveError('Corrupt or unsupported archive', context, error);
    }

    const wanted = entryBase.toLowerCase();
    const entry = zip.getEntries().find(e =>
        !e.isDirectory && stripExtension(e.name).toLowerCase() === wanted
    );
    if (!entry) {
        throw new ArchiveError(`Archive does not contain ${entryBase}`, context);
    }

    try {
        zip.extractEntryTo(entry, dir, false, true);
    } catch (error) {
        throw new ArchiveError(`Failed to extract ${entry.entryName}`, context, error);
    }
    return path.join(dir, entry.name);
}

export class WeatherArchiveLoader {
    private readonly logger: Logger;

    constructor(
        private readonly fetcher: ArchiveFetcher,
        private readonly options: ArchiveLoaderOptions,
        logger: Logger = createLogger('WeatherArchiveLoader')
    ) {
        this.logger = logger;
    }

    /**
     * Load all observations of one station for one year
     *
     * @throws FetchError when the transport reports a non-success status
     * @throws ArchiveError when the archive cannot be extracted or parsed
     */
    async load(stationCode: string, year: number): Promise<WeatherObservation[]> {
        const url = buildArchiveUrl(this.options.archiveBaseUrl, stationCode, year);
        const context: ErrorContext = { stationCode, year, url };

        this.logger.info('Fetching weather archive', { action: 'fetch', stationCode, year });
        const response = await this.fetcher.fetch(url);
        if (!response.ok) {
            this.logger.warn('Weather archive request failed', { action: 'fetch', status: response.status, url });
            throw new FetchError(
                `Error getting archive ${archiveFileName(stationCode, year)}: response code ${response.status}`,
                response.status,
                context
            );
        }

        const observations = await withTempDir(
            this.options.tempDir,
            `${year}_${stationCode}_`,
            async dir => {
                const zipPath = path.join(dir, archiveFileName(stationCode, year));
                await fs.writeFile(zipPath, response.data);

                const tablePath = extractTable(zipPath, dir, archiveEntryName(stationCode, year), context);
                const bytes = await fs.readFile(tablePath);
                return parseSynopArchive(decodeArchiveText(bytes, this.options.archiveEncoding), context);
            },
            this.logger
        );

        this.logger.info('Parsed weather archive', { action: 'parse', stationCode, year, rows: observations.length });
        return observations;
    }
}
