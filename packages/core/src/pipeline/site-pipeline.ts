/**
 * Site Pipeline
 *
 * Prepares one site's fused dataset: resolves the nearest meteo station,
 * loads the weather archives for every year the power history spans and
 * aligns them onto the power sampling grid. Each stage is awaited before the
 * next one starts; any failure rejects `create` and nothing partial is kept.
 *
 * Usage:
 *   const pipeline = await SitePipeline.create({ site, power, config });
 *   const rows = pipeline.fuse();
 */

import { v4 as uuidv4 } from 'uuid';
import { alignWeather, assertMonotonic, inferSamplingPeriod, timeRange } from '../alignment/aligner';
import type { PipelineConfig } from '../config';
import { ValidationError } from '../errors';
import { fuse } from '../fusion/fuser';
import type { FusedRecord, PowerSample } from '../fusion/types';
import { nearestStation, StationRecord, haversineKm } from '../geo/geo-resolver';
import { loadStationRegistry } from '../io/station-registry';
import type { Site } from '../site/site';
import { createLogger, Logger } from '../utils/logger';
import { WeatherArchiveLoader } from '../weather/archive-loader';
import { HttpArchiveFetcher } from '../weather/http-fetcher';
import { WeatherSeriesBuilder, yearRange } from '../weather/series-builder';
import type { ArchiveFetcher, WeatherTable } from '../weather/types';

export interface SitePipelineOptions {
  site: Site;
  /** Power history in file order */
  power: readonly PowerSample[];
  config: PipelineConfig;
  /** Candidate stations; read from `config.stationRegistryPath` when omitted */
  stations?: readonly StationRecord[];
  /** Archive transport; defaults to HTTP via axios */
  fetcher?: ArchiveFetcher;
}

async function resolveStations(options: SitePipelineOptions): Promise<readonly StationRecord[]> {
  if (options.stations) return options.stations;
  const registryPath = options.config.stationRegistryPath;
  if (!registryPath) {
    throw new ValidationError('No stations given and no station registry path configured');
  }
  return loadStationRegistry(registryPath);
}

export class SitePipeline {
  private constructor(
    readonly runId: string,
    readonly site: Site,
    readonly station: StationRecord,
    readonly samplingPeriodMs: number,
    private readonly power: readonly PowerSample[],
    private readonly rawWeather: WeatherTable,
    private readonly alignedWeather: WeatherTable,
    private readonly logger: Logger
  ) {}

  static async create(options: SitePipelineOptions): Promise<SitePipeline> {
    const { site, power, config } = options;
    const runId = uuidv4();
    const logger = createLogger('SitePipeline', { run_id: runId });

    const stations = await resolveStations(options);
    const station = nearestStation(stations, site);
    logger.info('Resolved nearest meteo station', {
      action: 'resolve',
      site: site.name,
      stationCode: station.code,
      distanceKm: Math.round(haversineKm(station, site) * 10) / 10,
    });

    const order = assertMonotonic(power);
    const samplingPeriodMs = inferSamplingPeriod(power);
    const years = yearRange(power);
    logger.info('Inspected power history', {
      action: 'inspect',
      samples: power.length,
      order,
      samplingPeriodMs,
      years: years.join(','),
    });

    const fetcher = options.fetcher ?? new HttpArchiveFetcher(config.requestTimeoutMs);
    const loader = new WeatherArchiveLoader(fetcher, config, createLogger('WeatherArchiveLoader', { run_id: runId }));
    const builder = new WeatherSeriesBuilder(loader, createLogger('WeatherSeriesBuilder', { run_id: runId }));
    const weather = await builder.build(station.code, years);

    const aligned = alignWeather(weather, samplingPeriodMs, timeRange(power));
    logger.info('Aligned weather series', { action: 'align', rows: aligned.length });

    return new SitePipeline(runId, site, station, samplingPeriodMs, power, weather, aligned, logger);
  }

  /** Concatenated weather observations before resampling */
  get weather(): WeatherTable {
    return this.rawWeather;
  }

  /** Weather resampled onto the power sampling grid */
  get aligned(): WeatherTable {
    return this.alignedWeather;
  }

  /**
   * One record per power sample that lands on the aligned grid, in power order
   */
  fuse(): FusedRecord[] {
    const records = fuse(this.power, this.alignedWeather, this.site);
    const dropped = this.power.length - records.length;
    if (dropped > 0) {
      this.logger.warn('Power samples without aligned weather were dropped', { action: 'fuse', dropped });
    }
    this.logger.info('Fused site dataset', { action: 'fuse', rows: records.length });
    return records;
  }
}
