/**
 * One CLI run: load inputs, build the site pipeline, render the fused table as CSV
 */

import * as Papa from 'papaparse';
import {
  ArchiveFetcher,
  FUSED_COLUMNS,
  FusedRecord,
  PipelineConfig,
  SitePipeline,
  StationRecord,
  createSite,
  loadConfigFromEnv,
  loadPowerHistory,
  resolveConfig,
  toFusedRow,
} from '@res-fusion/core';
import type { FusionRunOptions } from './options';

export interface RunDeps {
  env?: NodeJS.ProcessEnv;
  fetcher?: ArchiveFetcher;
}

export interface RunResult {
  csv: string;
  rows: number;
  station: StationRecord;
}

/**
 * Environment settings overridden by explicit command-line flags
 */
export function buildConfig(options: FusionRunOptions, env: NodeJS.ProcessEnv): PipelineConfig {
  const fromEnv = loadConfigFromEnv(env);
  return resolveConfig({
    ...fromEnv,
    ...(options.stations ? { stationRegistryPath: options.stations } : {}),
    ...(options.tmpDir ? { tempDir: options.tmpDir } : {}),
  });
}

export function renderCsv(records: readonly FusedRecord[]): string {
  return Papa.unparse(
    {
      fields: [...FUSED_COLUMNS],
      data: records.map(r => {
        const row = toFusedRow(r);
        return FUSED_COLUMNS.map(c => row[c]);
      }),
    },
    { newline: '\n' }
  );
}

export async function runFusion(options: FusionRunOptions, deps: RunDeps = {}): Promise<RunResult> {
  const config = buildConfig(options, deps.env ?? process.env);
  const site = createSite({
    name: options.name,
    installedPower: options.powerKw,
    longitude: options.lon,
    latitude: options.lat,
    resourceType: options.type,
  });
  const power = await loadPowerHistory(options.history, { zone: options.zone });

  const pipeline = await SitePipeline.create({ site, power, config, fetcher: deps.fetcher });
  const records = pipeline.fuse();

  return { csv: renderCsv(records), rows: records.length, station: pipeline.station };
}
