/**
 * res-fusion CLI
 *
 * Usage:
 *   npm run fuse -- --name first --power-kw 5000.5 \
 *     --lon 14.822 --lat 53.007 --type wind --history data/hist.csv \
 *     --stations data/stations.csv --out fused.csv
 */

import * as dotenv from 'dotenv';
import * as path from 'path';
dotenv.config({ path: path.resolve(__dirname, '../../../.env') });

import { promises as fs } from 'fs';
import { CommanderError } from 'commander';
import { FusionError, createLogger, routeLogsToStderr } from '@res-fusion/core';
import { parseOptions } from './options';
import { runFusion } from './run';

const logger = createLogger('CLI');

async function main(): Promise<void> {
  const options = parseOptions(process.argv.slice(2));
  if (!options.out) routeLogsToStderr();
  const result = await runFusion(options);

  if (options.out) {
    await fs.writeFile(options.out, `${result.csv}\n`, 'utf-8');
    logger.info('Wrote fused table', { file: options.out, rows: result.rows, stationCode: result.station.code });
  } else {
    process.stdout.write(`${result.csv}\n`);
  }
}

main().catch((err: unknown) => {
  if (err instanceof CommanderError) {
    // help and version output exit cleanly
    if (err.exitCode !== 0) console.error(err.message);
    process.exitCode = err.exitCode;
    return;
  }
  const name = err instanceof Error ? err.name : 'Error';
  const message = err instanceof Error ? err.message : String(err);
  logger.error(`[${name}] ${message}`, err instanceof FusionError ? err.context : undefined);
  process.exitCode = 1;
});
