/**
 * Command-line options
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { RESOURCE_TYPES, ResourceType } from '@res-fusion/core';

export type FusionRunOptions = {
  name: string;
  powerKw: number;
  lon: number;
  lat: number;
  type: ResourceType;
  history: string;
  stations?: string;
  tmpDir?: string;
  out?: string;
  zone?: string;
};

function parseNumber(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return n;
}

export function buildProgram(): Command {
  return new Command()
    .name('res-fusion')
    .description('Fuse a site power history with weather from the nearest meteo station')
    .requiredOption('--name <name>', 'Site name or meter serial number')
    .requiredOption('--power-kw <kW>', 'Installed power in kW', parseNumber)
    .requiredOption('--lon <degrees>', 'Site longitude (use --lon=-x for negative values)', parseNumber)
    .requiredOption('--lat <degrees>', 'Site latitude', parseNumber)
    .addOption(
      new Option('--type <type>', 'Resource type').choices(RESOURCE_TYPES).makeOptionMandatory()
    )
    .requiredOption('--history <file>', 'Historical power, CSV or .xlsx (datetime, power)')
    .option('--stations <file>', 'Station registry, CSV or .xlsx (defaults to RES_STATION_REGISTRY)')
    .option('--tmp-dir <dir>', 'Directory for temporary archive files (defaults to RES_TMP_DIR)')
    .option('--out <csv>', 'Write the fused table here instead of stdout')
    .option(
      '--zone <zone>',
      'Time zone of history datetimes without offset (the repeated hour at a DST change needs explicit offsets)',
      'utc'
    )
    .exitOverride()
    .configureOutput({ writeErr: () => undefined });
}

/**
 * Parse argv (without the node/script prefix) into run options
 */
export function parseOptions(argv: readonly string[], program: Command = buildProgram()): FusionRunOptions {
  program.parse([...argv], { from: 'user' });
  return program.opts<FusionRunOptions>();
}
