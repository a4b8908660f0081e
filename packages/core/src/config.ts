/**
 * Pipeline Configuration
 *
 * The pipeline never reads the environment itself: callers pass a
 * PipelineConfig explicitly. `loadConfigFromEnv` is the bridge used by
 * entry points (the CLI) after dotenv has populated process.env.
 */

import * as os from 'os';
import { z } from 'zod';
import { ValidationError } from './errors';

export const DEFAULT_ARCHIVE_BASE_URL =
  'https://dane.imgw.pl/data/dane_pomiarowo_obserwacyjne/dane_meteorologiczne/terminowe/synop';

export interface PipelineConfig {
  /** CSV file with code/latitude/longitude columns */
  stationRegistryPath?: string;
  /** Parent directory for the per-archive scratch directories */
  tempDir: string;
  archiveBaseUrl: string;
  requestTimeoutMs: number;
  /** TextDecoder label for archive text; undecodable bytes become U+FFFD */
  archiveEncoding: string;
}

export const DEFAULT_CONFIG: Omit<PipelineConfig, 'tempDir'> = {
  archiveBaseUrl: DEFAULT_ARCHIVE_BASE_URL,
  requestTimeoutMs: 60000,
  archiveEncoding: 'utf-8',
};

const envSchema = z.object({
  RES_STATION_REGISTRY: z.string().min(1).optional(),
  RES_TMP_DIR: z.string().min(1).optional(),
  RES_ARCHIVE_BASE_URL: z.string().url().optional(),
  RES_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  RES_ARCHIVE_ENCODING: z.string().min(1).optional(),
});

function assertEncoding(label: string): void {
  try {
    new TextDecoder(label);
  } catch (error) {
    throw new ValidationError(`Unsupported archive encoding "${label}"`, { encoding: label }, error);
  }
}

/**
 * Fill the optional parts of a config with defaults
 */
export function resolveConfig(partial: Partial<PipelineConfig> = {}): PipelineConfig {
  const resolved: PipelineConfig = {
    ...DEFAULT_CONFIG,
    tempDir: os.tmpdir(),
    ...partial,
  };
  assertEncoding(resolved.archiveEncoding);
  return resolved;
}

/**
 * Build a PipelineConfig from environment variables
 *
 * @throws ValidationError when a variable is present but malformed
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ValidationError(`Invalid environment configuration: ${issues.join('; ')}`);
  }

  const vars = parsed.data;
  const partial: Partial<PipelineConfig> = {};
  if (vars.RES_STATION_REGISTRY) partial.stationRegistryPath = vars.RES_STATION_REGISTRY;
  if (vars.RES_TMP_DIR) partial.tempDir = vars.RES_TMP_DIR;
  if (vars.RES_ARCHIVE_BASE_URL) partial.archiveBaseUrl = vars.RES_ARCHIVE_BASE_URL;
  if (vars.RES_REQUEST_TIMEOUT_MS) partial.requestTimeoutMs = vars.RES_REQUEST_TIMEOUT_MS;
  if (vars.RES_ARCHIVE_ENCODING) partial.archiveEncoding = vars.RES_ARCHIVE_ENCODING;

  return resolveConfig(partial);
}
