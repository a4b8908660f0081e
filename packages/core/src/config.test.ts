import * as os from 'os';
import { DEFAULT_ARCHIVE_BASE_URL, loadConfigFromEnv, resolveConfig } from './config';
import { ValidationError } from './errors';

describe('Config', () => {
  describe('resolveConfig', () => {
    it('should fill defaults', () => {
      expect(resolveConfig()).toEqual({
        tempDir: os.tmpdir(),
        archiveBaseUrl: DEFAULT_ARCHIVE_BASE_URL,
        requestTimeoutMs: 60000,
        archiveEncoding: 'utf-8',
      });
    });

    it('should keep explicit values', () => {
      const config = resolveConfig({ tempDir: '/scratch', requestTimeoutMs: 500, archiveEncoding: 'latin1' });
      expect(config).toMatchObject({ tempDir: '/scratch', requestTimeoutMs: 500, archiveEncoding: 'latin1' });
    });

    it('should reject an encoding TextDecoder does not know', () => {
      expect(() => resolveConfig({ archiveEncoding: 'not-an-encoding' })).toThrow(
        'Unsupported archive encoding "not-an-encoding"'
      );
    });
  });

  describe('loadConfigFromEnv', () => {
    it('should match defaults for an empty environment', () => {
      expect(loadConfigFromEnv({})).toEqual(resolveConfig());
    });

    it('should map every variable', () => {
      const config = loadConfigFromEnv({
        RES_STATION_REGISTRY: 'data/stations.csv',
        RES_TMP_DIR: '/scratch',
        RES_ARCHIVE_BASE_URL: 'https://archive.test/synop',
        RES_REQUEST_TIMEOUT_MS: '1500',
        RES_ARCHIVE_ENCODING: 'latin1',
      });

      expect(config).toEqual({
        stationRegistryPath: 'data/stations.csv',
        tempDir: '/scratch',
        archiveBaseUrl: 'https://archive.test/synop',
        requestTimeoutMs: 1500,
        archiveEncoding: 'latin1',
      });
    });

    it('should ignore unrelated variables', () => {
      expect(loadConfigFromEnv({ HOME: '/home/test', DEBUG: '1' })).toEqual(resolveConfig());
    });

    it('should reject a malformed timeout', () => {
      expect(() => loadConfigFromEnv({ RES_REQUEST_TIMEOUT_MS: 'soon' })).toThrow(ValidationError);
    });

    it('should reject a malformed base URL', () => {
      expect(() => loadConfigFromEnv({ RES_ARCHIVE_BASE_URL: 'not a url' })).toThrow(
        /RES_ARCHIVE_BASE_URL/
      );
    });
  });
});
