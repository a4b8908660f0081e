import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ValidationError } from '../errors';
import { buildWorkbook } from '../tests/fixtures';
import { readFirstSheet } from './spreadsheet';
import { loadStationRegistry, parseStationRegistry, parseStationRows } from './station-registry';

describe('Station Registry', () => {
  describe('parseStationRegistry', () => {
    it('should read code, coordinates and name', () => {
      const text = 'code,name,latitude,longitude\n352200375,WARSZAWA,52.16,20.96\n350150500,KRAKOW,50.08,19.8\n';

      expect(parseStationRegistry(text)).toEqual([
        { code: '352200375', name: 'WARSZAWA', latitude: 52.16, longitude: 20.96 },
        { code: '350150500', name: 'KRAKOW', latitude: 50.08, longitude: 19.8 },
      ]);
    });

    it('should accept short column aliases in any case', () => {
      const text = 'ID,Lat,Lon\n 349190600 ,49.62,19.1\n';

      expect(parseStationRegistry(text)).toEqual([{ code: '349190600', latitude: 49.62, longitude: 19.1 }]);
    });

    it('should keep codes as text', () => {
      const text = 'code,lat,lon\n00123,1,2\n';
      expect(parseStationRegistry(text)[0].code).toBe('00123');
    });

    it('should skip blank lines', () => {
      const text = 'code,lat,lon\n\nA,1,2\n\n';
      expect(parseStationRegistry(text)).toHaveLength(1);
    });

    it('should return an empty registry for a header-only file', () => {
      expect(parseStationRegistry('code,lat,lon\n')).toEqual([]);
    });

    it('should reject a file without coordinate columns', () => {
      expect(() => parseStationRegistry('code,name\nA,B\n', 'stations.csv')).toThrow(
        'stations.csv must have code, latitude and longitude columns'
      );
    });

    it('should report the line of invalid coordinates', () => {
      const text = 'code,lat,lon\nA,1,2\nB,,3\n';
      try {
        parseStationRegistry(text, 'stations.csv');
        throw new Error('expected ValidationError');
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        if (error instanceof ValidationError) {
          expect(error.message).toBe('Station B has invalid coordinates');
          expect(error.context).toEqual({ source: 'stations.csv', line: 3, code: 'B' });
        }
      }
    });

    it('should reject an empty station code', () => {
      expect(() => parseStationRegistry('code,lat,lon\n ,1,2\n')).toThrow('Station code is empty');
    });
  });

  describe('loadStationRegistry', () => {
    it('should read the registry from disk', async () => {
      const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'registry-test-'));
      try {
        const file = path.join(dir, 'stations.csv');
        await fs.writeFile(file, 'code,lat,lon\nA,1,2\n', 'utf-8');

        expect(await loadStationRegistry(file)).toEqual([{ code: 'A', latitude: 1, longitude: 2 }]);
      } finally {
        await fs.rm(dir, { recursive: true, force: true });
      }
    });
  });

  describe('spreadsheet input', () => {
    it('should read numeric codes and coordinates from the first sheet', () => {
      const bytes = buildWorkbook([
        ['Code', 'Name', 'Lat', 'Lon'],
        [352200375, 'WARSZAWA', 52.16, 20.96],
        ['350150500', 'KRAKOW', '50.08', '19.8'],
      ]);

      expect(parseStationRows(readFirstSheet(bytes, 'stations.xlsx'), 'stations.xlsx')).toEqual([
        { code: '352200375', name: 'WARSZAWA', latitude: 52.16, longitude: 20.96 },
        { code: '350150500', name: 'KRAKOW', latitude: 50.08, longitude: 19.8 },
      ]);
    });

    it('should load a registry workbook from disk', async () => {
      const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'registry-test-'));
      try {
        const file = path.join(dir, 'stations.xlsx');
        await fs.writeFile(file, buildWorkbook([['code', 'lat', 'lon'], ['A', 1, 2]]));

        expect(await loadStationRegistry(file)).toEqual([{ code: 'A', latitude: 1, longitude: 2 }]);
      } finally {
        await fs.rm(dir, { recursive: true, force: true });
      }
    });

    it('should report the line of a missing coordinate', () => {
      const rows = [['code', 'lat', 'lon'], ['A', 1, 2], ['B', null, 3]];
      expect(() => parseStationRows(rows, 'stations.xlsx')).toThrow('Station B has invalid coordinates');
    });
  });
});
