import { ConfigService } from '@nestjs/config';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { FIXTURE_DATASET } from '../../test/helpers/testing-module';
import { DatasetError, UnknownZipError } from '../common/errors';
import { AppEnv } from '../config/env.validation';
import { ZipDatasetService } from './zip-dataset.service';

function datasetAt(filePath: string): ZipDatasetService {
  return new ZipDatasetService(new ConfigService<AppEnv, true>({ ZIP_DATASET_PATH: filePath }));
}

const zipsOf = (service: ZipDatasetService, origin: string, radius: number): string[] =>
  service.zipsWithinRadius(origin, radius).map((c) => c.zipCode);

describe('ZipDatasetService', () => {
  let dataset: ZipDatasetService;

  beforeAll(async () => {
    dataset = datasetAt(FIXTURE_DATASET);
    await dataset.onModuleInit();
  });

  it('should load every zip code in the file', () => {
    expect(dataset.size).toBe(6);
    expect(dataset.lookup('10001')).toEqual({
      zipCode: '10001',
      city: 'New York',
      state: 'NY',
      latitude: 40.7506,
      longitude: -73.9972,
    });
    expect(dataset.lookup('00000')).toBeUndefined();
  });

  it('should list the origin first, then the rest by distance', () => {
    const candidates = dataset.zipsWithinRadius('10001', 10);

    expect(candidates.map((c) => c.zipCode)).toEqual(['10001', '10003', '10002', '10004']);
    expect(candidates[0].distanceMiles).toBe(0);
    expect(candidates[1].distanceMiles).toBeCloseTo(1.365, 2);
    expect(candidates[3].distanceMiles).toBeCloseTo(3.37, 2);
  });

  it('should always include the origin, even when nothing else is near', () => {
    expect(zipsOf(dataset, '94101', 10)).toEqual(['94101']);
    expect(zipsOf(dataset, '10004', 0.01)).toEqual(['10004']);
  });

  it('should treat the radius boundary as inclusive on great-circle distance', () => {
    // 10701 is about 14.642 miles from 10001
    expect(zipsOf(dataset, '10001', 14.64)).not.toContain('10701');
    expect(zipsOf(dataset, '10001', 14.65)).toContain('10701');
  });

  it('should return nested sets for growing radii', () => {
    const radii = [1, 3, 10, 20, 5000];
    const sets = radii.map((r) => zipsOf(dataset, '10001', r));

    expect(sets.map((s) => s.length)).toEqual([1, 3, 4, 5, 6]);
    for (let i = 1; i < sets.length; i++) {
      for (const zip of sets[i - 1]) {
        expect(sets[i]).toContain(zip);
      }
    }
  });

  it('should throw UnknownZipError for an origin that is not in the dataset', () => {
    expect(() => dataset.zipsWithinRadius('00000', 10)).toThrow(UnknownZipError);
  });

  describe('malformed files', () => {
    let dir: string;

    beforeAll(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'coolest-zip-'));
    });

    afterAll(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('should fail with DatasetError when the file is missing', async () => {
      await expect(datasetAt(path.join(dir, 'missing.json')).load()).rejects.toThrow(DatasetError);
    });

    it('should fail with DatasetError on invalid JSON', async () => {
      const file = path.join(dir, 'broken.json');
      await fs.writeFile(file, '{ "10001": ', 'utf-8');

      await expect(datasetAt(file).load()).rejects.toThrow(/not valid JSON/);
    });

    it('should fail with DatasetError on entries with a bad shape', async () => {
      const file = path.join(dir, 'bad-entry.json');
      await fs.writeFile(
        file,
        JSON.stringify({ '10001': { city: 'New York', state: 'NY', latitude: 'north', longitude: -73.99 } }),
        'utf-8',
      );

      await expect(datasetAt(file).load()).rejects.toThrow(/malformed at "10001.latitude"/);
    });

    it('should fail with DatasetError on keys that are not zip codes', async () => {
      const file = path.join(dir, 'bad-key.json');
      await fs.writeFile(
        file,
        JSON.stringify({ '1001': { city: 'Nowhere', state: 'NY', latitude: 40, longitude: -74 } }),
        'utf-8',
      );

      await expect(datasetAt(file).load()).rejects.toThrow(DatasetError);
    });
  });

  describe('bundled registry', () => {
    let national: ZipDatasetService;

    beforeAll(async () => {
      national = new ZipDatasetService(new ConfigService<AppEnv, true>({}));
      await national.load();
    });

    it('should know zip codes across the whole country', () => {
      expect(national.size).toBeGreaterThan(20000);
      expect(national.lookup('90210')?.state).toBe('CA');
      expect(national.lookup('60601')?.state).toBe('IL');
      expect(national.lookup('02108')?.state).toBe('MA');
      expect(national.lookup('98101')?.state).toBe('WA');
      expect(national.lookup('00000')).toBeUndefined();
    });

    it('should resolve a radius around a registry zip code', () => {
      const candidates = national.zipsWithinRadius('02108', 2);

      expect(candidates[0].zipCode).toBe('02108');
      expect(candidates.length).toBeGreaterThan(1);
      expect(candidates.every((c) => c.distanceMiles <= 2)).toBe(true);
    });
  });
});
