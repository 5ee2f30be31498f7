import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { DatasetError, UnknownZipError } from '../common/errors';
import { AppEnv } from '../config/env.validation';
import { haversineMiles } from './geo';
import { LocationCandidate, ZipLocation } from './interfaces/zipcode.interface';
import { loadRegistryLocations } from './zip-registry';

const ZipEntrySchema = z.object({
  city: z.string(),
  state: z.string(),
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

const ZipDatasetSchema = z.record(z.string().regex(/^[0-9]{5}$/), ZipEntrySchema);

/**
 * Offline zip code geolocation data. By default the national table bundled
 * with the `zipcodes` package; when ZIP_DATASET_PATH is set, a JSON file keyed by zip:
 * `{ "10001": { "city": "New York", "state": "NY", "latitude": 40.75, "longitude": -73.99 } }`
 */
@Injectable()
export class ZipDatasetService implements OnModuleInit {
  private readonly logger = new Logger(ZipDatasetService.name);
  private readonly dataPath: string | null;
  private locations = new Map<string, ZipLocation>();

  constructor(configService: ConfigService<AppEnv, true>) {
    const configured = configService.get('ZIP_DATASET_PATH', { infer: true });
    this.dataPath = configured ? path.resolve(process.cwd(), configured) : null;
  }

  async onModuleInit(): Promise<void> {
    await this.load();
  }

  async load(): Promise<void> {
    if (this.dataPath === null) {
      const { locations, skipped } = loadRegistryLocations();
      if (locations.size === 0) {
        throw new DatasetError('The bundled zip code registry returned no locations');
      }
      if (skipped > 0) {
        this.logger.warn(`Skipped ${skipped} registry entries without usable coordinates`);
      }
      this.locations = locations;
      this.logger.log(`Loaded ${locations.size} zip codes from the bundled registry`);
      return;
    }
    await this.loadFile(this.dataPath);
  }

  private async loadFile(dataPath: string): Promise<void> {
    let fileContent: string;
    try {
      fileContent = await fs.readFile(dataPath, 'utf-8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DatasetError(`Could not read zip dataset at ${dataPath}: ${reason}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fileContent);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DatasetError(`Zip dataset at ${dataPath} is not valid JSON: ${reason}`);
    }

    const parsed = ZipDatasetSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new DatasetError(
        `Zip dataset at ${dataPath} is malformed at "${issue.path.join('.')}": ${issue.message}`,
      );
    }

    this.locations = new Map(
      Object.entries(parsed.data).map(([zipCode, entry]) => [zipCode, { zipCode, ...entry }]),
    );
    this.logger.log(`Loaded ${this.locations.size} zip codes from ${dataPath}`);
  }

  get size(): number {
    return this.locations.size;
  }

  lookup(zipCode: string): ZipLocation | undefined {
    return this.locations.get(zipCode);
  }

  /**
   * Every zip whose great-circle distance from the origin is at most `radiusMiles`.
   * The origin comes first, the rest by distance then zip code.
   *
   * @throws {UnknownZipError} If the origin is not in the dataset
   */
  zipsWithinRadius(originZip: string, radiusMiles: number): LocationCandidate[] {
    const origin = this.locations.get(originZip);
    if (!origin) {
      throw new UnknownZipError(originZip);
    }

    const nearby: LocationCandidate[] = [];
    for (const location of this.locations.values()) {
      if (location.zipCode === originZip) continue;
      const distanceMiles = haversineMiles(origin, location);
      if (distanceMiles <= radiusMiles) {
        nearby.push({ ...location, distanceMiles });
      }
    }

    nearby.sort(
      (a, b) =>
        a.distanceMiles - b.distanceMiles ||
        (a.zipCode < b.zipCode ? -1 : a.zipCode > b.zipCode ? 1 : 0),
    );

    return [{ ...origin, distanceMiles: 0 }, ...nearby];
  }
}
