import * as zipcodes from 'zipcodes';
import { z } from 'zod';
import { ZipLocation } from './interfaces/zipcode.interface';

const RegistryEntrySchema = z.object({
  city: z.string(),
  state: z.string(),
  latitude: z.coerce.number().min(-90).max(90),
  longitude: z.coerce.number().min(-180).max(180),
  country: z.string().optional(),
});

const ZIP_SPACE = 100_000;

/**
 * Every US zip code known to the `zipcodes` package, keyed by zip.
 * Entries without usable coordinates are skipped and counted.
 */
export function loadRegistryLocations(): { locations: Map<string, ZipLocation>; skipped: number } {
  const locations = new Map<string, ZipLocation>();
  let skipped = 0;

  for (let n = 0; n < ZIP_SPACE; n++) {
    const zipCode = String(n).padStart(5, '0');
    const entry = zipcodes.lookup(zipCode);
    if (!entry) continue;

    const parsed = RegistryEntrySchema.safeParse(entry);
    if (!parsed.success || (parsed.data.country && parsed.data.country !== 'US')) {
      skipped++;
      continue;
    }

    const { city, state, latitude, longitude } = parsed.data;
    locations.set(zipCode, { zipCode, city, state, latitude, longitude });
  }

  return { locations, skipped };
}
