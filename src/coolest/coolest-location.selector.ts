import { Injectable } from '@nestjs/common';
import { NoDataError } from '../common/errors';
import { WeatherRecord } from '../weather/interfaces/weather.interface';
import { SelectionResult } from './interfaces/coolest.interface';

/**
 * Lower forecast high first; equal highs fall back to the smaller zip code.
 */
export function compareRecords(a: WeatherRecord, b: WeatherRecord): number {
  const byTemperature = a.dailyMaxTemperature - b.dailyMaxTemperature;
  if (byTemperature !== 0) return byTemperature;
  if (a.zipCode === b.zipCode) return 0;
  return a.zipCode < b.zipCode ? -1 : 1;
}

@Injectable()
export class CoolestLocationSelector {
  /**
   * @throws {NoDataError} If no record has a finite temperature
   */
  select(records: Iterable<WeatherRecord>): SelectionResult {
    const usable = [...records].filter((r) => Number.isFinite(r.dailyMaxTemperature));
    if (usable.length === 0) {
      throw new NoDataError();
    }

    let winner = usable[0];
    for (const record of usable) {
      if (compareRecords(record, winner) < 0) {
        winner = record;
      }
    }

    return { winner, ranked: [...usable].sort(compareRecords) };
  }
}
