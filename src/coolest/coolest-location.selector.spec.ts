import { NoDataError } from '../common/errors';
import { WeatherRecord } from '../weather/interfaces/weather.interface';
import { CoolestLocationSelector, compareRecords } from './coolest-location.selector';

function record(zipCode: string, dailyMaxTemperature: number): WeatherRecord {
  return {
    zipCode,
    dailyMaxTemperature,
    unit: 'fahrenheit',
    date: '2026-10-19',
    currentTemperature: null,
  };
}

describe('CoolestLocationSelector', () => {
  const selector = new CoolestLocationSelector();

  it('should pick the lowest forecast high', () => {
    const result = selector.select([record('10001', 75), record('10002', 68), record('10003', 70)]);

    expect(result.winner.zipCode).toBe('10002');
    expect(result.ranked.map((r) => r.zipCode)).toEqual(['10002', '10003', '10001']);
  });

  it('should break ties by the smaller zip code regardless of input order', () => {
    const tied = [record('10003', 68), record('10001', 70), record('10002', 68)];

    expect(selector.select(tied).winner.zipCode).toBe('10002');
    expect(selector.select([...tied].reverse()).winner.zipCode).toBe('10002');
  });

  it('should handle negative temperatures', () => {
    const result = selector.select([record('99701', -12.5), record('99702', -3)]);

    expect(result.winner.zipCode).toBe('99701');
  });

  it('should ignore records with non-finite temperatures', () => {
    const result = selector.select([record('10001', NaN), record('10002', 68)]);

    expect(result.winner.zipCode).toBe('10002');
    expect(result.ranked).toHaveLength(1);
  });

  it('should throw NoDataError when nothing is usable', () => {
    expect(() => selector.select([])).toThrow(NoDataError);
    expect(() => selector.select([record('10001', Infinity)])).toThrow(NoDataError);
  });

  it('should not reorder the input', () => {
    const records = [record('10001', 75), record('10002', 68)];
    selector.select(records);

    expect(records.map((r) => r.zipCode)).toEqual(['10001', '10002']);
  });

  describe('compareRecords', () => {
    it('should order by temperature, then zip code', () => {
      expect(compareRecords(record('10002', 60), record('10001', 61))).toBeLessThan(0);
      expect(compareRecords(record('10001', 61), record('10002', 61))).toBe(-1);
      expect(compareRecords(record('10002', 61), record('10001', 61))).toBe(1);
      expect(compareRecords(record('10001', 61), record('10001', 61))).toBe(0);
    });
  });
});
