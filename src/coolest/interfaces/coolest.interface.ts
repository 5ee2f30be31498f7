import { WeatherRecord } from '../../weather/interfaces/weather.interface';
import { RadiusQuery } from '../../zipcode/interfaces/zipcode.interface';

export interface SelectionResult {
  winner: WeatherRecord;
  /** every usable record, coolest first */
  ranked: WeatherRecord[];
}

export interface CoolestSearchOutcome {
  query: RadiusQuery;
  candidateCount: number;
  selection: SelectionResult;
  originRecord: WeatherRecord | null;
  excludedZips: string[];
}

export interface PresentOptions {
  originZip?: string;
  radiusMiles?: number;
  /** zip codes searched, origin included */
  candidateCount?: number;
  ranked?: boolean;
}
