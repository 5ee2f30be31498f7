import { Injectable } from '@nestjs/common';
import { TemperatureUnit, WeatherRecord } from '../weather/interfaces/weather.interface';
import { PresentOptions, SelectionResult } from './interfaces/coolest.interface';

const UNIT_SUFFIX: Record<TemperatureUnit, string> = {
  fahrenheit: '°F',
  celsius: '°C',
};

/**
 * One decimal place, without a trailing ".0"
 */
export function formatTemperature(value: number, unit: TemperatureUnit): string {
  const rounded = Math.round(value * 10) / 10;
  return `${Object.is(rounded, -0) ? 0 : rounded}${UNIT_SUFFIX[unit]}`;
}

function placeName(record: WeatherRecord): string | null {
  if (record.city && record.state) return `${record.city}, ${record.state}`;
  return record.city ?? record.state ?? null;
}

@Injectable()
export class ResultPresenter {
  present(result: SelectionResult, options: PresentOptions = {}): string {
    const { winner, ranked } = result;
    const { originZip, radiusMiles, candidateCount } = options;
    const lines: string[] = [];

    if (candidateCount !== undefined && radiusMiles !== undefined) {
      const counted =
        candidateCount === 1 ? 'There is 1 zip code' : `There are ${candidateCount} zip codes`;
      lines.push(
        `${counted} within a ${radiusMiles} mile radius${originZip !== undefined ? ` of ${originZip}` : ''}.`,
      );
    }

    const scope =
      originZip !== undefined && radiusMiles !== undefined
        ? ` within ${radiusMiles} miles of ${originZip}`
        : '';
    const place = placeName(winner);
    lines.push(
      `Coolest zip code${scope}: ${winner.zipCode}${place ? ` (${place})` : ''} ` +
        `with a forecast high of ${formatTemperature(winner.dailyMaxTemperature, winner.unit)} on ${winner.date}.`,
    );

    if (originZip !== undefined) {
      lines.push(this.describeOrigin(originZip, radiusMiles, winner, ranked));
    }

    if (winner.currentTemperature !== null) {
      lines.push(
        `Current temperature in ${winner.zipCode}: ${formatTemperature(winner.currentTemperature, winner.unit)}.`,
      );
    }

    if (options.ranked) {
      lines.push('', 'Ranked by forecast high:');
      ranked.forEach((record, index) => {
        const name = placeName(record);
        lines.push(
          `${index + 1}. ${record.zipCode}  ${formatTemperature(record.dailyMaxTemperature, record.unit)}` +
            (name ? `  ${name}` : ''),
        );
      });
    }

    return lines.join('\n');
  }

  private describeOrigin(
    originZip: string,
    radiusMiles: number | undefined,
    winner: WeatherRecord,
    ranked: WeatherRecord[],
  ): string {
    if (originZip === winner.zipCode) {
      return radiusMiles !== undefined
        ? `Your zip code is expected to be the coolest in the surrounding ${radiusMiles}-mile radius.`
        : 'Your zip code is expected to be the coolest nearby.';
    }

    const origin = ranked.find((r) => r.zipCode === originZip);
    if (!origin) {
      return `No usable forecast was returned for your zip code ${originZip}.`;
    }

    const high = formatTemperature(origin.dailyMaxTemperature, origin.unit);
    const difference = Math.round((origin.dailyMaxTemperature - winner.dailyMaxTemperature) * 10) / 10;
    if (difference === 0) {
      return `Your zip code ${originZip} is forecast to reach the same high of ${high}.`;
    }
    return `Your zip code ${originZip} is forecast to reach ${high}, ${formatTemperature(difference, origin.unit)} warmer.`;
  }
}
