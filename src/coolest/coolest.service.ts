import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NoDataError } from '../common/errors';
import { AppEnv } from '../config/env.validation';
import { WeatherApiConfig, WeatherRecord } from '../weather/interfaces/weather.interface';
import { WeatherNormalizer } from '../weather/weather-normalizer';
import { WEATHER_API_CONFIG } from '../weather/weather.constants';
import { WeatherService } from '../weather/weather.service';
import { ZipRadiusService } from '../zipcode/zip-radius.service';
import { CoolestLocationSelector } from './coolest-location.selector';
import { CoolestSearchOutcome } from './interfaces/coolest.interface';
import { ResultPresenter } from './result.presenter';

@Injectable()
export class CoolestService {
  private readonly logger = new Logger(CoolestService.name);
  readonly defaultRadiusMiles: number;

  constructor(
    private readonly zipRadiusService: ZipRadiusService,
    private readonly weatherService: WeatherService,
    private readonly normalizer: WeatherNormalizer,
    private readonly selector: CoolestLocationSelector,
    private readonly presenter: ResultPresenter,
    @Inject(WEATHER_API_CONFIG) private readonly weatherConfig: WeatherApiConfig,
    configService: ConfigService<AppEnv, true>,
  ) {
    this.defaultRadiusMiles = configService.get('DEFAULT_RADIUS_MILES', { infer: true });
  }

  /**
   * Radius lookup, forecast fetch, normalization and selection for one query.
   * The zip is resolved before any network call, so an unknown zip costs nothing.
   */
  async findCoolest(
    originZip: string,
    radiusMiles: number = this.defaultRadiusMiles,
    today: Date = new Date(),
  ): Promise<CoolestSearchOutcome> {
    const candidates = this.zipRadiusService.resolve(originZip, radiusMiles);
    const query = { originZip: candidates[0].zipCode, radiusMiles };

    const payloads = await this.weatherService.fetch(candidates, {
      ...query,
      date: today.toISOString().split('T')[0],
      unit: this.weatherConfig.temperatureUnit,
    });

    const records: WeatherRecord[] = [];
    const excludedZips: string[] = [];
    for (const candidate of candidates) {
      const record = this.normalizer.normalize(
        candidate.zipCode,
        payloads.get(candidate.zipCode),
        candidate,
      );
      if (record) {
        records.push(record);
      } else {
        excludedZips.push(candidate.zipCode);
      }
    }

    if (excludedZips.length > 0) {
      this.logger.warn(
        `No usable forecast for ${excludedZips.length} zip code(s): ${excludedZips.join(', ')}`,
      );
    }
    if (records.length === 0) {
      throw new NoDataError(
        `None of the ${candidates.length} zip codes within ${radiusMiles} miles of ${query.originZip} returned a usable forecast`,
      );
    }

    const selection = this.selector.select(records);
    this.logger.log(
      `Coolest of ${records.length} zip codes is ${selection.winner.zipCode} at ${selection.winner.dailyMaxTemperature}`,
    );

    return {
      query,
      candidateCount: candidates.length,
      selection,
      originRecord: records.find((r) => r.zipCode === query.originZip) ?? null,
      excludedZips,
    };
  }

  /**
   * findCoolest followed by formatting. Nothing is returned until the whole
   * comparison has succeeded.
   */
  async describeCoolest(
    originZip: string,
    radiusMiles: number = this.defaultRadiusMiles,
    options: { ranked?: boolean } = {},
  ): Promise<string> {
    const outcome = await this.findCoolest(originZip, radiusMiles);
    return this.presenter.present(outcome.selection, {
      originZip: outcome.query.originZip,
      radiusMiles: outcome.query.radiusMiles,
      candidateCount: outcome.candidateCount,
      ranked: options.ranked,
    });
  }
}
