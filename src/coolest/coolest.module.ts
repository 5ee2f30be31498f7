import { Module } from '@nestjs/common';
import { WeatherModule } from '../weather/weather.module';
import { ZipcodeModule } from '../zipcode/zipcode.module';
import { CoolestLocationSelector } from './coolest-location.selector';
import { CoolestService } from './coolest.service';
import { ResultPresenter } from './result.presenter';

@Module({
  imports: [ZipcodeModule, WeatherModule],
  providers: [CoolestLocationSelector, ResultPresenter, CoolestService],
  exports: [CoolestService],
})
export class CoolestModule {}
