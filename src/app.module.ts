import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CliModule } from './cli/cli.module';
import { validateEnv } from './config/env.validation';
import { CoolestModule } from './coolest/coolest.module';
import { WeatherModule } from './weather/weather.module';
import { ZipcodeModule } from './zipcode/zipcode.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    ZipcodeModule,
    WeatherModule,
    CoolestModule,
    CliModule,
  ],
})
export class AppModule {}
