import { HttpService } from '@nestjs/axios';
import { ConfigModule } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import * as path from 'path';
import { CliModule } from '../../src/cli/cli.module';
import { validateEnv } from '../../src/config/env.validation';
import { HttpServiceStub } from './http';

export const FIXTURE_DATASET = path.join(__dirname, '..', 'fixtures', 'zip-locations.json');

const BASE_ENV: Record<string, string> = {
  ZIP_DATASET_PATH: FIXTURE_DATASET,
  WEATHER_API_URL: 'https://weather.test/v1/forecast',
  WEATHER_RETRY_DELAY_MS: '0',
  WEATHER_CACHE_TTL_SECONDS: '0',
};

/**
 * The whole application graph with the weather API replaced by `http`.
 * `env` overrides are visible only while the configuration is validated.
 */
export async function createPipelineModule(
  http: HttpServiceStub,
  env: Record<string, string> = {},
): Promise<TestingModule> {
  const applied = { ...BASE_ENV, ...env };
  const previous = Object.fromEntries(Object.keys(applied).map((key) => [key, process.env[key]]));
  Object.assign(process.env, applied);

  try {
    const moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true, validate: validateEnv }),
        CliModule,
      ],
    })
      .overrideProvider(HttpService)
      .useValue(http)
      .compile();

    moduleRef.useLogger(false);
    await moduleRef.init();
    return moduleRef;
  } finally {
    for (const [key, value] of Object.entries(previous)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  }
}
