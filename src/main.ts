#!/usr/bin/env node
import 'reflect-metadata';
import { INestApplicationContext } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import chalk from 'chalk';
import { AppModule } from './app.module';
import { CliOptions, parseCliArgs, USAGE } from './cli/cli-args';
import { CliService } from './cli/cli.service';
import { EXIT_CODES, exitCodeFor } from './cli/exit-codes';
import { resolveLogLevels } from './config/env.validation';

async function bootstrap(argv: string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`${chalk.red('Error:')} ${message}\n\n${USAGE}`);
    return exitCodeFor(error);
  }

  if (options.help) {
    process.stdout.write(USAGE);
    return EXIT_CODES.OK;
  }

  let app: INestApplicationContext | null = null;
  try {
    app = await NestFactory.createApplicationContext(AppModule, {
      logger: resolveLogLevels(process.env.LOG_LEVEL),
      abortOnError: false,
    });
    // LOG_LEVEL may also come from .env
    app.useLogger(resolveLogLevels(app.get(ConfigService).get<string>('LOG_LEVEL')));

    const cli = app.get(CliService);
    return options.zip
      ? await cli.runOnce(options.zip, options)
      : await cli.runInteractive(options);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`${chalk.red('Error:')} ${message}\n`);
    return exitCodeFor(error);
  } finally {
    await app?.close();
  }
}

bootstrap(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = EXIT_CODES.FAILURE;
  },
);
