import { Injectable, Logger } from '@nestjs/common';
import chalk from 'chalk';
import * as readline from 'node:readline';
import { CoolestService } from '../coolest/coolest.service';
import { CliOptions } from './cli-args';
import { EXIT_CODES, exitCodeFor } from './exit-codes';

export interface CliIO {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  error: NodeJS.WritableStream;
}

const QUIT_WORDS = new Set(['q', 'quit', 'exit']);

const defaultIO = (): CliIO => ({
  input: process.stdin,
  output: process.stdout,
  error: process.stderr,
});

@Injectable()
export class CliService {
  private readonly logger = new Logger(CliService.name);

  constructor(private readonly coolestService: CoolestService) {}

  /**
   * One lookup for the zip given on the command line. Returns the exit code.
   */
  async runOnce(
    zip: string,
    options: Pick<CliOptions, 'radiusMiles' | 'ranked'>,
    io: CliIO = defaultIO(),
  ): Promise<number> {
    return this.report(zip, options, io);
  }

  /**
   * Prompt loop: each line is a zip code, a blank line or "q" ends it.
   * After an invalid or unknown zip the prompt comes back; any other failure
   * ends the loop and its exit code is returned.
   */
  async runInteractive(
    options: Pick<CliOptions, 'radiusMiles' | 'ranked'>,
    io: CliIO = defaultIO(),
  ): Promise<number> {
    const rl = readline.createInterface({ input: io.input, output: io.output, terminal: false });
    const prompt = (): void => {
      io.output.write('Enter your zip code: ');
    };

    let exitCode: number = EXIT_CODES.OK;
    try {
      prompt();
      for await (const line of rl) {
        const answer = line.trim();
        if (answer === '' || QUIT_WORDS.has(answer.toLowerCase())) {
          break;
        }
        const code = await this.report(answer, options, io);
        this.logger.debug(`Lookup for ${answer} finished with exit code ${code}`);
        if (code !== EXIT_CODES.OK && code !== EXIT_CODES.INPUT) {
          exitCode = code;
          break;
        }
        io.output.write('\n');
        prompt();
      }
    } finally {
      rl.close();
    }

    return exitCode;
  }

  private async report(
    zip: string,
    options: Pick<CliOptions, 'radiusMiles' | 'ranked'>,
    io: CliIO,
  ): Promise<number> {
    try {
      const text = await this.coolestService.describeCoolest(
        zip,
        options.radiusMiles ?? this.coolestService.defaultRadiusMiles,
        { ranked: options.ranked },
      );
      io.output.write(`${text}\n`);
      return EXIT_CODES.OK;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      io.error.write(`${chalk.red('Error:')} ${message}\n`);
      return exitCodeFor(error);
    }
  }
}
