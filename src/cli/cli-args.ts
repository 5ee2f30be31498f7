import { parseArgs } from 'node:util';
import { InvalidInputError } from '../common/errors';
import { validateRadius, validateZip } from '../zipcode/zip-validation';

export interface CliOptions {
  zip?: string;
  radiusMiles?: number;
  ranked: boolean;
  help: boolean;
}

export const USAGE = `Usage: coolest-zip [zip] [options]

Finds the zip code with the lowest forecast high temperature near you.
Without a zip code, asks for one repeatedly until you enter a blank line or "q".

Options:
  -r, --radius <miles>  search radius in miles (default: DEFAULT_RADIUS_MILES or 10)
  -l, --ranked          also list every zip code in range, coolest first
  -h, --help            show this help
`;

/**
 * @throws {InvalidInputError} On unknown flags, extra arguments, a malformed zip or radius
 */
export function parseCliArgs(argv: string[]): CliOptions {
  let values: { radius?: string; ranked?: boolean; help?: boolean };
  let positionals: string[];

  try {
    ({ values, positionals } = parseArgs({
      args: argv,
      options: {
        radius: { type: 'string', short: 'r' },
        ranked: { type: 'boolean', short: 'l' },
        help: { type: 'boolean', short: 'h' },
      },
      allowPositionals: true,
      strict: true,
    }));
  } catch (error) {
    throw new InvalidInputError(error instanceof Error ? error.message : String(error));
  }

  if (positionals.length > 1) {
    throw new InvalidInputError(`Expected one zip code, got: ${positionals.join(' ')}`);
  }

  return {
    zip: positionals.length === 1 ? validateZip(positionals[0]) : undefined,
    radiusMiles: values.radius !== undefined ? validateRadius(values.radius) : undefined,
    ranked: values.ranked ?? false,
    help: values.help ?? false,
  };
}
