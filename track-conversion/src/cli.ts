/**
 * Command-line argument handling for the converter
 */

import type { ConversionConfig } from '../schemas/index.js';
import { ConfigError } from './errors.js';

export interface CliArgs {
  input?: string;
  output?: string;
  maxGap?: number;
  step?: number;
  config?: string;
  help: boolean;
}

export const HELP_TEXT = `
Track Conversion CLI

Converts Variflight and Footprint CSV exports into GPX tracks.

Usage:
  npx tsx src/run.ts [options]

Options:
  --input <dir>        Directory with CSV files (default: input)
  --output <dir>       Directory for GPX files (default: output)
  --max-gap <seconds>  Gap that starts a new track segment (default: 300)
  --step <seconds>     Interpolation step, at least 1 (default: 1)
  --config <path>      JSON file with any of: inputDir, outputDir,
                       maxGapSeconds, interpolationStep, creator
  --help               Show this help message

Examples:
  npx tsx src/run.ts
  npx tsx src/run.ts --input ~/exports --output ~/tracks --max-gap 600
`;

/**
 * Parse CLI arguments
 *
 * Numeric flags are passed through as numbers (NaN when not numeric) and
 * validated together with the rest of the settings.
 *
 * @throws ConfigError on an unknown flag or a flag without its value
 */
export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = { help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--help') {
      result.help = true;
      continue;
    }

    const value = args[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigError(
        arg.startsWith('--') ? `Missing value for ${arg}` : `Unexpected argument: ${arg}`
      );
    }

    switch (arg) {
      case '--input':
        result.input = value;
        break;
      case '--output':
        result.output = value;
        break;
      case '--max-gap':
        result.maxGap = Number(value);
        break;
      case '--step':
        result.step = Number(value);
        break;
      case '--config':
        result.config = value;
        break;
      default:
        throw new ConfigError(`Unknown option: ${arg}`);
    }
    i++;
  }

  return result;
}

/**
 * Settings given on the command line, to be layered over the config file
 */
export function toConfigOverrides(args: CliArgs): Partial<ConversionConfig> {
  return {
    inputDir: args.input,
    outputDir: args.output,
    maxGapSeconds: args.maxGap,
    interpolationStep: args.step,
  };
}
