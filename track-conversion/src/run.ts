#!/usr/bin/env node
/**
 * CLI entrypoint for converting vendor CSV tracks to GPX
 *
 * Usage:
 *   npx tsx src/run.ts
 *   npx tsx src/run.ts --input ./exports --output ./tracks
 *   npx tsx src/run.ts --config ./conversion.json --max-gap 600
 */

import { HELP_TEXT, parseArgs, toConfigOverrides } from './cli.js';
import { resolveConfig } from './config.js';
import { convertDirectory } from './convert.js';
import { ConfigError } from './errors.js';

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    console.log(HELP_TEXT);
    return;
  }

  const config = await resolveConfig({
    configPath: args.config,
    overrides: toConfigOverrides(args),
  });

  console.log('Track Conversion');
  console.log(`Input: ${config.inputDir}`);
  console.log(`Output: ${config.outputDir}`);
  console.log(`Max gap: ${config.maxGapSeconds}s, step: ${config.interpolationStep}s`);
  console.log('');

  await convertDirectory(config);
}

main().catch((error) => {
  if (error instanceof ConfigError) {
    console.error(`Error: ${error.message}`);
    console.error(HELP_TEXT);
  } else {
    console.error('Fatal error:', error);
  }
  process.exit(1);
});
