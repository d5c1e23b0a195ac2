/**
 * Weekly Screen Script
 * Runs the screening pipeline over a JSON file of metric bundles
 *
 * Usage: npx tsx scripts/run_screen.ts [--input <file>] [--output <file>] [--preset <name>]
 */

// Must stay first so LOG_LEVEL and SCREENER_* are set before the logger and config load
import './load_env';
import { readFileSync } from 'fs';
import { resolve } from 'path';
import { loadScreenerConfig } from '../src/core/config';
import { ConfigurationError } from '../src/core/errors';
import { runScreen } from '../src/pipeline/run_screen';
import { formatRunSummary } from '../src/run/summary';
import { checkRunConsistency } from '../src/run/validator';
import { writeRunResult } from '../src/run/writer';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('run_screen');

const DEFAULT_INPUT = 'data/sample/metric_bundles.json';

interface ScreenCliArgs {
  input: string;
  output?: string;
  preset?: string;
}

function readFlag(name: string): string | undefined {
  const eqArg = process.argv.find((arg) => arg.startsWith(`--${name}=`));
  if (eqArg) return eqArg.slice(name.length + 3);
  const index = process.argv.findIndex((arg) => arg === `--${name}`);
  return index >= 0 ? process.argv[index + 1] : undefined;
}

function parseCliArgs(): ScreenCliArgs {
  return {
    input: readFlag('input') ?? DEFAULT_INPUT,
    output: readFlag('output'),
    preset: readFlag('preset'),
  };
}

function readRecords(path: string): unknown[] {
  const parsed: unknown = JSON.parse(readFileSync(resolve(process.cwd(), path), 'utf-8'));
  if (!Array.isArray(parsed)) {
    throw new Error(`${path} must contain a JSON array of metric bundles`);
  }
  return parsed;
}

function main(): number {
  const args = parseCliArgs();

  try {
    const { config, preset } = loadScreenerConfig({ presetName: args.preset });
    const records = readRecords(args.input);
    logger.info({ input: args.input, preset, records: records.length }, 'Starting weekly screen');

    const result = runScreen(records, config);
    const consistency = checkRunConsistency(result, config);

    console.log('\n' + formatRunSummary(result).join('\n'));

    if (args.output) {
      const written = writeRunResult(result, args.output, new Date());
      console.log(`Output:               ${written.filePath}\n`);
    }

    if (!consistency.passed) {
      console.error('Consistency issues:\n' + consistency.issues.map((i) => `  - ${i}`).join('\n'));
      return 1;
    }
    return 0;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error({ issues: error.issues }, 'Invalid screener configuration');
    } else {
      logger.error({ error }, 'Weekly screen failed');
    }
    console.error('Weekly screen failed:', error instanceof Error ? error.message : error);
    return 1;
  }
}

process.exitCode = main();
