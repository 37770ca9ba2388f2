#!/usr/bin/env node
/**
 * Run a media query against the local library and print candidates as JSON.
 *
 * Usage:
 *   npm run media:search -- --terms sunset,beach --type photo --from 2024-01-01 --to 2024-12-31
 *   npm run media:search -- --query '{"terms":["sunset"],"media_type":"photo"}'
 */
import * as dotenv from 'dotenv';
import { ConfigManager } from '../lib/config';
import { MediaQuery } from '../lib/media-types';
import { errorMessage } from '../lib/types';
import { createMediaEngine, parseMediaQuery, toWireCandidate } from '../services/media';
import { isLogLevel, logger } from '../utils/logger';

dotenv.config({ path: '.env.local' });
dotenv.config();

export interface SearchArgs {
  query: MediaQuery;
  validate: boolean;
  verbose: boolean;
}

function optionValue(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  if (index === -1) return undefined;
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new Error(`Missing value for ${name}`);
  }
  return value;
}

/**
 * Build a query from either --query <json> or the individual flags
 */
export function parseSearchArgs(args: string[]): SearchArgs {
  const validate = !args.includes('--no-validate');
  const verbose = args.includes('--verbose');

  const json = optionValue(args, '--query');
  if (json !== undefined) {
    let input: unknown;
    try {
      input = JSON.parse(json);
    } catch (error) {
      throw new Error(`--query is not valid JSON: ${errorMessage(error)}`);
    }
    return { query: parseMediaQuery(input), validate, verbose };
  }

  const terms = (optionValue(args, '--terms') ?? '')
    .split(',')
    .map((term) => term.trim())
    .filter((term) => term.length > 0);
  const from = optionValue(args, '--from');
  const to = optionValue(args, '--to');
  if ((from === undefined) !== (to === undefined)) {
    throw new Error('--from and --to must be given together');
  }

  const query = parseMediaQuery({
    terms,
    original_query: optionValue(args, '--text'),
    date_range: from !== undefined && to !== undefined ? { start: from, end: to } : undefined,
    media_type: optionValue(args, '--type'),
    directory: optionValue(args, '--dir'),
  });
  return { query, validate, verbose };
}

function printUsage(): void {
  console.log('Usage: npm run media:search -- [options]');
  console.log('  --query <json>   Parser query object (overrides the flags below)');
  console.log('  --terms <a,b>    Comma-separated search terms');
  console.log('  --text <phrase>  Original query phrase');
  console.log('  --type <kind>    photo | video');
  console.log('  --from <date>    Start of creation date range (ISO-8601)');
  console.log('  --to <date>      End of creation date range (ISO-8601)');
  console.log('  --dir <path>     Restrict to one directory');
  console.log('  --no-validate    Skip post-validation of candidates');
  console.log('  --verbose        Log progress to the console');
}

async function main() {
  const args = process.argv.slice(2);
  if (args.includes('--help')) {
    printUsage();
    return;
  }

  try {
    const { query, validate, verbose } = parseSearchArgs(args);
    // stdout carries the JSON result
    if (!isLogLevel(process.env.MEDIA_RESOLVER_LOG_LEVEL)) {
      logger.setLevel(verbose ? 'debug' : 'warn');
    }

    const config = await ConfigManager.loadMediaResolverConfig();
    const engine = createMediaEngine({
      config: { ...config, validation: { ...config.validation, postValidate: validate && config.validation.postValidate } },
      onBatchComplete: verbose
        ? (progress) => logger.progress(progress.processed, progress.total, 'Resolving assets')
        : undefined,
    });

    const candidates = await engine.findCandidates(query);
    console.log(JSON.stringify(candidates.map(toWireCandidate), null, 2));
  } catch (error) {
    console.error('[media:search] Failed:', errorMessage(error));
    process.exit(1);
  }
}

if (require.main === module) {
  void main();
}

export default main;
