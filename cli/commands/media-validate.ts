#!/usr/bin/env node
/**
 * Validate stored media references, recovering moved files where possible.
 *
 * Usage: npm run media:validate -- <uri> [<uri> ...] [--no-recover] [--verbose]
 */
import * as dotenv from 'dotenv';
import { ConfigManager } from '../lib/config';
import { errorMessage } from '../lib/types';
import { createMediaEngine } from '../services/media';
import { isLogLevel, logger } from '../utils/logger';

dotenv.config({ path: '.env.local' });
dotenv.config();

async function main() {
  const args = process.argv.slice(2);
  const uris = args.filter((arg) => !arg.startsWith('--'));
  const recover = !args.includes('--no-recover');
  const verbose = args.includes('--verbose');

  if (uris.length === 0 || args.includes('--help')) {
    console.log('Usage: npm run media:validate -- <uri> [<uri> ...] [--no-recover] [--verbose]');
    if (uris.length === 0 && !args.includes('--help')) process.exit(1);
    return;
  }

  if (!isLogLevel(process.env.MEDIA_RESOLVER_LOG_LEVEL)) {
    logger.setLevel(verbose ? 'debug' : 'warn');
  }

  try {
    const config = await ConfigManager.loadMediaResolverConfig();
    const engine = createMediaEngine({
      config: { ...config, validation: { ...config.validation, enableRecovery: recover && config.validation.enableRecovery } },
    });

    const batch = await engine.validateAll(uris.map((uri) => ({ uri })));
    console.log(JSON.stringify(batch, null, 2));
    logger.info(
      `Validated ${batch.totalItems}: ${batch.validItems} valid, ${batch.recoveredItems} recovered, ` +
        `${batch.failedItems} failed (${(batch.successRate * 100).toFixed(1)}%)`
    );
  } catch (error) {
    console.error('[media:validate] Failed:', errorMessage(error));
    process.exit(1);
  }
}

if (require.main === module) {
  void main();
}

export default main;
