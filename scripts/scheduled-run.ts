/**
 * Hazard Relay: Scheduled Run Script
 *
 * Performs one relay run and exits. Meant to be triggered by an external
 * scheduler; runs must not overlap because they share the state file.
 *
 * Usage:
 *   npm run relay                  # fetch, compare, announce
 *   npm run relay -- --dry-run     # log what would be sent, touch nothing
 *   npm run relay -- --force       # announce every current alert
 *
 * Cron (every 10 minutes):
 *   *\/10 * * * * cd /path/to/hazard-relay && npm run relay >> /var/log/hazard-relay.log 2>&1
 */

import 'dotenv/config';
import { loadConfig, type ConfigOverrides } from '../src/lib/config';
import { isRelayError } from '../src/lib/errors';
import { errorMessage, logger } from '../src/lib/logger';
import { createSources, SourceChain } from '../src/feeds';
import { FileStateStore } from '../src/state/store';
import { DiscordNotifier } from '../src/delivery/discord';
import { runRelay } from '../src/pipeline/run';

function parseArgs(argv: string[]): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (argv.includes('--dry-run')) overrides.dryRun = true;
  if (argv.includes('--force')) overrides.forceSend = true;
  return overrides;
}

async function scheduledRun(): Promise<number> {
  try {
    const config = loadConfig(process.env, parseArgs(process.argv.slice(2)));

    const chain = new SourceChain(createSources(config));
    const store = new FileStateStore(config.stateFile);
    const notifier = DiscordNotifier.fromConfig(config);

    logger.info('Starting relay run', {
      sources: chain.size,
      stateFile: config.stateFile,
      dryRun: config.dryRun,
      force: config.forceSend,
      webhookConfigured: config.webhookUrl !== undefined,
    });

    const result = await runRelay({ config, chain, store, notifier });

    logger.info('Relay run completed', { ...result });
    return 0;
  } catch (error) {
    logger.error('Relay run failed', {
      code: isRelayError(error) ? error.code : 'UNEXPECTED',
      error: errorMessage(error),
    });
    return 1;
  }
}

scheduledRun().then(code => {
  process.exitCode = code;
});
