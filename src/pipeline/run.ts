/**
 * Hazard Relay: Relay Run
 *
 * One scheduled invocation: resolve the feed chain, compare with the sent
 * state, announce what is new, persist the next state.
 */

import { nanoid } from 'nanoid';
import type { Alert, SentState } from '../types';
import type { RelayConfig } from '../lib/config';
import { ChainExhausted, NotifyFailure } from '../lib/errors';
import { errorMessage, logger, type Logger } from '../lib/logger';
import type { ChainResolution } from '../feeds/chain';
import { decide, type DecisionKind } from '../dedup/decide';
import type { StateStore } from '../state/store';
import { clearedNotice, fetchFailedNotice, type Notifier } from '../delivery/discord';

// ============================================================
// TYPES
// ============================================================

export interface AlertResolver {
  resolve(): Promise<ChainResolution>;
}

export interface RelayDependencies {
  config: Pick<RelayConfig, 'forceSend' | 'dryRun' | 'regionName'>;
  chain: AlertResolver;
  store: StateStore;
  notifier: Notifier;
}

export interface RunResult {
  runId: string;
  decision: DecisionKind;
  alertsSeen: number;
  notificationsSent: number;
  authoritative: boolean;
  dryRun: boolean;
}

// ============================================================
// HELPERS
// ============================================================

async function reportChainFailure(
  notifier: Notifier,
  regionName: string,
  error: ChainExhausted,
  log: Logger
): Promise<void> {
  try {
    await notifier.notifyText(fetchFailedNotice(regionName, error.message));
  } catch (notifyError) {
    log.error('Could not report feed failure', { error: errorMessage(notifyError) });
  }
}

/**
 * State to keep when a send fails part way: the next ids minus every fresh
 * alert that did not go out, so those are retried on the next run.
 * Only used once at least one alert was sent, so the result is never empty.
 */
function withoutUnsent(next: SentState, unsent: Alert[]): SentState {
  const ids = new Set(next.ids);
  for (const alert of unsent) ids.delete(alert.id);
  return { ...next, ids };
}

// ============================================================
// RUN
// ============================================================

export async function runRelay(deps: RelayDependencies): Promise<RunResult> {
  const { config, chain, store, notifier } = deps;
  const runId = nanoid(10);
  const log = logger.child({ runId });

  let resolution: ChainResolution;
  try {
    resolution = await chain.resolve();
  } catch (error) {
    if (error instanceof ChainExhausted) {
      log.error('Every feed source failed', { failures: error.failures.length, error: error.message });
      if (!config.dryRun) await reportChainFailure(notifier, config.regionName, error, log);
    }
    throw error;
  }

  const current = resolution.alerts;
  const sent = await store.load();
  const decision = decide(current, sent, {
    category: resolution.category,
    authoritative: resolution.authoritative,
    force: config.forceSend,
  });

  log.info('Decision made', {
    decision: decision.kind,
    alerts: current.length,
    previouslySent: sent.ids.size,
    force: config.forceSend,
  });

  const result: RunResult = {
    runId,
    decision: decision.kind,
    alertsSeen: current.length,
    notificationsSent: 0,
    authoritative: resolution.authoritative,
    dryRun: config.dryRun,
  };

  switch (decision.kind) {
    case 'noop':
      log.info('Nothing to announce', { reason: decision.reason });
      return result;

    case 'init-silently':
      if (config.dryRun) {
        log.info('Dry run: would record current alerts without announcing', { alerts: current.length });
        return result;
      }
      await store.save(decision.next);
      log.info('Initialised with current alerts', { alerts: current.length });
      return result;

    case 'announce-cleared': {
      const notice = clearedNotice(config.regionName);
      if (config.dryRun) {
        log.info('Dry run: would announce cleared', { notice });
        return result;
      }
      await notifier.notifyText(notice);
      result.notificationsSent = 1;
      await store.save(decision.next);
      return result;
    }

    case 'announce-new': {
      if (config.dryRun) {
        for (const alert of decision.fresh) {
          log.info('Dry run: would announce', { id: alert.id, headline: alert.headline });
        }
        return result;
      }

      for (const [index, alert] of decision.fresh.entries()) {
        try {
          await notifier.notify(alert);
        } catch (error) {
          if (error instanceof NotifyFailure) {
            const unsent = decision.fresh.slice(index);
            log.error('Announcement failed, keeping unsent alerts for next run', {
              id: alert.id,
              unsent: unsent.length,
              error: error.message,
            });
            // Nothing went out: the stored state already makes every fresh alert new again.
            if (index > 0) await store.save(withoutUnsent(decision.next, unsent));
          }
          throw error;
        }
        result.notificationsSent++;
      }

      await store.save(decision.next);
      log.info('Announcements done', { sent: result.notificationsSent });
      return result;
    }
  }
}
