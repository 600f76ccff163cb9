/**
 * Hazard Relay: Source Chain
 *
 * Ordered fallback over alert sources. The first source that answers decides
 * the run's alert set; results are never merged across sources.
 */

import type { Alert } from '../types';
import { ChainExhausted, type SourceFailure } from '../lib/errors';
import { logger } from '../lib/logger';
import type { AlertSource } from './base';

export interface ChainResolution {
  alerts: Alert[];
  /** Category of the answering feed. */
  category: string;
  /** False when the only answer was an empty, non-authoritative scrape. */
  authoritative: boolean;
}

export class SourceChain {
  private readonly sources: AlertSource[];
  private readonly logger = logger.child({ component: 'source-chain' });

  constructor(sources: AlertSource[]) {
    // Array#sort is stable, so equal priorities keep configuration order.
    this.sources = [...sources].sort((a, b) => a.priority - b.priority);
  }

  get size(): number {
    return this.sources.length;
  }

  /**
   * Resolve the current alert set. Throws ChainExhausted only when every source failed.
   */
  async resolve(): Promise<ChainResolution> {
    const failures: SourceFailure[] = [];
    let provisional: ChainResolution | null = null;

    for (const source of this.sources) {
      const result = await source.safeFetch();

      if (!result.ok) {
        failures.push({ source: source.name, error: result.error });
        continue;
      }

      if (result.alerts.length === 0 && !source.authoritativeOnEmpty) {
        this.logger.info('Empty answer from non-authoritative source, trying next', {
          source: source.name,
        });
        provisional ??= { alerts: [], category: source.category, authoritative: false };
        continue;
      }

      this.logger.info('Alert set resolved', {
        source: source.name,
        alerts: result.alerts.length,
        skippedFailures: failures.length,
      });
      return { alerts: result.alerts, category: source.category, authoritative: true };
    }

    if (provisional) {
      this.logger.warn('Only a non-authoritative empty answer was available', {
        failures: failures.length,
      });
      return provisional;
    }

    throw new ChainExhausted(failures);
  }
}
