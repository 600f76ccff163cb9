/**
 * Hazard Relay: Feed Source Base
 *
 * A source pairs a download with a parser. Subclasses supply `parse`;
 * `safeFetch` runs both and reports the outcome as a value, so the chain
 * never needs try/catch to decide whether to fall back.
 */

import type { Alert, FeedKind, SourceDescriptor } from '../types';
import { FetchFailure, ParseFailure } from '../lib/errors';
import { fetchText } from '../lib/http';
import { errorMessage, logger, type Logger } from '../lib/logger';
import { uniqueById } from './normalizer';

export type SourceResult =
  | { ok: true; alerts: Alert[] }
  | { ok: false; error: FetchFailure | ParseFailure };

export interface TransportOptions {
  userAgent: string;
  timeoutMs: number;
}

/**
 * Abstract base class for alert feeds.
 */
export abstract class AlertSource {
  abstract readonly kind: FeedKind;

  readonly name: string;
  readonly url: string;
  readonly priority: number;
  readonly category: string;

  protected readonly logger: Logger;
  private readonly authoritativeOverride?: boolean;

  constructor(
    descriptor: SourceDescriptor,
    protected readonly transport: TransportOptions
  ) {
    this.name = descriptor.name ?? `${descriptor.kind}:${new URL(descriptor.url).hostname}`;
    this.url = descriptor.url;
    this.priority = descriptor.priority;
    this.category = descriptor.category;
    this.authoritativeOverride = descriptor.authoritativeOnEmpty;
    this.logger = logger.child({ source: this.name });
  }

  /**
   * Default for feeds whose descriptor does not say.
   */
  protected abstract readonly authoritativeByDefault: boolean;

  /**
   * Whether an empty list from this feed means "no current alerts".
   */
  get authoritativeOnEmpty(): boolean {
    return this.authoritativeOverride ?? this.authoritativeByDefault;
  }

  /**
   * Accept header sent with the feed request.
   */
  protected get accept(): string {
    return '*/*';
  }

  /**
   * Map the raw document to alerts. Throws ParseFailure on an unrecognizable payload.
   */
  abstract parse(body: string): Alert[];

  /**
   * Download the raw document.
   */
  fetchBody(): Promise<string> {
    return fetchText(this.url, {
      userAgent: this.transport.userAgent,
      timeoutMs: this.transport.timeoutMs,
      accept: this.accept,
    });
  }

  /**
   * Fetch and parse, folding every failure into the result.
   */
  async safeFetch(): Promise<SourceResult> {
    const startTime = Date.now();
    this.logger.debug('Starting fetch', { url: this.url });

    let body: string;
    try {
      body = await this.fetchBody();
    } catch (error) {
      const failure =
        error instanceof FetchFailure
          ? error
          : new FetchFailure(errorMessage(error), this.url, undefined, { cause: error });
      this.logger.warn('Fetch failed', { error: failure.message, durationMs: Date.now() - startTime });
      return { ok: false, error: failure };
    }

    try {
      const alerts = uniqueById(this.parse(body));
      this.logger.info('Fetch completed', {
        alertsFound: alerts.length,
        durationMs: Date.now() - startTime,
      });
      return { ok: true, alerts };
    } catch (error) {
      const failure =
        error instanceof ParseFailure
          ? error
          : new ParseFailure(`Unparseable ${this.kind} payload: ${errorMessage(error)}`, { cause: error });
      this.logger.warn('Parse failed', { error: failure.message });
      return { ok: false, error: failure };
    }
  }
}
