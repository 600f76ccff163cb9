/**
 * Hazard Relay: Errors
 *
 * Every failure the relay can report carries a stable code so the entry
 * script and the logs can tell them apart without string matching.
 */

export type RelayErrorCode =
  | 'FETCH_FAILED'
  | 'PARSE_FAILED'
  | 'STATE_CORRUPT'
  | 'CHAIN_EXHAUSTED'
  | 'NOTIFY_FAILED'
  | 'CONFIG_INVALID';

export abstract class RelayError extends Error {
  abstract readonly code: RelayErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Network or HTTP error while downloading a feed.
 */
export class FetchFailure extends RelayError {
  readonly code = 'FETCH_FAILED' as const;

  constructor(
    message: string,
    readonly url: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Payload downloaded but not recognizable as the expected format.
 */
export class ParseFailure extends RelayError {
  readonly code = 'PARSE_FAILED' as const;
}

/**
 * Persisted record unreadable. Never leaves the state store.
 */
export class StateCorruption extends RelayError {
  readonly code = 'STATE_CORRUPT' as const;

  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export interface SourceFailure {
  source: string;
  error: FetchFailure | ParseFailure;
}

export class ChainExhausted extends RelayError {
  readonly code = 'CHAIN_EXHAUSTED' as const;

  constructor(readonly failures: SourceFailure[]) {
    super(
      failures.length === 0
        ? 'No feed sources configured'
        : `All feed sources failed: ${failures.map(f => `${f.source} (${f.error.message})`).join('; ')}`
    );
  }
}

export class NotifyFailure extends RelayError {
  readonly code = 'NOTIFY_FAILED' as const;

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ConfigError extends RelayError {
  readonly code = 'CONFIG_INVALID' as const;

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

export function isRelayError(error: unknown): error is RelayError {
  return error instanceof RelayError;
}
