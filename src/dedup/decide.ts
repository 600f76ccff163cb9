/**
 * Hazard Relay: Deduplication
 *
 * Pure decision step. Given the alerts a run resolved and the persisted sent
 * state, says what to announce and what the next sent state is. Policy after
 * a change is full replace: the next state holds exactly the current ids.
 */

import type { Alert, SentState } from '../types';
import { isFirstRun } from '../types';
import { alertIds } from '../feeds/normalizer';

export interface DecisionContext {
  /** Category of the feed that answered this run. */
  category: string;
  /** Whether an empty answer can be trusted to mean "no alerts". */
  authoritative: boolean;
  /** Announce every current alert regardless of state. */
  force?: boolean;
}

export type Decision =
  | { kind: 'init-silently'; next: SentState }
  | { kind: 'noop'; reason: string }
  | { kind: 'announce-cleared'; next: SentState }
  | { kind: 'announce-new'; fresh: Alert[]; next: SentState };

export type DecisionKind = Decision['kind'];

function sameIds(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  if (a.size !== b.size) return false;
  for (const id of a) {
    if (!b.has(id)) return false;
  }
  return true;
}

function stateOf(alerts: Alert[], category: string): SentState {
  return { ids: alertIds(alerts), clearedAnnounced: false, category };
}

export function decide(current: Alert[], sent: SentState, context: DecisionContext): Decision {
  if (context.force && current.length > 0) {
    return { kind: 'announce-new', fresh: current, next: stateOf(current, context.category) };
  }

  if (current.length === 0) {
    if (sent.clearedAnnounced) {
      return { kind: 'noop', reason: 'cleared notice already sent' };
    }
    if (sent.ids.size === 0) {
      return { kind: 'noop', reason: 'no alerts now or before' };
    }
    if (!context.authoritative) {
      return { kind: 'noop', reason: 'empty answer is not authoritative' };
    }
    if (sent.category !== null && sent.category !== context.category) {
      return { kind: 'noop', reason: `empty answer is for category ${context.category}, state is ${sent.category}` };
    }
    return {
      kind: 'announce-cleared',
      next: { ids: new Set(), clearedAnnounced: true, category: context.category },
    };
  }

  if (isFirstRun(sent)) {
    return { kind: 'init-silently', next: stateOf(current, context.category) };
  }

  const next = stateOf(current, context.category);

  if (!sent.clearedAnnounced && sameIds(next.ids, sent.ids)) {
    return { kind: 'noop', reason: 'alert set unchanged' };
  }

  const fresh = current.filter(alert => !sent.ids.has(alert.id));
  return { kind: 'announce-new', fresh, next };
}
