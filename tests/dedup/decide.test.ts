/**
 * Tests for the announce/skip decision
 */

import { describe, it, expect } from 'vitest';
import { decide, type DecisionContext } from '../../src/dedup/decide';
import { EMPTY_SENT_STATE } from '../../src/types';
import { alert, sentState } from '../fixtures/alerts';

const ctx: DecisionContext = { category: 'qld-warnings', authoritative: true };

const sorted = (ids: ReadonlySet<string>) => [...ids].sort();

describe('decide', () => {
  describe('first run', () => {
    it('records current alerts silently', () => {
      const decision = decide([alert('A1', 'Severe Thunderstorm Warning')], EMPTY_SENT_STATE, ctx);

      expect(decision.kind).toBe('init-silently');
      if (decision.kind !== 'init-silently') return;
      expect(sorted(decision.next.ids)).toEqual(['A1']);
      expect(decision.next.clearedAnnounced).toBe(false);
      expect(decision.next.category).toBe('qld-warnings');
    });

    it('does nothing when there are no alerts and nothing was ever sent', () => {
      expect(decide([], EMPTY_SENT_STATE, ctx).kind).toBe('noop');
    });
  });

  describe('unchanged feed', () => {
    it.each([
      [['A1']],
      [['A1', 'A2', 'A3']],
      [['x', 'y']],
    ])('is a noop when current ids equal sent ids (%j)', ids => {
      const decision = decide(ids.map(id => alert(id)), sentState(ids), ctx);
      expect(decision.kind).toBe('noop');
    });

    it('ignores feed order', () => {
      expect(decide([alert('B'), alert('A')], sentState(['A', 'B']), ctx).kind).toBe('noop');
    });
  });

  describe('new alerts', () => {
    it.each([
      [['A1'], ['A1', 'A2'], ['A2']],
      [['A1', 'A2'], ['A1', 'A2', 'A3', 'A4'], ['A3', 'A4']],
      [['z'], ['a', 'z', 'b'], ['a', 'b']],
    ])('announces only the difference (sent %j, current %j)', (sent, current, expected) => {
      const decision = decide(current.map(id => alert(id)), sentState(sent), ctx);

      expect(decision.kind).toBe('announce-new');
      if (decision.kind !== 'announce-new') return;
      expect(decision.fresh.map(a => a.id)).toEqual(expected);
      expect(sorted(decision.next.ids)).toEqual([...current].sort());
    });

    it('replaces the sent set with the current ids', () => {
      const decision = decide([alert('A2'), alert('A3')], sentState(['A1', 'A2']), ctx);

      expect(decision.kind).toBe('announce-new');
      if (decision.kind !== 'announce-new') return;
      expect(decision.fresh.map(a => a.id)).toEqual(['A3']);
      expect(sorted(decision.next.ids)).toEqual(['A2', 'A3']);
    });

    it('replaces the state without announcing when alerts only disappeared', () => {
      const decision = decide([alert('A1')], sentState(['A1', 'A2']), ctx);

      expect(decision.kind).toBe('announce-new');
      if (decision.kind !== 'announce-new') return;
      expect(decision.fresh).toEqual([]);
      expect(sorted(decision.next.ids)).toEqual(['A1']);
    });

    it('announces everything after a cleared notice', () => {
      const decision = decide([alert('A5')], sentState([], { clearedAnnounced: true }), ctx);

      expect(decision.kind).toBe('announce-new');
      if (decision.kind !== 'announce-new') return;
      expect(decision.fresh.map(a => a.id)).toEqual(['A5']);
      expect(decision.next.clearedAnnounced).toBe(false);
    });
  });

  describe('cleared', () => {
    it('announces cleared once, then stays quiet', () => {
      const first = decide([], sentState(['A1']), ctx);

      expect(first.kind).toBe('announce-cleared');
      if (first.kind !== 'announce-cleared') return;
      expect(first.next.ids.size).toBe(0);
      expect(first.next.clearedAnnounced).toBe(true);

      expect(decide([], first.next, ctx).kind).toBe('noop');
    });

    it('accepts legacy state without a category', () => {
      expect(decide([], sentState(['A1'], { category: null }), ctx).kind).toBe('announce-cleared');
    });

    it('does not announce cleared for an empty answer from a different category', () => {
      const decision = decide([], sentState(['A1'], { category: 'cap-alerts' }), ctx);
      expect(decision.kind).toBe('noop');
    });

    it('does not announce cleared for a non-authoritative empty answer', () => {
      const decision = decide([], sentState(['A1']), { ...ctx, authoritative: false });
      expect(decision.kind).toBe('noop');
    });
  });

  describe('force', () => {
    it('announces every current alert, even on the first run', () => {
      const decision = decide([alert('A1'), alert('A2')], EMPTY_SENT_STATE, { ...ctx, force: true });

      expect(decision.kind).toBe('announce-new');
      if (decision.kind !== 'announce-new') return;
      expect(decision.fresh.map(a => a.id)).toEqual(['A1', 'A2']);
    });

    it('announces unchanged alerts again', () => {
      const decision = decide([alert('A1')], sentState(['A1']), { ...ctx, force: true });
      expect(decision.kind).toBe('announce-new');
    });

    it('has no effect on an empty feed', () => {
      expect(decide([], sentState(['A1']), { ...ctx, force: true }).kind).toBe('announce-cleared');
    });
  });
});
