import { describe, it, expect, beforeEach } from 'vitest';
import { EventStateTracker, type Evaluation, type Transition } from '../src/core/event-tracker.js';
import { DEFAULT_THRESHOLDS } from '../config/default.js';
import type { EventStatus } from '../src/types/lifecycle.js';
import { snap } from './helpers/scripted-source.js';

function expectTransition(e: Evaluation): Transition {
  if (e.kind !== 'transition') throw new Error(`expected a transition, got ${e.kind}`);
  return e.transition;
}

function seedAt(tracker: EventStateTracker, eventId: string, status: EventStatus, startTimeMs: number | null = null, now = 0): void {
  tracker.seed({ eventId, status, leagueId: '22821', homeName: 'Hawks (Ace)', awayName: 'Bulls (Nova)', startTimeMs }, now);
}

describe('EventStateTracker', () => {
  let tracker: EventStateTracker;

  beforeEach(() => {
    tracker = new EventStateTracker(DEFAULT_THRESHOLDS);
  });

  describe('opener', () => {
    it('proposes the opener inside the first seconds of Q1', () => {
      const t = expectTransition(tracker.evaluate(snap('e1', 1, 297)));
      expect(t.from).toBe('live_pregame');
      expect(t.to).toBe('live_q1');
      expect(t.capture).toEqual({ kind: 'opener' });
      expect(t.missed).toEqual([]);
    });

    it('proposes the same opener again until it is committed', () => {
      tracker.evaluate(snap('e1', 1, 299));
      const again = expectTransition(tracker.evaluate(snap('e1', 1, 298)));
      expect(again.capture).toEqual({ kind: 'opener' });
      expect(tracker.get('e1')?.status).toBe('live_pregame');
    });

    it('does not fire the opener twice once committed', () => {
      const t = expectTransition(tracker.evaluate(snap('e1', 1, 299, { observedAt: 1000 })));
      expect(tracker.commit(t, 1000)).toBe(true);
      expect(tracker.evaluate(snap('e1', 1, 296, { observedAt: 4000 }))).toEqual({ kind: 'idle', eventId: 'e1' });
    });

    it('fires from a roster-seeded scheduled event', () => {
      seedAt(tracker, 'e1', 'scheduled');
      const t = expectTransition(tracker.evaluate(snap('e1', 1, 300)));
      expect(t.from).toBe('scheduled');
      expect(t.to).toBe('live_q1');
      expect(t.missed).toEqual([]);
    });

    it('waits for lines when the window is open but the market is empty', () => {
      expect(tracker.evaluate(snap('e1', 1, 297, { lines: [] }))).toEqual({
        kind: 'awaiting-lines',
        eventId: 'e1',
        due: 'opener',
      });
    });

    it('ignores a Q1 clock above the quarter length', () => {
      expect(tracker.evaluate(snap('e1', 1, 320))).toEqual({ kind: 'idle', eventId: 'e1' });
      expect(tracker.get('e1')?.status).toBe('live_pregame');
      expect(expectTransition(tracker.evaluate(snap('e1', 1, 297))).capture).toEqual({ kind: 'opener' });
    });

    it('records a missed opener when first seen after the window', () => {
      const t = expectTransition(tracker.evaluate(snap('e1', 1, 290)));
      expect(t.to).toBe('live_q1');
      expect(t.capture).toBeNull();
      expect(t.missed).toEqual(['opener']);

      tracker.commit(t, 5000);
      const anomalies = tracker.openAnomalies();
      expect(anomalies).toHaveLength(1);
      expect(anomalies[0].kind).toBe('missed_capture');
      expect(anomalies[0].detail).toBe('skipped opener (live_pregame → live_q1)');
    });
  });

  describe('quarter end', () => {
    beforeEach(() => seedAt(tracker, 'e1', 'live_q1'));

    it('captures Q1 once the running clock is inside the threshold', () => {
      const t = expectTransition(tracker.evaluate(snap('e1', 1, 8)));
      expect(t.capture).toEqual({ kind: 'quarter', quarter: 1 });
      expect(t.to).toBe('live_q2');
    });

    it('stays idle just outside the threshold', () => {
      expect(tracker.evaluate(snap('e1', 1, 12)).kind).toBe('idle');
    });

    it('needs a running clock unless the quarter has hit zero', () => {
      expect(tracker.evaluate(snap('e1', 1, 8, { clockRunning: false })).kind).toBe('idle');
      const t = expectTransition(tracker.evaluate(snap('e1', 1, 0, { clockRunning: false })));
      expect(t.capture).toEqual({ kind: 'quarter', quarter: 1 });
    });

    it('waits for lines at quarter end', () => {
      expect(tracker.evaluate(snap('e1', 1, 6, { lines: [] }))).toEqual({ kind: 'awaiting-lines', eventId: 'e1', due: 'q1' });
      expect(tracker.get('e1')?.status).toBe('live_q1');
    });

    it('captures Q3 from live_q3 and moves to live_q4', () => {
      seedAt(tracker, 'e3', 'live_q3');
      const t = expectTransition(tracker.evaluate(snap('e3', 3, 4)));
      expect(t.capture).toEqual({ kind: 'quarter', quarter: 3 });
      expect(t.to).toBe('live_q4');
    });
  });

  describe('catch-up', () => {
    it('jumps over quarters the feed skipped and lists their captures as missed', () => {
      seedAt(tracker, 'e1', 'live_q1');
      const t = expectTransition(tracker.evaluate(snap('e1', 3, 120)));
      expect(t.from).toBe('live_q1');
      expect(t.to).toBe('live_q3');
      expect(t.capture).toBeNull();
      expect(t.missed).toEqual(['q1', 'q2']);
    });

    it('still takes the capture that is due in the quarter it lands in', () => {
      seedAt(tracker, 'e1', 'live_q1');
      const t = expectTransition(tracker.evaluate(snap('e1', 2, 5)));
      expect(t.to).toBe('live_q3');
      expect(t.capture).toEqual({ kind: 'quarter', quarter: 2 });
      expect(t.missed).toEqual(['q1']);
    });

    it('applies a pending catch-up even while the due capture has no lines', () => {
      seedAt(tracker, 'e1', 'live_q1');
      const t = expectTransition(tracker.evaluate(snap('e1', 2, 5, { lines: [] })));
      expect(t.to).toBe('live_q2');
      expect(t.capture).toBeNull();
      expect(t.missed).toEqual(['q1']);
    });
  });

  describe('clock consistency', () => {
    beforeEach(() => {
      seedAt(tracker, 'e1', 'live_q2');
      tracker.evaluate(snap('e1', 2, 100));
    });

    it('holds the event when the quarter goes backwards', () => {
      const e = tracker.evaluate(snap('e1', 1, 50));
      expect(e.kind).toBe('anomaly');
      if (e.kind === 'anomaly') {
        expect(e.anomaly.kind).toBe('inconsistent_clock');
        expect(e.anomaly.detail).toBe('quarter went 2 → 1');
      }
      expect(tracker.get('e1')?.lastClock?.quarter).toBe(2);
      expect(tracker.get('e1')?.status).toBe('live_q2');
    });

    it('tolerates small clock jitter within a quarter', () => {
      expect(tracker.evaluate(snap('e1', 2, 103)).kind).toBe('idle');
    });

    it('flags time remaining that rises past the tolerance', () => {
      const e = tracker.evaluate(snap('e1', 2, 104));
      expect(e.kind).toBe('anomaly');
      expect(tracker.get('e1')?.lastClock?.timeRemaining).toBe(100);
    });

    it('clears the anomaly on the next consistent reading', () => {
      tracker.evaluate(snap('e1', 1, 50));
      expect(tracker.openAnomalies()).toHaveLength(1);
      tracker.evaluate(snap('e1', 2, 90));
      expect(tracker.openAnomalies()).toHaveLength(0);
    });
  });

  describe('final', () => {
    beforeEach(() => seedAt(tracker, 'e1', 'live_q4'));

    it('records the final capture at 0:00 of Q4 with scores', () => {
      const t = expectTransition(tracker.evaluate(snap('e1', 4, 0, { finalScores: { home: 55, away: 60 } })));
      expect(t.capture).toEqual({ kind: 'final', scores: { home: 55, away: 60 } });
      expect(t.to).toBe('final');

      tracker.commit(t, 10_000);
      expect(tracker.pendingResults().map(e => e.eventId)).toEqual(['e1']);
      expect(tracker.evaluate(snap('e1', 4, 0))).toEqual({ kind: 'idle', eventId: 'e1' });
    });

    it('also ends on overtime at 0:00', () => {
      const t = expectTransition(tracker.evaluate(snap('e1', 5, 0, { finalScores: { home: 70, away: 68 } })));
      expect(t.to).toBe('final');
    });

    it('waits for scores, then asks for a lookup, then reports a stall', () => {
      expect(tracker.evaluate(snap('e1', 4, 0, { observedAt: 1_000 })).kind).toBe('idle');
      expect(tracker.get('e1')?.finalPendingSince).toBe(1_000);

      expect(tracker.awaitingFinal(30_000)).toEqual([]);
      expect(tracker.awaitingFinal(61_000).map(e => e.eventId)).toEqual(['e1']);

      expect(tracker.detectStalls(300_000)).toEqual([]);
      const stalled = tracker.detectStalls(601_000);
      expect(stalled).toHaveLength(1);
      expect(stalled[0].kind).toBe('stalled_final');
      expect(stalled[0].detail).toBe('still waiting for final scores after 600s');
    });

    it('builds a final observation from a looked-up result', () => {
      tracker.evaluate(snap('e1', 4, 0, { observedAt: 1_000 }));
      const obs = tracker.finalObservation('e1', { home: 48, away: 51 }, 70_000);
      expect(obs).toMatchObject({ eventId: 'e1', quarter: 4, timeRemaining: 0, isFinal: true, finalScores: { home: 48, away: 51 } });

      const t = expectTransition(tracker.evaluate(obs ?? snap('e1', 4, 0)));
      expect(t.capture).toEqual({ kind: 'final', scores: { home: 48, away: 51 } });
    });
  });

  describe('events gone from the feed', () => {
    it('asks for a lookup once the match should be over', () => {
      seedAt(tracker, 'e2', 'live_q2', 0);
      expect(tracker.awaitingFinal(1_259_999)).toEqual([]);
      expect(tracker.awaitingFinal(1_260_000).map(e => e.eventId)).toEqual(['e2']);
    });

    it('waits from the last sighting when that is later', () => {
      seedAt(tracker, 'e2', 'live_q2', 0);
      expect(tracker.evaluate(snap('e2', 2, 100, { observedAt: 1_250_000 })).kind).toBe('idle');
      expect(tracker.awaitingFinal(1_300_000)).toEqual([]);
      expect(tracker.awaitingFinal(1_310_000).map(e => e.eventId)).toEqual(['e2']);
    });

    it('covers a scheduled event that never showed up', () => {
      seedAt(tracker, 'e3', 'scheduled', 0);
      expect(tracker.awaitingFinal(1_260_000).map(e => e.eventId)).toEqual(['e3']);

      const stalled = tracker.detectStalls(1_800_000);
      expect(stalled.map(a => [a.eventId, a.kind])).toEqual([['e3', 'stalled_final']]);
      expect(stalled[0].detail).toBe('still waiting for final scores after 600s');
    });

    it('leaves a scheduled event without a start time alone', () => {
      seedAt(tracker, 'e3', 'scheduled');
      expect(tracker.awaitingFinal(10 * 60 * 60 * 1000)).toEqual([]);
      expect(tracker.detectStalls(10 * 60 * 60 * 1000)).toEqual([]);
    });
  });

  describe('commit', () => {
    it('rejects a transition the event has already moved past', () => {
      const t = expectTransition(tracker.evaluate(snap('e1', 1, 297)));
      expect(tracker.commit(t, 1)).toBe(true);
      expect(tracker.commit(t, 2)).toBe(false);
      expect(tracker.get('e1')?.status).toBe('live_q1');
    });

    it('marks in-play events persisted once committed', () => {
      const t = expectTransition(tracker.evaluate(snap('e1', 1, 297)));
      expect(tracker.get('e1')?.persisted).toBe(false);
      tracker.commit(t, 1);
      expect(tracker.get('e1')?.persisted).toBe(true);
    });
  });

  it('keeps existing state when seeded again', () => {
    seedAt(tracker, 'e1', 'live_q3');
    expect(tracker.seed({ eventId: 'e1', status: 'scheduled', leagueId: null, homeName: 'x', awayName: 'y', startTimeMs: null }, 0)).toBe(false);
    expect(tracker.get('e1')?.status).toBe('live_q3');
  });

  it('sweeps archived events after the grace period', () => {
    seedAt(tracker, 'e1', 'final');
    const ev = tracker.get('e1');
    if (!ev) throw new Error('not seeded');
    ev.finalScores = { home: 50, away: 40 };
    const obs = tracker.finalObservation('e1', ev.finalScores, 0);
    if (!obs) throw new Error('no observation');
    tracker.commit({ eventId: 'e1', from: 'final', to: 'archived', capture: null, missed: [], snapshot: obs }, 0);

    expect(tracker.sweep(29 * 60_000)).toBe(0);
    expect(tracker.sweep(31 * 60_000)).toBe(1);
    expect(tracker.size).toBe(0);
  });

  it('counts events by status', () => {
    seedAt(tracker, 'a', 'scheduled');
    seedAt(tracker, 'b', 'live_q2');
    seedAt(tracker, 'c', 'live_q2');
    const counts = tracker.countByStatus();
    expect(counts.scheduled).toBe(1);
    expect(counts.live_q2).toBe(2);
    expect(counts.final).toBe(0);
  });
});
