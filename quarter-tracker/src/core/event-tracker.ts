import type { CaptureThresholds } from '../types/config.js';
import type { EventSnapshot, ScorePair } from '../types/snapshot.js';
import {
  type EventStatus,
  type CaptureQuarter,
  LIFECYCLE,
  statusRank,
  isAfter,
  laterOf,
  isTerminal,
  quarterStatus,
  liveQuarter,
} from '../types/lifecycle.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('tracker');

const SWEEP_GRACE_MS = 30 * 60 * 1000; // Keep archived events for 30 min

export type DueCapture =
  | { kind: 'opener' }
  | { kind: 'quarter'; quarter: CaptureQuarter }
  | { kind: 'final'; scores: ScorePair };

/** Names a capture point: the opener or the end of Q1-Q3 */
export type CaptureLabel = 'opener' | 'q1' | 'q2' | 'q3';

export function captureLabel(capture: DueCapture): CaptureLabel | 'final' {
  if (capture.kind === 'quarter') return `q${capture.quarter}`;
  return capture.kind;
}

export interface ClockReading {
  quarter: number;
  timeRemaining: number;
  clockRunning: boolean;
  observedAt: number;
}

export interface TrackedEvent {
  eventId: string;
  status: EventStatus;
  leagueId: string | null;
  homeName: string;
  awayName: string;
  /** Scheduled start, epoch ms; null when first seen on the in-play feed */
  startTimeMs: number | null;
  /** Event row is known to exist in the store */
  persisted: boolean;
  /** Last clock reading that passed the regression check */
  lastClock: ClockReading | null;
  lastSeenAt: number | null;
  /** When this process started tracking the event (seeded or first seen) */
  trackedSince: number;
  /** Set once the Q4 clock has run out without final scores */
  finalPendingSince: number | null;
  finalScores: ScorePair | null;
  archivedAt: number | null;
}

export interface Transition {
  eventId: string;
  from: EventStatus;
  to: EventStatus;
  capture: DueCapture | null;
  /** Captures skipped by a catch-up; lost for good */
  missed: CaptureLabel[];
  snapshot: EventSnapshot;
}

export type AnomalyKind = 'inconsistent_clock' | 'stalled_final' | 'missed_capture';

export interface Anomaly {
  eventId: string;
  kind: AnomalyKind;
  detail: string;
  at: number;
}

export type Evaluation =
  | { kind: 'idle'; eventId: string }
  | { kind: 'awaiting-lines'; eventId: string; due: CaptureLabel | 'final' }
  | { kind: 'anomaly'; anomaly: Anomaly }
  | { kind: 'transition'; transition: Transition };

export interface SeedEntry {
  eventId: string;
  status: EventStatus;
  leagueId: string | null;
  homeName: string;
  awayName: string;
  startTimeMs: number | null;
}

/**
 * Owns the lifecycle state of every tracked event.
 *
 * `evaluate` only proposes transitions; nothing moves until `commit` is called with
 * a transition whose captures the store has confirmed. Repeated proposals for the
 * same window are expected and are deduplicated by the store keys.
 */
export class EventStateTracker {
  private events: Map<string, TrackedEvent> = new Map();
  private anomalies: Map<string, Anomaly> = new Map();
  private thresholds: CaptureThresholds;

  constructor(thresholds: CaptureThresholds) {
    this.thresholds = thresholds;
  }

  /** Start tracking an event from the store or roster. An already tracked event keeps its state. */
  seed(entry: SeedEntry, now: number): boolean {
    if (this.events.has(entry.eventId)) return false;
    this.events.set(entry.eventId, {
      eventId: entry.eventId,
      status: entry.status,
      leagueId: entry.leagueId,
      homeName: entry.homeName,
      awayName: entry.awayName,
      startTimeMs: entry.startTimeMs,
      persisted: true,
      lastClock: null,
      lastSeenAt: null,
      trackedSince: now,
      finalPendingSince: null,
      finalScores: null,
      archivedAt: null,
    });
    return true;
  }

  evaluate(snap: EventSnapshot): Evaluation {
    const ev = this.getOrCreate(snap);
    // final events only wait for their result row, which does not depend on the feed
    if (ev.status === 'final' || isTerminal(ev.status)) return { kind: 'idle', eventId: ev.eventId };

    ev.lastSeenAt = snap.observedAt;
    const regression = this.checkClock(ev, snap);
    if (regression) return { kind: 'anomaly', anomaly: regression };
    this.resolve(`${ev.eventId}:inconsistent_clock`);

    ev.lastClock = {
      quarter: snap.quarter,
      timeRemaining: snap.timeRemaining,
      clockRunning: snap.clockRunning ?? true,
      observedAt: snap.observedAt,
    };
    if (!ev.homeName && snap.homeName) ev.homeName = snap.homeName;
    if (!ev.awayName && snap.awayName) ev.awayName = snap.awayName;

    const effective = laterOf(ev.status, this.inferStatus(snap));
    const missed = this.capturesBetween(ev.status, effective);
    const due = this.dueCapture(ev, effective, snap);

    if (due) {
      if (due.capture.kind !== 'final' && snap.lines.length === 0) {
        log.debug(`${ev.eventId}: ${due.capture.kind} due but no lines on this poll`);
        if (effective !== ev.status) return this.transition(ev, effective, null, missed, snap);
        return { kind: 'awaiting-lines', eventId: ev.eventId, due: captureLabel(due.capture) };
      }
      return this.transition(ev, due.next, due.capture, missed, snap);
    }
    if (effective !== ev.status) return this.transition(ev, effective, null, missed, snap);
    return { kind: 'idle', eventId: ev.eventId };
  }

  /**
   * Apply a transition once its captures are durable. Returns false when the event
   * has moved since the transition was proposed.
   */
  commit(t: Transition, now: number): boolean {
    const ev = this.events.get(t.eventId);
    if (!ev || ev.status !== t.from || !isAfter(t.to, t.from)) {
      log.warn(`Stale transition for ${t.eventId}: ${t.from} → ${t.to}`);
      return false;
    }

    ev.status = t.to;
    ev.persisted = true;
    if (t.capture?.kind === 'final') ev.finalScores = t.capture.scores;
    if (t.to !== 'live_q4') ev.finalPendingSince = null;
    if (t.to === 'archived') ev.archivedAt = now;

    if (t.missed.length > 0) {
      this.raise({
        eventId: t.eventId,
        kind: 'missed_capture',
        detail: `skipped ${t.missed.join(', ')} (${t.from} → ${t.to})`,
        at: now,
      });
    }
    return true;
  }

  /** Events whose final scores are recorded but whose result row is not yet confirmed. */
  pendingResults(): TrackedEvent[] {
    return this.getAll().filter(ev => ev.status === 'final' && ev.finalScores !== null);
  }

  /** Events that have waited long enough for the final to be looked up elsewhere. */
  awaitingFinal(now: number): TrackedEvent[] {
    const afterMs = this.thresholds.finalLookupAfterSec * 1000;
    const out: TrackedEvent[] = [];
    for (const ev of this.events.values()) {
      const since = this.waitingSince(ev);
      if (since !== null && now - since >= afterMs) out.push(ev);
    }
    return out;
  }

  /** Flag events whose final never arrived. */
  detectStalls(now: number): Anomaly[] {
    const stallMs = this.thresholds.stallAfterSec * 1000;
    const stalled: Anomaly[] = [];
    for (const ev of this.events.values()) {
      const since = this.waitingSince(ev);
      if (since === null || now - since < stallMs) continue;
      const anomaly: Anomaly = {
        eventId: ev.eventId,
        kind: 'stalled_final',
        detail: `still waiting for final scores after ${Math.round((now - since) / 1000)}s`,
        at: now,
      };
      this.raise(anomaly);
      stalled.push(anomaly);
    }
    return stalled;
  }

  /** Snapshot of an observation the result lookup produced for an event that left the feed. */
  finalObservation(eventId: string, scores: ScorePair, now: number): EventSnapshot | null {
    const ev = this.events.get(eventId);
    if (!ev) return null;
    return {
      eventId,
      quarter: Math.max(4, ev.lastClock?.quarter ?? 4),
      timeRemaining: 0,
      clockRunning: false,
      isFinal: true,
      finalScores: scores,
      score: scores,
      lines: [],
      observedAt: now,
    };
  }

  sweep(now: number): number {
    let swept = 0;
    for (const [id, ev] of this.events) {
      if (ev.archivedAt !== null && now - ev.archivedAt > SWEEP_GRACE_MS) {
        this.events.delete(id);
        for (const key of this.anomalies.keys()) {
          if (key.startsWith(`${id}:`)) this.resolve(key);
        }
        swept++;
      }
    }
    if (swept > 0) log.debug(`Swept ${swept} archived events (remaining: ${this.events.size})`);
    return swept;
  }

  get(eventId: string): TrackedEvent | undefined {
    return this.events.get(eventId);
  }

  getAll(): TrackedEvent[] {
    return Array.from(this.events.values());
  }

  openAnomalies(): Anomaly[] {
    return Array.from(this.anomalies.values());
  }

  countByStatus(): Record<EventStatus, number> {
    const counts: Record<EventStatus, number> = {
      scheduled: 0, live_pregame: 0, live_q1: 0, live_q2: 0,
      live_q3: 0, live_q4: 0, final: 0, archived: 0,
    };
    for (const ev of this.events.values()) counts[ev.status]++;
    return counts;
  }

  get size(): number {
    return this.events.size;
  }

  // ─── internals ───

  private getOrCreate(snap: EventSnapshot): TrackedEvent {
    let ev = this.events.get(snap.eventId);
    if (!ev) {
      // First sighting on the in-play feed: already in progress
      ev = {
        eventId: snap.eventId,
        status: 'live_pregame',
        leagueId: null,
        homeName: snap.homeName ?? '',
        awayName: snap.awayName ?? '',
        startTimeMs: null,
        persisted: false,
        lastClock: null,
        lastSeenAt: null,
        trackedSince: snap.observedAt,
        finalPendingSince: null,
        finalScores: null,
        archivedAt: null,
      };
      this.events.set(snap.eventId, ev);
      log.info(`Tracking ${snap.eventId} (${ev.homeName} vs ${ev.awayName}) from in-play`);
    }
    return ev;
  }

  private checkClock(ev: TrackedEvent, snap: EventSnapshot): Anomaly | null {
    const last = ev.lastClock;
    if (!last) return null;
    let detail: string | null = null;
    if (snap.quarter < last.quarter) {
      detail = `quarter went ${last.quarter} → ${snap.quarter}`;
    } else if (snap.quarter === last.quarter && snap.timeRemaining > last.timeRemaining + this.thresholds.clockToleranceSec) {
      detail = `Q${snap.quarter} clock went ${last.timeRemaining}s → ${snap.timeRemaining}s`;
    }
    if (!detail) return null;
    const anomaly: Anomaly = { eventId: ev.eventId, kind: 'inconsistent_clock', detail, at: snap.observedAt };
    this.raise(anomaly);
    return anomaly;
  }

  private raise(anomaly: Anomaly): void {
    const key = `${anomaly.eventId}:${anomaly.kind}`;
    this.anomalies.set(key, anomaly);
    log.warnOnce(key, `ANOMALY ${anomaly.kind} on ${anomaly.eventId}: ${anomaly.detail}`);
  }

  private resolve(key: string): void {
    if (this.anomalies.delete(key)) log.clearOnce(key);
  }

  /**
   * Moment from which an event counts as waiting for its final: the Q4 clock running
   * out, or else the later of its last sighting on the feed and its start plus the
   * lookup delay. Null while nothing is owed.
   */
  private waitingSince(ev: TrackedEvent): number | null {
    if (ev.status === 'final' || isTerminal(ev.status)) return null;
    if (ev.finalPendingSince !== null) return ev.finalPendingSince;
    const seen = ev.lastSeenAt ?? ev.trackedSince;
    if (ev.startTimeMs === null) return ev.status === 'scheduled' ? null : seen;
    return Math.max(seen, ev.startTimeMs + this.thresholds.finalLookupAfterStartSec * 1000);
  }

  private openerMinRemaining(): number {
    return this.thresholds.quarterLengthSec - this.thresholds.openerWindowSec;
  }

  /** A Q1 reading above the quarter length is malformed and never fires the opener. */
  private inOpenerWindow(t: number): boolean {
    return t >= this.openerMinRemaining() && t <= this.thresholds.quarterLengthSec;
  }

  /** Lifecycle state implied by the clock alone. */
  private inferStatus(snap: EventSnapshot): EventStatus {
    if (snap.isFinal) return laterOf('live_q4', quarterStatus(snap.quarter));
    if (snap.quarter <= 1 && snap.timeRemaining >= this.openerMinRemaining()) return 'live_pregame';
    return quarterStatus(snap.quarter);
  }

  private dueCapture(ev: TrackedEvent, status: EventStatus, snap: EventSnapshot): { capture: DueCapture; next: EventStatus } | null {
    const q = snap.quarter;
    const t = snap.timeRemaining;

    if (status === 'scheduled' || status === 'live_pregame') {
      if (q === 1 && this.inOpenerWindow(t)) return { capture: { kind: 'opener' }, next: 'live_q1' };
      return null;
    }

    const k = liveQuarter(status);
    if (k === null) return null;

    if (k === 1 || k === 2 || k === 3) {
      const running = snap.clockRunning ?? true;
      const inWindow = t === 0 || (t <= this.thresholds.quarterEndThresholdSec && running);
      if (q === k) {
        const quarter: CaptureQuarter = k;
        if (inWindow) return { capture: { kind: 'quarter', quarter }, next: quarterStatus(k + 1) };
      }
      return null;
    }

    const ended = snap.isFinal || (q >= 4 && t === 0);
    if (!ended) return null;
    if (!snap.finalScores) {
      ev.finalPendingSince ??= snap.observedAt;
      return null;
    }
    return { capture: { kind: 'final', scores: snap.finalScores }, next: 'final' };
  }

  /** Captures owned by the states a catch-up jumps over. */
  private capturesBetween(from: EventStatus, to: EventStatus): CaptureLabel[] {
    const missed: CaptureLabel[] = [];
    for (const s of LIFECYCLE.slice(statusRank(from), statusRank(to))) {
      if (s === 'live_pregame') missed.push('opener');
      else if (s === 'live_q1') missed.push('q1');
      else if (s === 'live_q2') missed.push('q2');
      else if (s === 'live_q3') missed.push('q3');
    }
    return missed;
  }

  private transition(
    ev: TrackedEvent,
    to: EventStatus,
    capture: DueCapture | null,
    missed: CaptureLabel[],
    snap: EventSnapshot,
  ): Evaluation {
    return { kind: 'transition', transition: { eventId: ev.eventId, from: ev.status, to, capture, missed, snapshot: snap } };
  }
}
