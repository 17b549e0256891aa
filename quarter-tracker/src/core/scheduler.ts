import type { CaptureStore, EventRow } from '../db/store.js';
import type { FinalScoreLookup, SnapshotSource } from '../source/snapshot-source.js';
import type { CaptureThresholds, PollIntervalConfig } from '../types/config.js';
import type { EventSnapshot } from '../types/snapshot.js';
import type { CaptureEngine } from './capture-engine.js';
import type { ResultCompiler } from './result-compiler.js';
import { type Anomaly, type EventStateTracker, type Transition, captureLabel } from './event-tracker.js';
import { nextPollInterval, type PollDecision } from './poll-interval.js';
import { createLogger, errorMessage } from '../util/logger.js';

const log = createLogger('scheduler');

export interface SchedulerOptions {
  thresholds: CaptureThresholds;
  polling: PollIntervalConfig;
  rosterReloadIntervalMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface SchedulerDeps {
  tracker: EventStateTracker;
  engine: CaptureEngine;
  compiler: ResultCompiler;
  store: CaptureStore;
  source: SnapshotSource;
  finalLookup?: FinalScoreLookup;
}

export interface CycleReport {
  /** False when the source could not be read; nothing moved this cycle */
  polled: boolean;
  snapshots: number;
  committed: number;
  /** Transitions proposed but held back because a write did not confirm */
  deferred: number;
  awaitingLines: number;
  results: number;
  anomalies: Anomaly[];
  decision: PollDecision;
}

/**
 * The capture loop: poll → evaluate → dispatch → recompute interval → sleep.
 *
 * One cycle runs at a time. A transition is committed to the tracker only after
 * its captures and status write are durable, so a cycle cut short leaves the
 * event where it was and the next poll proposes the same transition again.
 */
export class Scheduler {
  private deps: SchedulerDeps;
  private opts: SchedulerOptions;
  private now: () => number;
  private lastReload = Number.NEGATIVE_INFINITY;
  private lastLookup: Map<string, number> = new Map();
  private stopped = false;
  private wake: (() => void) | null = null;

  constructor(deps: SchedulerDeps, opts: SchedulerOptions) {
    this.deps = deps;
    this.opts = opts;
    this.now = opts.now ?? Date.now;
  }

  async runCycle(): Promise<CycleReport> {
    const { tracker } = this.deps;
    const report: CycleReport = {
      polled: false,
      snapshots: 0,
      committed: 0,
      deferred: 0,
      awaitingLines: 0,
      results: 0,
      anomalies: [],
      decision: { intervalSec: this.opts.polling.normalIntervalSec, drivenBy: null },
    };

    await this.reloadIfDue(this.now());

    let snapshots: EventSnapshot[] | null = null;
    try {
      snapshots = await this.deps.source.poll();
    } catch (err) {
      log.warn('Poll failed, no transitions this cycle', errorMessage(err));
    }

    if (snapshots) {
      report.polled = true;
      snapshots = await this.withLookedUpFinals(snapshots);
      report.snapshots = snapshots.length;

      for (const snap of snapshots) {
        const evaluation = tracker.evaluate(snap);
        switch (evaluation.kind) {
          case 'transition':
            if (await this.dispatch(evaluation.transition)) report.committed++;
            else report.deferred++;
            break;
          case 'awaiting-lines':
            report.awaitingLines++;
            break;
          case 'anomaly':
            report.anomalies.push(evaluation.anomaly);
            break;
          case 'idle':
            break;
        }
      }

      for (const ev of tracker.pendingResults()) {
        if (await this.settle(ev.eventId)) report.results++;
      }
    }

    const now = this.now();
    report.anomalies.push(...tracker.detectStalls(now));
    tracker.sweep(now);
    for (const id of this.lastLookup.keys()) {
      if (!tracker.get(id)) this.lastLookup.delete(id);
    }

    report.decision = nextPollInterval(tracker.getAll(), now, this.opts.thresholds, this.opts.polling);
    return report;
  }

  /** Loop until stop(); returns between cycles, never mid-dispatch. */
  async run(): Promise<void> {
    this.stopped = false;
    while (!this.stopped) {
      let intervalSec = this.opts.polling.normalIntervalSec;
      try {
        const report = await this.runCycle();
        intervalSec = report.decision.intervalSec;
        const driver = report.decision.drivenBy;
        log.debug(
          `Cycle: ${report.snapshots} events, ${report.committed} committed, next poll ${intervalSec}s` +
            (driver ? ` (${driver.eventId}, ${Math.round(driver.boundarySec)}s to boundary)` : ''),
        );
      } catch (err) {
        log.error('Cycle failed', errorMessage(err));
      }
      if (this.stopped) break;
      await this.sleep(intervalSec * 1000);
    }
    log.info('Scheduler stopped');
  }

  stop(): void {
    this.stopped = true;
    this.wake?.();
  }

  // ─── internals ───

  private sleep(ms: number): Promise<void> {
    if (this.opts.sleep) return this.opts.sleep(ms);
    return new Promise(resolve => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }

  private async reloadIfDue(now: number): Promise<void> {
    if (now - this.lastReload < this.opts.rosterReloadIntervalMs) return;
    try {
      const rows = await this.deps.store.listTrackableEvents();
      let added = 0;
      for (const row of rows) {
        const startTimeMs = Date.parse(row.start_time_utc);
        const seeded = this.deps.tracker.seed({
          eventId: row.event_id,
          status: row.status,
          leagueId: row.league_id,
          homeName: row.home_name,
          awayName: row.away_name,
          startTimeMs: Number.isNaN(startTimeMs) ? null : startTimeMs,
        }, now);
        if (seeded) added++;
      }
      this.lastReload = now;
      if (added > 0) log.info(`Seeded ${added} events from the store (tracking ${this.deps.tracker.size})`);
    } catch (err) {
      log.warn('Roster reload failed, keeping current events', errorMessage(err));
    }
  }

  /**
   * Ask the result endpoint about events that ran out their clock, or left the feed
   * well after their start, without final scores. A finished result replaces the
   * feed snapshot.
   */
  private async withLookedUpFinals(snapshots: EventSnapshot[]): Promise<EventSnapshot[]> {
    const lookup = this.deps.finalLookup;
    if (!lookup) return snapshots;

    const now = this.now();
    const retryMs = this.opts.thresholds.finalLookupAfterSec * 1000;
    const byId = new Map(snapshots.map(s => [s.eventId, s]));

    for (const ev of this.deps.tracker.awaitingFinal(now)) {
      const onFeed = byId.get(ev.eventId);
      if (onFeed?.finalScores) continue;
      // Still on the feed with time on the clock
      if (onFeed && ev.finalPendingSince === null) continue;
      const last = this.lastLookup.get(ev.eventId);
      if (last !== undefined && now - last < retryMs) continue;
      this.lastLookup.set(ev.eventId, now);

      try {
        const scores = await lookup.lookupFinal(ev.eventId);
        if (!scores) continue;
        const observation = this.deps.tracker.finalObservation(ev.eventId, scores, now);
        if (observation) {
          log.info(`Final for ${ev.eventId} from result lookup: ${scores.home}-${scores.away}`);
          byId.set(ev.eventId, observation);
        }
      } catch (err) {
        log.warn(`Final lookup ${ev.eventId} failed`, errorMessage(err));
      }
    }
    return Array.from(byId.values());
  }

  private async dispatch(t: Transition): Promise<boolean> {
    const { tracker, engine, store } = this.deps;
    const ev = tracker.get(t.eventId);
    if (!ev) return false;
    const label = t.capture ? captureLabel(t.capture) : null;

    if (!ev.persisted) {
      const row: EventRow = {
        event_id: ev.eventId,
        league_id: ev.leagueId,
        start_time_utc: new Date(ev.startTimeMs ?? t.snapshot.observedAt).toISOString(),
        status: t.from,
        home_name: ev.homeName,
        away_name: ev.awayName,
        final_home: null,
        final_away: null,
      };
      try {
        await store.ensureEvent(row);
      } catch (err) {
        log.warn(`Event row ${t.eventId} not written, holding at ${t.from}`, errorMessage(err));
        return false;
      }
    }

    if (t.capture) {
      if (t.capture.kind === 'final') {
        if (!(await engine.recordFinal(t.eventId, t.capture.scores))) return false;
      } else {
        const summary = await engine.captureLines(t.capture, t.snapshot);
        if (!summary.confirmed) {
          log.warn(`${label} capture for ${t.eventId} not confirmed (${summary.failed} failed), will retry`);
          return false;
        }
        log.info(
          `CAPTURE ${label} ${t.eventId} Q${t.snapshot.quarter} ${t.snapshot.timeRemaining}s: ` +
            `${summary.inserted} inserted, ${summary.exists} already stored`,
        );
      }
    }

    try {
      await store.updateEventStatus(t.eventId, t.to);
    } catch (err) {
      log.warn(`Status write ${t.eventId} → ${t.to} failed, holding at ${t.from}`, errorMessage(err));
      return false;
    }

    const committed = tracker.commit(t, this.now());
    if (committed) log.info(`${t.eventId}: ${t.from} → ${t.to}${label ? ` [${label}]` : ''}`);
    return committed;
  }

  /** Compile the result for a final event and archive it. Retried every cycle until it lands. */
  private async settle(eventId: string): Promise<boolean> {
    const { tracker, compiler, store } = this.deps;
    const ev = tracker.get(eventId);
    if (!ev || ev.status !== 'final' || !ev.finalScores) return false;
    const now = this.now();

    try {
      await compiler.compile(eventId, ev.finalScores, now);
      await store.updateEventStatus(eventId, 'archived');
    } catch (err) {
      log.warn(`Result for ${eventId} not stored, retrying next cycle`, errorMessage(err));
      return false;
    }

    const snapshot = tracker.finalObservation(eventId, ev.finalScores, now);
    if (!snapshot) return false;
    return tracker.commit({ eventId, from: 'final', to: 'archived', capture: null, missed: [], snapshot }, now);
  }
}
