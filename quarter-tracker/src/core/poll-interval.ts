import type { CaptureThresholds, PollIntervalConfig } from '../types/config.js';
import type { ClockReading, TrackedEvent } from './event-tracker.js';
import { liveQuarter } from '../types/lifecycle.js';

export interface EventDeadline {
  eventId: string;
  /** Seconds until the capture moment itself (quarter end, game end, tip-off) */
  boundarySec: number;
  /** Seconds until the capture window opens; 0 when already inside it */
  deadlineSec: number;
}

export interface EventTiming {
  live: boolean;
  /** null while nothing clock-driven is pending (awaiting final scores or a result retry) */
  deadline: EventDeadline | null;
}

export interface PollDecision {
  intervalSec: number;
  /** Event whose deadline set the interval; null for the normal/idle fallback */
  drivenBy: EventDeadline | null;
}

/** Game-clock seconds left, projected forward from the last reading while the clock runs. */
export function extrapolateRemaining(clock: ClockReading, now: number): number {
  if (!clock.clockRunning) return clock.timeRemaining;
  return Math.max(0, clock.timeRemaining - (now - clock.observedAt) / 1000);
}

export function eventTiming(ev: TrackedEvent, now: number, th: CaptureThresholds): EventTiming | null {
  if (ev.status === 'archived') return null;
  if (ev.status === 'final') return { live: true, deadline: null };

  const clock = ev.lastClock;

  if (ev.status === 'scheduled' || ev.status === 'live_pregame') {
    const live = ev.status === 'live_pregame';
    if (clock) {
      const inWindow = clock.quarter === 1 && extrapolateRemaining(clock, now) >= th.quarterLengthSec - th.openerWindowSec;
      return { live, deadline: inWindow ? { eventId: ev.eventId, boundarySec: 0, deadlineSec: 0 } : null };
    }
    if (ev.startTimeMs === null) return { live, deadline: null };
    // Long past its start and still not on the feed: left to the final lookup
    if (now - ev.startTimeMs > th.quarterLengthSec * 1000) return { live, deadline: null };
    const untilStart = Math.max(0, (ev.startTimeMs - now) / 1000);
    return { live, deadline: { eventId: ev.eventId, boundarySec: untilStart, deadlineSec: untilStart } };
  }

  const k = liveQuarter(ev.status);
  if (k === null || !clock) return { live: true, deadline: null };

  // Time to the end of quarter k, even if the feed still shows an earlier quarter
  let boundary = 0;
  if (clock.quarter <= k) {
    boundary = extrapolateRemaining(clock, now) + (k - clock.quarter) * th.quarterLengthSec;
  }

  if (k === 4) {
    // Clock has run out; the final arrives whenever upstream publishes it
    if (boundary <= 0) return { live: true, deadline: null };
    return { live: true, deadline: { eventId: ev.eventId, boundarySec: boundary, deadlineSec: boundary } };
  }

  const deadline = Math.max(0, boundary - th.quarterEndThresholdSec);
  return { live: true, deadline: { eventId: ev.eventId, boundarySec: boundary, deadlineSec: deadline } };
}

/** Step function over seconds-to-boundary, capped so a sleep never overshoots the window opening. */
export function intervalFor(d: EventDeadline, live: boolean, cfg: PollIntervalConfig): number {
  const tier = cfg.tiers.find(t => d.boundarySec <= t.upToSec);
  const base = tier ? tier.intervalSec : live ? cfg.normalIntervalSec : cfg.idleIntervalSec;
  if (d.deadlineSec <= 0) return base;
  return Math.min(base, Math.max(cfg.minIntervalSec, Math.floor(d.deadlineSec)));
}

/**
 * Delay before the next poll: the tightest interval any tracked event asks for,
 * the normal interval while anything is live, the idle interval otherwise.
 */
export function nextPollInterval(
  events: readonly TrackedEvent[],
  now: number,
  th: CaptureThresholds,
  cfg: PollIntervalConfig,
): PollDecision {
  let anyLive = false;
  let best: PollDecision | null = null;

  for (const ev of events) {
    const timing = eventTiming(ev, now, th);
    if (!timing) continue;
    if (timing.live) anyLive = true;
    if (!timing.deadline) continue;
    const interval = intervalFor(timing.deadline, timing.live, cfg);
    if (!best || interval < best.intervalSec) {
      best = { intervalSec: interval, drivenBy: timing.deadline };
    }
  }

  const fallback = anyLive ? cfg.normalIntervalSec : cfg.idleIntervalSec;
  if (best && best.intervalSec <= fallback) return best;
  return { intervalSec: fallback, drivenBy: null };
}
