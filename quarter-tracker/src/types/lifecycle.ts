export const LIFECYCLE = [
  'scheduled',
  'live_pregame',
  'live_q1',
  'live_q2',
  'live_q3',
  'live_q4',
  'final',
  'archived',
] as const;

export type EventStatus = typeof LIFECYCLE[number];

/** Quarters whose end produces a quarter_line capture. Q4 produces the result instead. */
export type CaptureQuarter = 1 | 2 | 3;

/** Coarse status reported by the roster collaborator. */
export type RosterStatus = 'scheduled' | 'live' | 'ended';

export function statusRank(status: EventStatus): number {
  return LIFECYCLE.indexOf(status);
}

export function isAfter(a: EventStatus, b: EventStatus): boolean {
  return statusRank(a) > statusRank(b);
}

export function laterOf(a: EventStatus, b: EventStatus): EventStatus {
  return isAfter(b, a) ? b : a;
}

/** Every status strictly earlier than the given one. */
export function statusesBefore(status: EventStatus): EventStatus[] {
  return LIFECYCLE.slice(0, statusRank(status));
}

export function isTerminal(status: EventStatus): boolean {
  return status === 'archived';
}

export function quarterStatus(quarter: number): EventStatus {
  if (quarter <= 1) return 'live_q1';
  if (quarter === 2) return 'live_q2';
  if (quarter === 3) return 'live_q3';
  return 'live_q4';
}

/** The quarter a live_qK status is waiting to see end, or null outside live_q1..live_q4. */
export function liveQuarter(status: EventStatus): number | null {
  switch (status) {
    case 'live_q1': return 1;
    case 'live_q2': return 2;
    case 'live_q3': return 3;
    case 'live_q4': return 4;
    default: return null;
  }
}

/**
 * The roster only says a match has started. `final` is reached through the final
 * capture, which needs scores, so an ended fixture is left live for the tracker
 * or the result lookup to settle.
 */
export function rosterToStatus(status: RosterStatus): EventStatus {
  if (status === 'scheduled') return 'scheduled';
  return 'live_pregame';
}
