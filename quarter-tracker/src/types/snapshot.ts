export type Market = 'spread' | 'total';

export const MARKETS: readonly Market[] = ['spread', 'total'];

export interface MarketLine {
  bookmaker: string;
  market: Market;
  /** Spread lines are stored as magnitudes; totals as the combined-score line */
  line: number;
  priceHome?: number;
  priceAway?: number;
}

export interface ScorePair {
  home: number;
  away: number;
}

/** One event as seen by a single poll of the snapshot source. */
export interface EventSnapshot {
  eventId: string;
  league?: string;
  homeName?: string;
  awayName?: string;
  quarter: number;
  /** Game-clock seconds left in the current quarter */
  timeRemaining: number;
  /** Absent when the source does not report it; treated as running */
  clockRunning?: boolean;
  /** Upstream says the match has ended */
  isFinal: boolean;
  score?: ScorePair;
  finalScores?: ScorePair;
  lines: MarketLine[];
  /** Epoch ms at which the poll returned */
  observedAt: number;
}

/** Event metadata supplied by the roster refresh. */
export interface RosterEntry {
  eventId: string;
  leagueId: string | null;
  startTimeUtc: string;
  homeName: string;
  awayName: string;
  status: 'scheduled' | 'live' | 'ended';
}
