import type { EventStatus, CaptureQuarter } from '../types/lifecycle.js';
import type { Market, ScorePair } from '../types/snapshot.js';

export interface EventRow {
  event_id: string;
  league_id: string | null;
  start_time_utc: string;
  status: EventStatus;
  home_name: string;
  away_name: string;
  final_home: number | null;
  final_away: number | null;
}

export interface OpenerRow {
  event_id: string;
  bookmaker_id: string;
  market: Market;
  line: number;
  price_home: number | null;
  price_away: number | null;
  opened_at_utc: string;
}

export interface QuarterLineRow {
  event_id: string;
  bookmaker_id: string;
  market: Market;
  quarter: CaptureQuarter;
  line: number;
  price_home: number | null;
  price_away: number | null;
  captured_at_utc: string;
  game_time_remaining: number | null;
  home_score: number | null;
  away_score: number | null;
}

export interface ResultRow {
  event_id: string;
  opener_spread_delta: number | null;
  opener_total_delta: number | null;
  q1_spread_delta: number | null;
  q1_total_delta: number | null;
  q2_spread_delta: number | null;
  q2_total_delta: number | null;
  q3_spread_delta: number | null;
  q3_total_delta: number | null;
  within2_spread: boolean | null;
  within3_spread: boolean | null;
  within4_spread: boolean | null;
  within5_spread: boolean | null;
  within2_total: boolean | null;
  within3_total: boolean | null;
  within4_total: boolean | null;
  within5_total: boolean | null;
  compiled_at_utc: string;
}

/** A captured line as read back for result compilation. `quarter` is null for the opener. */
export interface CapturedLine {
  bookmaker_id: string;
  market: Market;
  quarter: CaptureQuarter | null;
  line: number;
}

/** Insert-if-absent outcome. A key conflict is `exists`, never an error. */
export type InsertOutcome = 'inserted' | 'exists';

export interface TableCounts {
  events: number;
  openers: number;
  quarterLines: number;
  results: number;
}

/**
 * Read/write contract the scheduler and roster refresh depend on.
 * Every method rejects with StoreUnavailableError when the store cannot be reached.
 */
export interface CaptureStore {
  /** Roster upsert: insert if absent, refresh metadata, and move status only while it is still `scheduled`. */
  upsertRosterEvent(row: EventRow): Promise<void>;
  /** Insert an event first seen on the in-play feed; leaves an existing row untouched. */
  ensureEvent(row: EventRow): Promise<InsertOutcome>;
  /** Write a tracker status; never moves a stored status backwards. */
  updateEventStatus(eventId: string, status: EventStatus): Promise<void>;
  recordFinalScores(eventId: string, scores: ScorePair): Promise<void>;
  insertOpener(row: OpenerRow): Promise<InsertOutcome>;
  insertQuarterLine(row: QuarterLineRow): Promise<InsertOutcome>;
  insertResult(row: ResultRow): Promise<InsertOutcome>;
  getCapturedLines(eventId: string): Promise<CapturedLine[]>;
  /** Events whose status is neither `final` nor `archived`. */
  listTrackableEvents(): Promise<EventRow[]>;
  getCounts(): Promise<TableCounts>;
}
