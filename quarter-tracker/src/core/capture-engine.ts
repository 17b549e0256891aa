import type { CaptureStore, InsertOutcome } from '../db/store.js';
import type { CaptureQuarter } from '../types/lifecycle.js';
import type { EventSnapshot, Market, MarketLine, ScorePair } from '../types/snapshot.js';
import type { DueCapture } from './event-tracker.js';
import { createLogger, errorMessage } from '../util/logger.js';

const log = createLogger('capture');

export type CaptureOutcome = InsertOutcome | 'failed';

export interface CaptureRequest {
  eventId: string;
  kind: 'opener' | 'quarter';
  /** Required for quarter captures */
  quarter?: CaptureQuarter;
  market: Market;
  bookmaker: string;
  line: number;
  priceHome?: number;
  priceAway?: number;
  /** Epoch ms */
  timestamp: number;
  /** Game-clock context stored with quarter lines */
  timeRemaining?: number;
  score?: ScorePair;
}

export interface CaptureSummary {
  inserted: number;
  exists: number;
  failed: number;
  /** Every line is durable (newly inserted or already present) */
  confirmed: boolean;
}

/** Keeps the first line per (bookmaker, market); the store key allows no more. */
export function uniqueLines(lines: readonly MarketLine[]): MarketLine[] {
  const seen = new Set<string>();
  const out: MarketLine[] = [];
  for (const l of lines) {
    const key = `${l.bookmaker}:${l.market}`;
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(l);
  }
  return out;
}

export class CaptureEngine {
  private store: CaptureStore;

  constructor(store: CaptureStore) {
    this.store = store;
  }

  /** Insert-if-absent for one captured line. Store failures are reported, not thrown. */
  async capture(req: CaptureRequest): Promise<CaptureOutcome> {
    const ts = new Date(req.timestamp).toISOString();
    try {
      if (req.kind === 'opener') {
        return await this.store.insertOpener({
          event_id: req.eventId,
          bookmaker_id: req.bookmaker,
          market: req.market,
          line: req.line,
          price_home: req.priceHome ?? null,
          price_away: req.priceAway ?? null,
          opened_at_utc: ts,
        });
      }
      if (req.quarter === undefined) throw new Error('quarter capture without a quarter');
      return await this.store.insertQuarterLine({
        event_id: req.eventId,
        bookmaker_id: req.bookmaker,
        market: req.market,
        quarter: req.quarter,
        line: req.line,
        price_home: req.priceHome ?? null,
        price_away: req.priceAway ?? null,
        captured_at_utc: ts,
        game_time_remaining: req.timeRemaining ?? null,
        home_score: req.score?.home ?? null,
        away_score: req.score?.away ?? null,
      });
    } catch (err) {
      log.error(`${req.kind} capture ${req.eventId}/${req.bookmaker}/${req.market} failed`, errorMessage(err));
      return 'failed';
    }
  }

  /** Capture every line of a snapshot for an opener or quarter-end transition. */
  async captureLines(due: Exclude<DueCapture, { kind: 'final' }>, snap: EventSnapshot): Promise<CaptureSummary> {
    const summary: CaptureSummary = { inserted: 0, exists: 0, failed: 0, confirmed: false };
    const lines = uniqueLines(snap.lines);

    for (const l of lines) {
      const outcome = await this.capture({
        eventId: snap.eventId,
        kind: due.kind,
        quarter: due.kind === 'quarter' ? due.quarter : undefined,
        market: l.market,
        bookmaker: l.bookmaker,
        line: l.line,
        priceHome: l.priceHome,
        priceAway: l.priceAway,
        timestamp: snap.observedAt,
        timeRemaining: snap.timeRemaining,
        score: snap.score,
      });
      summary[outcome]++;
    }

    summary.confirmed = lines.length > 0 && summary.failed === 0;
    return summary;
  }

  /** The final capture: final scores onto the event row. */
  async recordFinal(eventId: string, scores: ScorePair): Promise<boolean> {
    try {
      await this.store.recordFinalScores(eventId, scores);
      return true;
    } catch (err) {
      log.error(`final capture ${eventId} failed`, errorMessage(err));
      return false;
    }
  }
}
