import type { CaptureStore, CapturedLine, InsertOutcome, ResultRow } from '../db/store.js';
import type { Market, ScorePair } from '../types/snapshot.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('result');

export const WITHIN_POINTS = [2, 3, 4, 5] as const;

type Stage = 'opener' | 'q1' | 'q2' | 'q3';

function stageOf(line: CapturedLine): Stage {
  if (line.quarter === null) return 'opener';
  return `q${line.quarter}`;
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

/** Final margin against the line magnitude; positive when the margin beat the spread. */
export function spreadDelta(scores: ScorePair, line: number): number {
  return round2(Math.abs(scores.home - scores.away) - Math.abs(line));
}

/** Combined score against the total; positive when the game went over. */
export function totalDelta(scores: ScorePair, line: number): number {
  return round2(scores.home + scores.away - line);
}

export function withinFlags(delta: number | null): Record<typeof WITHIN_POINTS[number], boolean | null> {
  const abs = delta === null ? null : Math.abs(delta);
  return {
    2: abs === null ? null : abs <= 2,
    3: abs === null ? null : abs <= 3,
    4: abs === null ? null : abs <= 4,
    5: abs === null ? null : abs <= 5,
  };
}

/**
 * One line per stage and market: the preferred bookmaker's when it has one,
 * otherwise the first bookmaker by id.
 */
export function pickLines(lines: readonly CapturedLine[], preferredBookmaker: string): Map<string, number> {
  const sorted = [...lines].sort((a, b) => {
    const pa = a.bookmaker_id === preferredBookmaker ? 0 : 1;
    const pb = b.bookmaker_id === preferredBookmaker ? 0 : 1;
    return pa - pb || a.bookmaker_id.localeCompare(b.bookmaker_id);
  });
  const picked = new Map<string, number>();
  for (const l of sorted) {
    const key = `${stageOf(l)}:${l.market}`;
    if (!picked.has(key)) picked.set(key, l.line);
  }
  return picked;
}

export function compileResult(
  eventId: string,
  scores: ScorePair,
  lines: readonly CapturedLine[],
  preferredBookmaker: string,
  compiledAt: Date,
): ResultRow {
  const picked = pickLines(lines, preferredBookmaker);
  const delta = (stage: Stage, market: Market): number | null => {
    const line = picked.get(`${stage}:${market}`);
    if (line === undefined) return null;
    return market === 'spread' ? spreadDelta(scores, line) : totalDelta(scores, line);
  };

  const spread = withinFlags(delta('opener', 'spread'));
  const total = withinFlags(delta('opener', 'total'));

  return {
    event_id: eventId,
    opener_spread_delta: delta('opener', 'spread'),
    opener_total_delta: delta('opener', 'total'),
    q1_spread_delta: delta('q1', 'spread'),
    q1_total_delta: delta('q1', 'total'),
    q2_spread_delta: delta('q2', 'spread'),
    q2_total_delta: delta('q2', 'total'),
    q3_spread_delta: delta('q3', 'spread'),
    q3_total_delta: delta('q3', 'total'),
    within2_spread: spread[2],
    within3_spread: spread[3],
    within4_spread: spread[4],
    within5_spread: spread[5],
    within2_total: total[2],
    within3_total: total[3],
    within4_total: total[4],
    within5_total: total[5],
    compiled_at_utc: compiledAt.toISOString(),
  };
}

export class ResultCompiler {
  private store: CaptureStore;
  private bookmaker: string;

  constructor(store: CaptureStore, preferredBookmaker: string) {
    this.store = store;
    this.bookmaker = preferredBookmaker;
  }

  /** Read the captured lines and write the result row once. Store errors propagate. */
  async compile(eventId: string, scores: ScorePair, now: number): Promise<InsertOutcome> {
    const lines = await this.store.getCapturedLines(eventId);
    const row = compileResult(eventId, scores, lines, this.bookmaker, new Date(now));
    const outcome = await this.store.insertResult(row);
    log.info(
      `RESULT ${eventId} ${scores.home}-${scores.away}: spread Δ=${row.opener_spread_delta ?? '—'} total Δ=${row.opener_total_delta ?? '—'} (${lines.length} lines, ${outcome})`,
    );
    return outcome;
  }
}
