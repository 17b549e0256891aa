import type { EventSnapshot, Market, MarketLine, ScorePair } from '../types/snapshot.js';
import {
  CompetitionRecordSchema,
  EventRecordSchema,
  MarketRecordSchema,
  ParticipantRecordSchema,
  RecordTypeSchema,
  type EventRecord,
  type ParticipantRecord,
} from './schemas.js';
import { parseLine, parsePrice, roundToHalf } from '../util/odds.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('inplay');

const MIN_SPREAD = 0.5;
const MAX_SPREAD = 50;

export interface LeagueFilter {
  /** Lowercase substrings; a league must contain one */
  targetLeagues: readonly string[];
  /** Lowercase substrings; a league containing any is dropped */
  blockedLeagues: readonly string[];
}

export function leagueMatches(league: string, filter: LeagueFilter): boolean {
  const name = league.toLowerCase();
  if (filter.blockedLeagues.some(b => name.includes(b))) return false;
  return filter.targetLeagues.some(t => name.includes(t));
}

export function classifyMarket(name: string): Market | null {
  const n = name.toLowerCase();
  if (n.includes('spread') || n.includes('handicap')) return 'spread';
  if (n.includes('total')) return 'total';
  return null;
}

/** "Away @ Home", "Home v Away" or "Home vs Away" */
export function splitTeams(name: string): { homeName: string; awayName: string } | null {
  const at = name.split(' @ ');
  if (at.length === 2) return { awayName: at[0].trim(), homeName: at[1].trim() };
  const vs = name.split(/\s+vs?\.?\s+/i);
  if (vs.length === 2) return { homeName: vs[0].trim(), awayName: vs[1].trim() };
  return null;
}

export function parseScore(raw: string | undefined): ScorePair | undefined {
  if (!raw) return undefined;
  const m = raw.trim().match(/^(\d+)\s*-\s*(\d+)$/);
  if (!m) return undefined;
  return { home: Number(m[1]), away: Number(m[2]) };
}

export function parseQuarter(raw: string | undefined): number {
  if (!raw) return 1;
  const m = raw.match(/(\d+)/);
  if (!m) return 1;
  const q = Number(m[1]);
  return q >= 1 ? q : 1;
}

function pickEventId(ev: EventRecord): string | null {
  for (const id of [ev.C2, ev.C3, ev.ID]) {
    if (id && id !== '0') return id;
  }
  return null;
}

interface PendingMarket {
  market: Market;
  participants: ParticipantRecord[];
}

interface PendingEvent {
  snapshot: EventSnapshot;
  markets: PendingMarket[];
}

function spreadLine(bookmaker: string, m: PendingMarket): MarketLine | null {
  const first = m.participants[0];
  const raw = parseLine(first?.HA);
  if (raw === undefined) return null;
  const line = roundToHalf(Math.abs(raw));
  if (line < MIN_SPREAD || line > MAX_SPREAD) return null;
  return {
    bookmaker,
    market: 'spread',
    line,
    priceHome: parsePrice(m.participants[0]?.OD),
    priceAway: parsePrice(m.participants[1]?.OD),
  };
}

// Over price goes in priceHome, under in priceAway
function totalLine(bookmaker: string, m: PendingMarket): MarketLine | null {
  const line = parseLine(m.participants.find(p => p.HA)?.HA);
  if (line === undefined || line <= 0) return null;
  const over = m.participants.find(p => /^o/i.test(p.HA ?? p.NA ?? ''));
  const under = m.participants.find(p => /^u/i.test(p.HA ?? p.NA ?? ''));
  return {
    bookmaker,
    market: 'total',
    line,
    priceHome: parsePrice((over ?? m.participants[0])?.OD),
    priceAway: parsePrice((under ?? m.participants[1])?.OD),
  };
}

function finishEvent(pending: PendingEvent, bookmaker: string): EventSnapshot {
  const lines: MarketLine[] = [];
  const seen = new Set<Market>();
  for (const m of pending.markets) {
    if (seen.has(m.market)) continue;
    const line = m.market === 'spread' ? spreadLine(bookmaker, m) : totalLine(bookmaker, m);
    if (!line) continue;
    seen.add(m.market);
    lines.push(line);
  }
  return { ...pending.snapshot, lines };
}

function startEvent(ev: EventRecord, league: string, observedAt: number): PendingEvent | null {
  const eventId = pickEventId(ev);
  if (!eventId) {
    log.debug(`EV without an id: ${ev.NA}`);
    return null;
  }
  const teams = splitTeams(ev.NA);
  const quarter = parseQuarter(ev.CP);
  const timeRemaining = (ev.TM ?? 0) * 60 + (ev.TS ?? 0);
  const score = parseScore(ev.SS);
  const snapshot: EventSnapshot = {
    eventId,
    league,
    homeName: teams?.homeName,
    awayName: teams?.awayName,
    quarter,
    timeRemaining,
    clockRunning: ev.TT === undefined ? undefined : ev.TT === 1,
    isFinal: false,
    score,
    finalScores: quarter >= 4 && timeRemaining === 0 ? score : undefined,
    lines: [],
    observedAt,
  };
  return { snapshot, markets: [] };
}

/**
 * Flatten a bet365 in-play payload into one snapshot per target-league event.
 * Records arrive as CT → EV → MA → PA… runs inside each group; the last copy of
 * an event wins when it shows up twice.
 */
export function parseInplay(
  groups: readonly unknown[],
  filter: LeagueFilter,
  bookmaker: string,
  observedAt: number,
): EventSnapshot[] {
  const out = new Map<string, EventSnapshot>();

  for (const group of groups) {
    if (!Array.isArray(group)) continue;
    let league = '';
    let current: PendingEvent | null = null;
    let market: PendingMarket | null = null;

    const flush = () => {
      if (current) out.set(current.snapshot.eventId, finishEvent(current, bookmaker));
      current = null;
      market = null;
    };

    for (const item of group) {
      const typed = RecordTypeSchema.safeParse(item);
      if (!typed.success) continue;

      switch (typed.data.type) {
        case 'CT': {
          flush();
          const ct = CompetitionRecordSchema.safeParse(item);
          league = ct.success ? ct.data.NA : '';
          break;
        }
        case 'EV': {
          flush();
          if (!leagueMatches(league, filter)) break;
          const ev = EventRecordSchema.safeParse(item);
          if (!ev.success) {
            log.debug(`Dropping malformed EV: ${ev.error.issues[0]?.message ?? 'invalid'}`);
            break;
          }
          current = startEvent(ev.data, league, observedAt);
          break;
        }
        case 'MA': {
          market = null;
          if (!current) break;
          const ma = MarketRecordSchema.safeParse(item);
          const kind = ma.success ? classifyMarket(ma.data.NA) : null;
          if (!kind) break;
          const pending: PendingMarket = { market: kind, participants: [] };
          current.markets.push(pending);
          market = pending;
          break;
        }
        case 'PA': {
          if (!market) break;
          const pa = ParticipantRecordSchema.safeParse(item);
          if (pa.success) market.participants.push(pa.data);
          else log.debug('Dropping malformed PA');
          break;
        }
        default:
          break;
      }
    }
    flush();
  }

  return Array.from(out.values());
}
