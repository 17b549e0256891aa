import type { SourceConfig } from '../types/config.js';
import type { EventSnapshot, RosterEntry, ScorePair } from '../types/snapshot.js';
import type { FinalScoreLookup, RosterSource, SnapshotSource } from './snapshot-source.js';
import { EnvelopeSchema, ResultEventSchema, UpcomingEventSchema, type UpcomingEvent } from './schemas.js';
import { parseInplay, parseScore, leagueMatches, type LeagueFilter } from './inplay-parser.js';
import { SourceUnavailableError } from '../util/errors.js';
import { createLogger, errorMessage } from '../util/logger.js';

const log = createLogger('betsapi');

// BetsAPI time_status codes
const ROSTER_STATUS: Record<string, RosterEntry['status']> = {
  '0': 'scheduled',
  '1': 'live',
  '2': 'scheduled',
  '3': 'ended',
};

export function toRosterEntry(ev: UpcomingEvent): RosterEntry | null {
  const status = ROSTER_STATUS[ev.time_status ?? '0'];
  if (!status) return null;
  return {
    eventId: ev.id,
    leagueId: ev.league.id ?? null,
    startTimeUtc: new Date(ev.time * 1000).toISOString(),
    homeName: ev.home.name,
    awayName: ev.away.name,
    status,
  };
}

/** Final score from a finished-match result; null while it is not finished. */
export function finalFromResult(raw: unknown): ScorePair | null {
  const parsed = ResultEventSchema.safeParse(raw);
  if (!parsed.success) return null;
  const r = parsed.data;
  if (r.time_status !== '3') return null;
  const ft = r.scores;
  if (ft?.ft_home !== undefined && ft.ft_away !== undefined) return { home: ft.ft_home, away: ft.ft_away };
  return parseScore(r.SS ?? r.ss ?? undefined) ?? null;
}

/** bet365 endpoints of BetsAPI: in-play snapshots, upcoming fixtures and finished results. */
export class BetsApiClient implements SnapshotSource, FinalScoreLookup, RosterSource {
  private config: SourceConfig;
  private bookmaker: string;
  private filter: LeagueFilter;
  private fetchImpl: typeof fetch;
  private now: () => number;

  constructor(config: SourceConfig, bookmaker: string, opts: { fetchImpl?: typeof fetch; now?: () => number } = {}) {
    this.config = config;
    this.bookmaker = bookmaker;
    this.filter = {
      targetLeagues: config.targetLeagues.map(l => l.toLowerCase()),
      blockedLeagues: config.blockedLeagues.map(l => l.toLowerCase()),
    };
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.now = opts.now ?? Date.now;
  }

  async poll(): Promise<EventSnapshot[]> {
    const results = await this.get('/v1/bet365/inplay', {});
    const snapshots = parseInplay(results, this.filter, this.bookmaker, this.now());
    log.debug(`In-play: ${results.length} groups → ${snapshots.length} target events`);
    return snapshots;
  }

  async lookupFinal(eventId: string): Promise<ScorePair | null> {
    const results = await this.get('/v1/bet365/result', { FI: eventId });
    return results.length > 0 ? finalFromResult(results[0]) : null;
  }

  /** Upcoming fixtures in the target leagues, pages 1..N. A failed page ends the walk. */
  async listFixtures(): Promise<RosterEntry[]> {
    const seen = new Map<string, RosterEntry>();
    for (let page = 1; page <= this.config.upcomingPages; page++) {
      let results: unknown[];
      try {
        results = await this.get('/v1/bet365/upcoming', { sport_id: String(this.config.sportId), page: String(page) });
      } catch (err) {
        if (page === 1) throw err;
        log.warn(`Upcoming page ${page} failed, keeping ${seen.size} fixtures`, errorMessage(err));
        break;
      }
      if (results.length === 0) break;

      for (const raw of results) {
        const parsed = UpcomingEventSchema.safeParse(raw);
        if (!parsed.success) continue;
        if (!leagueMatches(parsed.data.league.name, this.filter)) continue;
        const entry = toRosterEntry(parsed.data);
        if (entry) seen.set(entry.eventId, entry);
      }
    }
    return Array.from(seen.values());
  }

  private async get(path: string, params: Record<string, string>): Promise<unknown[]> {
    const qs = new URLSearchParams({ token: this.config.token, ...params });
    const url = `${this.config.baseUrl}${path}?${qs.toString()}`;

    let body: unknown;
    try {
      const res = await this.fetchImpl(url, { signal: AbortSignal.timeout(this.config.timeoutMs) });
      if (!res.ok) throw new SourceUnavailableError(`BetsAPI ${res.status} on ${path}`);
      body = await res.json();
    } catch (err) {
      if (err instanceof SourceUnavailableError) throw err;
      throw new SourceUnavailableError(`BetsAPI ${path} failed: ${errorMessage(err)}`, { cause: err });
    }

    const envelope = EnvelopeSchema.safeParse(body);
    if (!envelope.success) throw new SourceUnavailableError(`BetsAPI ${path}: unexpected response shape`);
    const { success, error, results } = envelope.data;
    if (success === 0 || success === false) {
      throw new SourceUnavailableError(`BetsAPI ${path}: ${error ?? 'request rejected'}`);
    }
    if (Array.isArray(results)) return results;
    if (results && typeof results === 'object') return [results];
    return [];
  }
}
