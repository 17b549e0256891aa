import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type {
  CaptureStore,
  CapturedLine,
  EventRow,
  InsertOutcome,
  OpenerRow,
  QuarterLineRow,
  ResultRow,
  TableCounts,
} from './store.js';
import type { Secrets } from '../util/env.js';
import { LIFECYCLE, statusesBefore, type EventStatus } from '../types/lifecycle.js';
import type { ScorePair } from '../types/snapshot.js';
import { StoreUnavailableError } from '../util/errors.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('db');

const EventRowSchema = z.object({
  event_id: z.coerce.string(),
  league_id: z.coerce.string().nullable(),
  start_time_utc: z.string(),
  status: z.enum(LIFECYCLE),
  home_name: z.string(),
  away_name: z.string(),
  final_home: z.number().int().nullable(),
  final_away: z.number().int().nullable(),
});

const CapturedLineSchema = z.object({
  bookmaker_id: z.string(),
  market: z.enum(['spread', 'total']),
  line: z.coerce.number(),
});

const QuarterLineSchema = CapturedLineSchema.extend({
  quarter: z.union([z.literal(1), z.literal(2), z.literal(3)]),
});

interface PostgrestResult {
  error: { message: string } | null;
}

function check<T extends PostgrestResult>(res: T, what: string): T {
  if (res.error) {
    log.error(`${what} failed`, res.error.message);
    throw new StoreUnavailableError(`${what} failed: ${res.error.message}`);
  }
  return res;
}

// Upsert with ignoreDuplicates only returns the rows it actually inserted
function outcomeOf(data: unknown[] | null): InsertOutcome {
  return data && data.length > 0 ? 'inserted' : 'exists';
}

export class SupabaseStore implements CaptureStore {
  private db: SupabaseClient;

  constructor(db: SupabaseClient) {
    this.db = db;
  }

  async upsertRosterEvent(row: EventRow): Promise<void> {
    const inserted = outcomeOf(
      check(
        await this.db.from('event').upsert(row, { onConflict: 'event_id', ignoreDuplicates: true }).select('event_id'),
        `roster insert ${row.event_id}`,
      ).data,
    );
    if (inserted === 'inserted') return;

    check(
      await this.db
        .from('event')
        .update({
          league_id: row.league_id,
          start_time_utc: row.start_time_utc,
          home_name: row.home_name,
          away_name: row.away_name,
        })
        .eq('event_id', row.event_id),
      `roster update ${row.event_id}`,
    );

    // The roster only moves events the tracker has not picked up yet
    if (row.status !== 'scheduled') {
      check(
        await this.db.from('event').update({ status: row.status }).eq('event_id', row.event_id).eq('status', 'scheduled'),
        `roster status ${row.event_id}`,
      );
    }
  }

  async ensureEvent(row: EventRow): Promise<InsertOutcome> {
    const { data } = check(
      await this.db.from('event').upsert(row, { onConflict: 'event_id', ignoreDuplicates: true }).select('event_id'),
      `ensure event ${row.event_id}`,
    );
    return outcomeOf(data);
  }

  async updateEventStatus(eventId: string, status: EventStatus): Promise<void> {
    check(
      await this.db
        .from('event')
        .update({ status })
        .eq('event_id', eventId)
        .in('status', statusesBefore(status)),
      `status ${eventId} → ${status}`,
    );
  }

  async recordFinalScores(eventId: string, scores: ScorePair): Promise<void> {
    check(
      await this.db.from('event').update({ final_home: scores.home, final_away: scores.away }).eq('event_id', eventId),
      `final scores ${eventId}`,
    );
  }

  async insertOpener(row: OpenerRow): Promise<InsertOutcome> {
    const { data } = check(
      await this.db
        .from('opener')
        .upsert(row, { onConflict: 'event_id,bookmaker_id,market', ignoreDuplicates: true })
        .select('event_id'),
      `opener ${row.event_id}/${row.bookmaker_id}/${row.market}`,
    );
    return outcomeOf(data);
  }

  async insertQuarterLine(row: QuarterLineRow): Promise<InsertOutcome> {
    const { data } = check(
      await this.db
        .from('quarter_line')
        .upsert(row, { onConflict: 'event_id,bookmaker_id,market,quarter', ignoreDuplicates: true })
        .select('event_id'),
      `quarter line ${row.event_id}/Q${row.quarter}/${row.market}`,
    );
    return outcomeOf(data);
  }

  async insertResult(row: ResultRow): Promise<InsertOutcome> {
    const { data } = check(
      await this.db.from('result').upsert(row, { onConflict: 'event_id', ignoreDuplicates: true }).select('event_id'),
      `result ${row.event_id}`,
    );
    return outcomeOf(data);
  }

  async getCapturedLines(eventId: string): Promise<CapturedLine[]> {
    const [openers, quarters] = await Promise.all([
      this.db.from('opener').select('bookmaker_id, market, line').eq('event_id', eventId),
      this.db.from('quarter_line').select('bookmaker_id, market, quarter, line').eq('event_id', eventId),
    ]);
    const o = z.array(CapturedLineSchema).safeParse(check(openers, `openers ${eventId}`).data ?? []);
    const q = z.array(QuarterLineSchema).safeParse(check(quarters, `quarter lines ${eventId}`).data ?? []);
    if (!o.success || !q.success) {
      throw new StoreUnavailableError(`Captured lines for ${eventId} did not match the schema`);
    }
    return [
      ...o.data.map(l => ({ ...l, quarter: null })),
      ...q.data,
    ];
  }

  async listTrackableEvents(): Promise<EventRow[]> {
    const { data } = check(
      await this.db.from('event').select('*').not('status', 'in', '(final,archived)'),
      'list trackable events',
    );
    const rows: EventRow[] = [];
    for (const raw of data ?? []) {
      const parsed = EventRowSchema.safeParse(raw);
      if (parsed.success) rows.push(parsed.data);
      else log.warn(`Skipping malformed event row: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return rows;
  }

  async getCounts(): Promise<TableCounts> {
    const head = { count: 'exact', head: true } as const;
    const [e, o, q, r] = await Promise.all([
      this.db.from('event').select('*', head),
      this.db.from('opener').select('*', head),
      this.db.from('quarter_line').select('*', head),
      this.db.from('result').select('*', head),
    ]);
    return {
      events: check(e, 'count events').count ?? 0,
      openers: check(o, 'count openers').count ?? 0,
      quarterLines: check(q, 'count quarter lines').count ?? 0,
      results: check(r, 'count results').count ?? 0,
    };
  }

  async verifyConnection(): Promise<number> {
    const { count, error } = await this.db.from('event').select('*', { count: 'exact', head: true });
    if (error) throw new StoreUnavailableError(`Supabase connection failed: ${error.message}`);
    return count ?? 0;
  }
}

export function createStore(secrets: Secrets): SupabaseStore {
  const db = createClient(secrets.SUPABASE_URL, secrets.SUPABASE_KEY, {
    auth: { persistSession: false },
  });
  log.info('Supabase client initialized');
  return new SupabaseStore(db);
}
