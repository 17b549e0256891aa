import type { CaptureStore, EventRow } from '../db/store.js';
import type { RosterSource } from '../source/snapshot-source.js';
import type { RosterEntry } from '../types/snapshot.js';
import { rosterToStatus } from '../types/lifecycle.js';
import { createLogger, errorMessage } from '../util/logger.js';

const log = createLogger('roster');

export interface RosterSummary {
  fixtures: number;
  upserted: number;
  failed: number;
}

export function toEventRow(entry: RosterEntry): EventRow {
  return {
    event_id: entry.eventId,
    league_id: entry.leagueId,
    start_time_utc: entry.startTimeUtc,
    status: rosterToStatus(entry.status),
    home_name: entry.homeName,
    away_name: entry.awayName,
    final_home: null,
    final_away: null,
  };
}

/**
 * Periodic fixture discovery. Shares nothing with the capture loop except the store,
 * whose conditional status write keeps it from overriding tracker-owned states.
 */
export class RosterRefresher {
  private source: RosterSource;
  private store: CaptureStore;
  private running = false;

  constructor(source: RosterSource, store: CaptureStore) {
    this.source = source;
    this.store = store;
  }

  async refresh(): Promise<RosterSummary> {
    const fixtures = await this.source.listFixtures();
    const summary: RosterSummary = { fixtures: fixtures.length, upserted: 0, failed: 0 };

    for (const entry of fixtures) {
      try {
        await this.store.upsertRosterEvent(toEventRow(entry));
        summary.upserted++;
      } catch (err) {
        summary.failed++;
        log.warn(`Roster upsert ${entry.eventId} failed`, errorMessage(err));
      }
    }

    log.info(`Roster: ${summary.fixtures} fixtures, ${summary.upserted} upserted${summary.failed ? `, ${summary.failed} failed` : ''}`);
    return summary;
  }

  /** Interval-safe wrapper: skips a tick while the previous refresh is still running. */
  async tick(): Promise<void> {
    if (this.running) return;
    this.running = true;
    try {
      await this.refresh();
    } catch (err) {
      log.error('Roster refresh failed', errorMessage(err));
    } finally {
      this.running = false;
    }
  }
}
