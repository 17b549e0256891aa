import type { EventSnapshot, RosterEntry, ScorePair } from '../types/snapshot.js';

/** One poll of the live feed. Rejects with SourceUnavailableError when the feed cannot be read. */
export interface SnapshotSource {
  poll(): Promise<EventSnapshot[]>;
}

/** Finished-match lookup for events that ended without a final sighting on the live feed. */
export interface FinalScoreLookup {
  lookupFinal(eventId: string): Promise<ScorePair | null>;
}

export interface RosterSource {
  listFixtures(): Promise<RosterEntry[]>;
}
