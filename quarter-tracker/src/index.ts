export * from './types/lifecycle.js';
export * from './types/snapshot.js';
export type * from './types/config.js';
export type * from './db/store.js';
export { SupabaseStore, createStore } from './db/supabase.js';
export * from './core/event-tracker.js';
export * from './core/poll-interval.js';
export * from './core/capture-engine.js';
export * from './core/result-compiler.js';
export * from './core/scheduler.js';
export type * from './source/snapshot-source.js';
export { BetsApiClient, finalFromResult, toRosterEntry } from './source/betsapi.js';
export { parseInplay, leagueMatches, classifyMarket, splitTeams } from './source/inplay-parser.js';
export { RosterRefresher, toEventRow, type RosterSummary } from './roster/roster-refresh.js';
export { DEFAULT_CONFIG } from '../config/default.js';
export { loadConfig, loadSecrets } from './util/env.js';
export { SourceUnavailableError, StoreUnavailableError } from './util/errors.js';
