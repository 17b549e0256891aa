import type { LogLevel } from '../util/logger.js';

export interface CaptureThresholds {
  /** Regulation quarter length in game-clock seconds (4x5min leagues) */
  quarterLengthSec: number;
  /** Opener fires while the Q1 clock is within this many seconds of the start */
  openerWindowSec: number;
  /** Quarter-end capture fires once time remaining is at or below this */
  quarterEndThresholdSec: number;
  /** Same-quarter increase in time remaining tolerated before it counts as a clock regression */
  clockToleranceSec: number;
  /** An event waiting this long for final scores is reported as stalled */
  stallAfterSec: number;
  /** Wait this long before asking the result endpoint for a missing final */
  finalLookupAfterSec: number;
  /** An event gone from the feed is not looked up until this long after its scheduled start */
  finalLookupAfterStartSec: number;
}

export interface IntervalTier {
  /** Applies when seconds to the capture moment are at or below this */
  upToSec: number;
  intervalSec: number;
}

export interface PollIntervalConfig {
  tiers: IntervalTier[];
  /** Live events that are not near any window */
  normalIntervalSec: number;
  /** No live events at all */
  idleIntervalSec: number;
  minIntervalSec: number;
}

export interface SourceConfig {
  baseUrl: string;
  token: string;
  timeoutMs: number;
  targetLeagues: string[];
  blockedLeagues: string[];
  upcomingPages: number;
  sportId: number;
}

export interface Config {
  bookmakerId: string;
  thresholds: CaptureThresholds;
  polling: PollIntervalConfig;
  source: SourceConfig;
  rosterIntervalMs: number;
  rosterReloadIntervalMs: number;
  statusReportIntervalMs: number;
  logLevel: LogLevel;
}
