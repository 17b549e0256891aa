import type { Config, CaptureThresholds, PollIntervalConfig } from '../src/types/config.js';

export const DEFAULT_THRESHOLDS: CaptureThresholds = {
  quarterLengthSec: 300,
  openerWindowSec: 5,         // 4:55-5:00 on the Q1 clock
  quarterEndThresholdSec: 10,
  clockToleranceSec: 3,
  stallAfterSec: 10 * 60,
  finalLookupAfterSec: 60,
  finalLookupAfterStartSec: 20 * 60,
};

export const DEFAULT_POLLING: PollIntervalConfig = {
  tiers: [
    { upToSec: 5, intervalSec: 1 },
    { upToSec: 10, intervalSec: 2 },
    { upToSec: 20, intervalSec: 3 },
    { upToSec: 30, intervalSec: 5 },
  ],
  normalIntervalSec: 15,
  idleIntervalSec: 60,
  minIntervalSec: 1,
};

export const DEFAULT_CONFIG: Config = {
  bookmakerId: 'bet365',
  thresholds: DEFAULT_THRESHOLDS,
  polling: DEFAULT_POLLING,
  source: {
    baseUrl: 'https://api.b365api.com',
    token: '',
    timeoutMs: 15_000,
    targetLeagues: ['ebasketball h2h gg league'],
    blockedLeagues: ['ebasketball battle'],
    upcomingPages: 5,
    sportId: 18,  // basketball
  },
  rosterIntervalMs: 5 * 60_000,       // 5 min
  rosterReloadIntervalMs: 60_000,     // 1 min
  statusReportIntervalMs: 60_000,     // 1 min
  logLevel: 'info',
};
