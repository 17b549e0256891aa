import { loadConfig, loadSecrets } from './util/env.js';
import { createLogger, errorMessage, setLogLevel } from './util/logger.js';
import { createStore } from './db/supabase.js';
import { BetsApiClient } from './source/betsapi.js';
import { RosterRefresher } from './roster/roster-refresh.js';
import { EventStateTracker } from './core/event-tracker.js';
import { CaptureEngine } from './core/capture-engine.js';
import { ResultCompiler } from './core/result-compiler.js';
import { Scheduler } from './core/scheduler.js';

const log = createLogger('main');

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  log.info('Quarter Tracker starting...');

  const store = createStore(loadSecrets());
  const existingCount = await store.verifyConnection();
  log.info(`Supabase connected. Existing events: ${existingCount}`);

  const client = new BetsApiClient(config.source, config.bookmakerId);
  const tracker = new EventStateTracker(config.thresholds);
  const roster = new RosterRefresher(client, store);
  const scheduler = new Scheduler(
    {
      tracker,
      engine: new CaptureEngine(store),
      compiler: new ResultCompiler(store, config.bookmakerId),
      store,
      source: client,
      finalLookup: client,
    },
    {
      thresholds: config.thresholds,
      polling: config.polling,
      rosterReloadIntervalMs: config.rosterReloadIntervalMs,
    },
  );

  // Seed the store before the first cycle reads it back
  await roster.tick();
  log.info(`Roster refresh every ${config.rosterIntervalMs / 1000}s`);
  const rosterTimer = setInterval(() => void roster.tick(), config.rosterIntervalMs);

  // Status report
  const reportTimer = setInterval(async () => {
    try {
      const counts = await store.getCounts();
      const byStatus = Object.entries(tracker.countByStatus())
        .filter(([, n]) => n > 0)
        .map(([s, n]) => `${s}=${n}`)
        .join(' ');
      log.info(
        `STATUS: tracking ${tracker.size} (${byStatus || 'none'}) | anomalies=${tracker.openAnomalies().length} | ` +
          `events=${counts.events} openers=${counts.openers} quarter_lines=${counts.quarterLines} results=${counts.results}`,
      );
    } catch (err) {
      log.warn('Status report failed', errorMessage(err));
    }
  }, config.statusReportIntervalMs);

  // Graceful shutdown: finish the cycle in flight, then exit
  const loop = scheduler.run();
  const shutdown = () => {
    log.info('Shutting down...');
    clearInterval(rosterTimer);
    clearInterval(reportTimer);
    scheduler.stop();
    loop.then(
      () => process.exit(0),
      () => process.exit(1),
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  log.info('Quarter Tracker running.');
  await loop;
}

main().catch(err => {
  log.error('Fatal error', errorMessage(err));
  process.exit(1);
});
