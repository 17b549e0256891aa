const LEVELS = { debug: 0, info: 1, warn: 2, error: 3 } as const;
export type LogLevel = keyof typeof LEVELS;

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS;
}

function log(level: LogLevel, module: string, msg: string, data?: unknown): void {
  if (LEVELS[level] < LEVELS[currentLevel]) return;
  const ts = new Date().toISOString();
  const prefix = `[${ts}] [${level.toUpperCase()}] [${module}]`;
  if (data !== undefined) {
    console.log(`${prefix} ${msg}`, data);
  } else {
    console.log(`${prefix} ${msg}`);
  }
}

// Keyed per anomaly, shared by every module logger
const seenOnce = new Set<string>();

export interface Logger {
  debug(msg: string, data?: unknown): void;
  info(msg: string, data?: unknown): void;
  warn(msg: string, data?: unknown): void;
  error(msg: string, data?: unknown): void;
  /** Log at warn level only the first time this key is seen. */
  warnOnce(key: string, msg: string, data?: unknown): void;
  /** Re-arm a warnOnce key after its anomaly clears. */
  clearOnce(key: string): void;
}

export function createLogger(module: string): Logger {
  return {
    debug: (msg, data) => log('debug', module, msg, data),
    info: (msg, data) => log('info', module, msg, data),
    warn: (msg, data) => log('warn', module, msg, data),
    error: (msg, data) => log('error', module, msg, data),
    warnOnce: (key, msg, data) => {
      if (seenOnce.has(key)) return;
      seenOnce.add(key);
      log('warn', module, msg, data);
    },
    clearOnce: (key) => { seenOnce.delete(key); },
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
