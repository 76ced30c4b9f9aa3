import { type LogLevel, isLogLevel } from './logger.js';

export interface Settings {
  logLevel: LogLevel;
  pollIntervalMs: number;
  killGraceMs: number;
}

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) || parsed <= 0 ? fallback : parsed;
};

export const readSettings = (env: NodeJS.ProcessEnv = process.env): Settings => {
  const level = env.LOG_LEVEL ?? '';
  return {
    logLevel: isLogLevel(level) ? level : 'info',
    pollIntervalMs: numberFromEnv(env.WFRUN_POLL_MS, 100),
    killGraceMs: numberFromEnv(env.WFRUN_GRACE_MS, 1000)
  };
};

/** `key=value` pairs from the command line; values stay strings. */
export const parseFormArgs = (pairs: string[]): Record<string, string> =>
  Object.fromEntries(
    pairs.map(kv => {
      const [k, ...v] = kv.split('=');
      return [k, v.join('=')];
    })
  );
