import dotenv from 'dotenv';

export interface ServerConfig {
  port: number;
  defaultSeed?: number;
  logRuns: boolean;
  maxSeriesRuns: number;
}

type Env = Record<string, string | undefined>;

function intFrom(raw: string | undefined, name: string): number | undefined {
  if (raw == null || raw.trim() === '') return undefined;
  const v = Number(raw);
  if (!Number.isInteger(v) || v < 0) {
    throw new Error(`${name} must be a non-negative integer (got '${raw}').`);
  }
  return v;
}

export function readConfig(env: Env = process.env): ServerConfig {
  return {
    port: intFrom(env.PORT, 'PORT') ?? 3333,
    defaultSeed: intFrom(env.SIM_DEFAULT_SEED, 'SIM_DEFAULT_SEED'),
    logRuns: ['1', 'true', 'yes'].includes((env.SIM_LOG_RUNS || '').toLowerCase()),
    maxSeriesRuns: intFrom(env.MAX_SERIES_RUNS, 'MAX_SERIES_RUNS') ?? 1,
  };
}

export function loadConfig(): ServerConfig {
  dotenv.config();
  return readConfig();
}
