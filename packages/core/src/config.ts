/**
 * fabricate runtime configuration, read from the environment.
 */

import { resolve } from 'node:path';
import process from 'node:process';
import type { LogLevel } from './logger.js';
import { MissingSeed, type Seed } from './types.js';

export type FabricateConfig = {
  /** Root directory of locale datasets, unless a provider overrides it. */
  dataDir: string;
  /** Process-wide seed used by providers constructed without one. */
  globalSeed: Seed;
  logLevel: LogLevel;
};

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): FabricateConfig {
  const dataDir = resolve(env.FABRICATE_DATA_DIR ?? 'data');
  const globalSeed = parseSeed(env.FABRICATE_SEED);
  const logLevel = resolveLogLevel(env.FABRICATE_DEBUG);
  return { dataDir, globalSeed, logLevel };
}

/**
 * Integer strings become numbers so that `FABRICATE_SEED=42` matches `seed: 42`.
 * Anything else non-empty is used as a string seed.
 */
export function parseSeed(raw: string | undefined): Seed {
  if (raw === undefined) return MissingSeed;
  const value = raw.trim();
  if (value === '') return MissingSeed;
  if (/^-?\d+$/.test(value)) {
    const n = Number(value);
    if (Number.isSafeInteger(n)) return n;
  }
  return value;
}

export function resolveLogLevel(debug: string | undefined): LogLevel {
  if (debug === '1' || debug === 'true') return 'debug';
  if (debug === 'warn') return 'warn';
  if (debug === 'error') return 'error';
  return 'info';
}
