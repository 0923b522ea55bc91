// ============================================================================
// @fabricate/core — Process-wide Seed
// ============================================================================
//
// One seed shared by every provider in the process. Providers built without
// their own seed draw from it, and hasEffectiveSeed() consults it when the
// instance seed is missing or null. Initialised once from FABRICATE_SEED.
// ============================================================================

import { loadConfig } from './config.js';
import { type Seed, isConcreteSeed } from './types.js';

let globalSeed: Seed = loadConfig().globalSeed;

export function getGlobalSeed(): Seed {
  return globalSeed;
}

/**
 * Replace the process-wide seed. Affects random sources created afterwards
 * and every provider's `hasEffectiveSeed()`.
 */
export function setGlobalSeed(seed: Seed): void {
  globalSeed = seed;
}

export function hasGlobalSeed(): boolean {
  return isConcreteSeed(globalSeed);
}
