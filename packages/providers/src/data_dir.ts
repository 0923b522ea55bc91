import { fileURLToPath } from 'node:url';

/** Datasets shipped with this package: `data/{locale}/*.json`, `data/global/*`. */
export const DATA_DIR = fileURLToPath(new URL('../data', import.meta.url));
