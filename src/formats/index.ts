import type { FormatWriters } from './types.js';
import { writeGlueMap } from './writeGlueMap.js';
import { writeGlueVars } from './writeGlueVars.js';

/**
 * Default in-memory artifact writers.
 *
 * These writers implement the `FormatWriters` contract and return artifacts without writing to disk.
 */
export const defaultFormatWriters: FormatWriters = {
  writeGlueVars,
  writeGlueMap,
};
