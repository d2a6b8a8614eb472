import { formatDigest } from './checksum.js';
import type { GlueMapArtifact, GlueMapJson, GlueProgram, WriteGlueMapOptions } from './types.js';

/**
 * Create a JSON map of the generated glue: table rows, group slots, and the digest.
 *
 * Empty group slots are `null` so that every group lists exactly eight slots.
 */
export function writeGlueMap(program: GlueProgram, opts?: WriteGlueMapOptions): GlueMapArtifact {
  const json: GlueMapJson = {
    format: 'glue-map',
    version: 1,
    ...(opts?.source !== undefined ? { source: opts.source.replace(/\\/g, '/') } : {}),
    digest: formatDigest(program.digest),
    size: program.rows.length,
    rows: program.rows.map((r) => ({
      direction: r.direction,
      size: r.size,
      msi: r.msi,
      lsi: r.lsi,
      valueType: r.valueType,
      target: r.target,
    })),
    groups: program.groups.map((g) => ({
      id: g.id,
      symbol: g.symbol,
      direction: g.direction,
      index: g.majorIndex,
      slots: g.slots.map((s) => s ?? null),
    })),
  };
  return { kind: 'glue-map', json };
}
