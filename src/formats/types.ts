import type { GlueRow, LegacyAssignment } from '../lowering/glue.js';
import type { BoolGroup } from '../semantics/groups.js';

/**
 * Everything the writers need, fully lowered.
 */
export interface GlueProgram {
  /** Legacy `glueVars()` statements, in input order. */
  assignments: LegacyAssignment[];
  /** Boolean groups, ordered by direction then major index. */
  groups: BoolGroup[];
  /** Unified glue table rows, in first-occurrence order. */
  rows: GlueRow[];
  /** Finished digest of the raw input lines. */
  digest: Uint8Array;
}

/**
 * Fixed text around the generated body.
 */
export interface GlueBoilerplate {
  /** Buffer declarations and shared runtime types; emitted first. */
  header: string;
  /** Runtime helpers; emitted last. */
  footer: string;
}

/**
 * Options for `glueVars.cpp` writing.
 */
export interface WriteGlueVarsOptions {
  /**
   * Header/footer text. Defaults to the runtime's standard boilerplate.
   */
  boilerplate?: GlueBoilerplate;
}

/**
 * Options for glue map writing.
 */
export interface WriteGlueMapOptions {
  /**
   * Located-variables path recorded in the map (as given on input).
   */
  source?: string;
}

/**
 * In-memory `glueVars.cpp` artifact.
 */
export interface GlueVarsArtifact {
  kind: 'glue';
  path?: string;
  text: string;
}

/**
 * In-memory glue map artifact.
 */
export interface GlueMapArtifact {
  kind: 'glue-map';
  path?: string;
  json: GlueMapJson;
}

/**
 * Union of all artifact kinds produced by the generator.
 */
export type Artifact = GlueVarsArtifact | GlueMapArtifact;

/**
 * Glue map v1 JSON shape.
 *
 * Writers may add additional keys as needed.
 */
export type GlueMapJson = {
  format: 'glue-map';
  version: 1;
  [key: string]: unknown;
};

/**
 * Format writers used by the pipeline to turn a lowered program into artifacts.
 */
export interface FormatWriters {
  writeGlueVars(program: GlueProgram, opts?: WriteGlueVarsOptions): GlueVarsArtifact;
  writeGlueMap?(program: GlueProgram, opts?: WriteGlueMapOptions): GlueMapArtifact;
}
