import type { Diagnostic } from './diagnostics/types.js';
import type { ChecksumFactory } from './formats/checksum.js';
import type { Artifact, FormatWriters, GlueBoilerplate } from './formats/types.js';
import type { AddressPolicyMode } from './semantics/location.js';

export type { AddressPolicyMode };

/**
 * Options that influence generation and which artifacts are produced.
 */
export interface GeneratorOptions {
  /** Emit `glueVars.cpp` (default on). */
  emitGlue?: boolean;
  /** Emit the JSON glue map (default off). */
  emitMap?: boolean;
  /**
   * Severity of bit indices past 7 and of boolean slot collisions.
   *
   * `warn` (default) keeps generating; `error` fails the run.
   */
  addressPolicy?: AddressPolicyMode;
  /** Report every declaration as an info diagnostic. */
  verbose?: boolean;
}

/**
 * Counts describing a successful run.
 */
export interface GenerateSummary {
  declarations: number;
  groups: number;
  rows: number;
  /** Upper-case hex digest of the input lines. */
  digest: string;
}

/**
 * Result of a generation run: diagnostics plus any produced artifacts.
 */
export interface GenerateResult {
  diagnostics: Diagnostic[];
  artifacts: Artifact[];
  /** Present when generation got past every stage. */
  summary?: GenerateSummary;
}

/**
 * Dependency injection surface for the generator pipeline.
 *
 * Callers provide writers, boilerplate text and the checksum so the core stays in-memory.
 */
export interface PipelineDeps {
  formats: FormatWriters;
  boilerplate: GlueBoilerplate;
  createChecksum: ChecksumFactory;
}

/**
 * Top-level generate function signature used by the pipeline contract.
 */
export type GenerateFn = (
  inputFile: string,
  options: GeneratorOptions,
  deps: PipelineDeps,
) => Promise<GenerateResult>;
