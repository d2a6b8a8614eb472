export { generate, generateFromSource, defaultPipelineDeps } from './generate.js';
export type {
  AddressPolicyMode,
  GenerateFn,
  GenerateResult,
  GenerateSummary,
  GeneratorOptions,
  PipelineDeps,
} from './pipeline.js';
export { DiagnosticIds, hasErrors } from './diagnostics/types.js';
export type { Diagnostic, DiagnosticId, DiagnosticSeverity } from './diagnostics/types.js';
export { makeSourceFile } from './frontend/source.js';
export type { SourceFile } from './frontend/source.js';
export { parseDeclarationLine, parseLocatedVariables } from './frontend/parser.js';
export { decodeLocation, resolveLocations } from './semantics/location.js';
export type {
  Direction,
  LocatedAddress,
  ResolvedDeclaration,
  SizeClass,
  ValueTypeTag,
} from './semantics/location.js';
export { groupBooleans } from './semantics/groups.js';
export type { BoolGroup, GlueEntry } from './semantics/groups.js';
export { glueRows, legacyAssignment, lowerLegacyAssignments } from './lowering/glue.js';
export type { GlueRow, LegacyAssignment } from './lowering/glue.js';
export { defaultBoilerplate } from './formats/boilerplate.js';
export { createMd5Checksum, formatDigest } from './formats/checksum.js';
export type { ChecksumFactory, RunningChecksum } from './formats/checksum.js';
export { defaultFormatWriters } from './formats/index.js';
export { countAddressablePoints, readGlueVars } from './formats/readGlueVars.js';
export type { GlueVarsSummary } from './formats/readGlueVars.js';
export type { Artifact, FormatWriters, GlueBoilerplate, GlueProgram } from './formats/types.js';
