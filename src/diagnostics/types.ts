/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A generator diagnostic (error/warning/info) with an optional source location.
 *
 * Diagnostics must have stable IDs so build scripts can grep for them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `GLU001`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** 1-based line number, when known. */
  line?: number;
  /** 1-based column number, when known. */
  column?: number;
}

/**
 * Known diagnostic IDs.
 */
export const DiagnosticIds = {
  /** Unknown/unclassified diagnostic. */
  Unknown: 'GLU000',

  /** Failed to read the located-variables file. */
  IoReadFailed: 'GLU001',

  /** Failed to write a generated artifact. */
  IoWriteFailed: 'GLU002',

  /** Unexpected exception inside a generation stage. */
  InternalError: 'GLU003',

  /** Line is not a `(type, name, ...)` declaration. */
  InvalidDeclaration: 'GLU100',

  /** Declaration name is not a located address, or uses an unknown direction/size flag. */
  InvalidLocation: 'GLU200',

  /** Address is usable but suspicious (malformed numeral, minor index on a non-bit location). */
  AddressWarning: 'GLU201',

  /** Bit location whose minor index does not fit in an 8-slot boolean group. */
  AddressOutOfRange: 'GLU202',

  /** Declared value type has no runtime value-type tag. */
  UnknownValueType: 'GLU203',

  /** Two declarations claim the same boolean group slot (last one wins). */
  SlotCollision: 'GLU300',

  /** Direction/size combination has no legacy buffer; only the unified table carries it. */
  NoLegacyBuffer: 'GLU301',

  /** Major index does not fit the runtime buffer it is routed to. */
  BufferOverflow: 'GLU302',

  /** Per-declaration trace line (verbose mode). */
  DeclarationTrace: 'GLU900',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];

export function hasErrors(diagnostics: Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}
