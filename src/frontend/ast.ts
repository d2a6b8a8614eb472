/**
 * Source position (1-based line/column, 0-based offset).
 */
export interface SourcePosition {
  /** 1-based line number. */
  line: number;
  /** 1-based column number. */
  column: number;
  /** 0-based byte offset in the file. */
  offset: number;
}

/**
 * Span within a source file.
 */
export interface SourceSpan {
  /** User-facing file path (as provided on input). */
  file: string;
  start: SourcePosition;
  end: SourcePosition;
}

/**
 * Base shape for all parsed nodes.
 */
export interface BaseNode {
  kind: string;
  span: SourceSpan;
}

/**
 * One `__LOCATED_VAR(type, name, ...)` line.
 *
 * `span` covers the name argument, which is where location diagnostics point.
 */
export interface LocatedVarNode extends BaseNode {
  kind: 'LocatedVar';
  /** Declared value type, e.g. `BOOL` or `LINT`. */
  valueType: string;
  /** Address-encoded symbol, e.g. `__IX0_1` or `%IX0.1`. */
  name: string;
  /** Raw line text as read (without the line terminator). */
  line: string;
}

/**
 * Parsed located-variables file, declarations in file order.
 */
export interface LocatedVarFileNode extends BaseNode {
  kind: 'LocatedVarFile';
  path: string;
  declarations: LocatedVarNode[];
}
