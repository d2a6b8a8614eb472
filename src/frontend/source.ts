import type { SourcePosition, SourceSpan } from './ast.js';

/**
 * Source file + precomputed line-start offsets, used to convert offsets into line/column spans.
 */
export interface SourceFile {
  path: string;
  /** Decoded text; invalid UTF-8 becomes U+FFFD. */
  text: string;
  /**
   * 0-based offsets into `text` for the start of each line. The first entry is always 0.
   */
  lineStarts: number[];
  /** Undecoded bytes of each `\n`-separated segment, parallel to `lineStarts`. */
  rawLines: Uint8Array[];
}

/**
 * One line of a {@link SourceFile}, without its `\n` terminator.
 */
export interface SourceLine {
  /** 1-based line number. */
  number: number;
  /** 0-based offset of the first character. */
  offset: number;
  text: string;
  /** Bytes of the line as read, `\r` included. */
  raw: Uint8Array;
}

function splitRawLines(bytes: Buffer): Buffer[] {
  const out: Buffer[] = [];
  let start = 0;
  for (let i = 0; i < bytes.length; i++) {
    if (bytes[i] === 0x0a) {
      out.push(bytes.subarray(start, i));
      start = i + 1;
    }
  }
  out.push(bytes.subarray(start));
  return out;
}

/**
 * Build a {@link SourceFile} from a path and either source text or the file's bytes.
 *
 * Bytes are split on `\n` before decoding, so every line keeps its exact bytes.
 */
export function makeSourceFile(path: string, content: string | Uint8Array): SourceFile {
  const raw = splitRawLines(
    typeof content === 'string' ? Buffer.from(content, 'utf8') : Buffer.from(content),
  );
  const text =
    typeof content === 'string' ? content : raw.map((line) => line.toString('utf8')).join('\n');
  const lineStarts = [0];
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '\n') {
      lineStarts.push(i + 1);
    }
  }
  return { path, text, lineStarts, rawLines: raw };
}

/**
 * Split a file into lines the way `getline` does: a `\r` before `\n` stays part of the line,
 * and the empty segment after a final `\n` is not a line.
 */
export function sourceLines(file: SourceFile): SourceLine[] {
  const out: SourceLine[] = [];
  for (let i = 0; i < file.lineStarts.length; i++) {
    const start = file.lineStarts[i] ?? 0;
    const next = file.lineStarts[i + 1];
    if (next === undefined && start >= file.text.length) break;
    const end = next === undefined ? file.text.length : next - 1;
    out.push({
      number: i + 1,
      offset: start,
      text: file.text.slice(start, end),
      raw: file.rawLines[i] ?? new Uint8Array(0),
    });
  }
  return out;
}

/**
 * Convert a 0-based byte offset in `file.text` into a 1-based line/column position.
 */
export function posAtOffset(file: SourceFile, offset: number): SourcePosition {
  const clamped = Math.max(0, Math.min(offset, file.text.length));
  let lo = 0;
  let hi = file.lineStarts.length - 1;
  while (lo < hi) {
    const mid = Math.floor((lo + hi + 1) / 2);
    const midStart = file.lineStarts[mid] ?? 0;
    if (midStart <= clamped) {
      lo = mid;
    } else {
      hi = mid - 1;
    }
  }
  const lineStart = file.lineStarts[lo] ?? 0;
  return { line: lo + 1, column: clamped - lineStart + 1, offset: clamped };
}

/**
 * Construct a {@link SourceSpan} for a half-open offset range `[startOffset, endOffset]`.
 */
export function span(file: SourceFile, startOffset: number, endOffset: number): SourceSpan {
  return {
    file: file.path,
    start: posAtOffset(file, startOffset),
    end: posAtOffset(file, endOffset),
  };
}
