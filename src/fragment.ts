/**
 * @fileoverview Text fragments sent to the interpreter.
 *
 * Picks what to send from a document (the selection, or the caret's line or
 * paragraph when nothing is selected) and prepares it for the wire.
 *
 * @module fragment
 */

/** Half-open character range [start, end) */
export interface TextRange {
  start: number;
  end: number;
}

export interface TextFragment {
  text: string;
  range: TextRange;
}

export type FragmentFallback = 'line' | 'paragraph';

export interface FragmentRequest {
  /** Current selection; an empty range means no selection */
  selection: TextRange;
  /** Caret offset in the document */
  caret: number;
  /** What to send when the selection is blank (default 'line') */
  fallback?: FragmentFallback;
}

const TAB_REPLACEMENT = '  ';

export function isBlank(text: string): boolean {
  return text.trim().length === 0;
}

/**
 * Normalize line endings, expand tabs and trim.
 *
 * @returns The text to send, or null when nothing is left
 */
export function prepareFragment(raw: string): string | null {
  const text = raw.replace(/\r\n/g, '\n').replace(/\t/g, TAB_REPLACEMENT).trim();
  return text.length > 0 ? text : null;
}

/**
 * Resolve the fragment for a send action.
 *
 * @returns null when both the selection and the fallback are blank
 */
export function selectFragment(document: string, request: FragmentRequest): TextFragment | null {
  const selection = clampRange(document, request.selection);
  const selected = document.slice(selection.start, selection.end).trim();
  if (!isBlank(selected)) {
    return { text: selected, range: selection };
  }

  const caret = clamp(request.caret, 0, document.length);
  const range = request.fallback === 'paragraph'
    ? paragraphRangeAt(document, caret)
    : lineRangeAt(document, caret);
  const text = document.slice(range.start, range.end).trim();
  return isBlank(text) ? null : { text, range };
}

/** Range of the line containing `offset`, without its line break */
export function lineRangeAt(document: string, offset: number): TextRange {
  const start = offset === 0 ? 0 : document.lastIndexOf('\n', offset - 1) + 1;
  const nextBreak = document.indexOf('\n', offset);
  let end = nextBreak === -1 ? document.length : nextBreak;
  if (end > start && document[end - 1] === '\r') end--;
  return { start, end };
}

/**
 * Range of the block of non-blank lines around `offset`.
 * On a blank line the range is that line alone.
 */
export function paragraphRangeAt(document: string, offset: number): TextRange {
  const here = lineRangeAt(document, offset);
  if (isBlank(document.slice(here.start, here.end))) return here;

  let start = here.start;
  while (start > 0) {
    const prev = lineRangeAt(document, start - 1);
    if (isBlank(document.slice(prev.start, prev.end))) break;
    start = prev.start;
  }

  let end = here.end;
  while (end < document.length) {
    const lineBreakEnd = document.indexOf('\n', end) + 1;
    if (lineBreakEnd === 0) break;
    const next = lineRangeAt(document, lineBreakEnd);
    if (isBlank(document.slice(next.start, next.end))) break;
    end = next.end;
  }

  return { start, end };
}

function clampRange(document: string, range: TextRange): TextRange {
  const start = clamp(Math.min(range.start, range.end), 0, document.length);
  const end = clamp(Math.max(range.start, range.end), 0, document.length);
  return { start, end };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
