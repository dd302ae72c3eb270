import { logger } from "./logger.js";
import type { SegmentationResult, TextSegment } from "./types.js";

export interface SegmentOptions {
  maxChars: number;
  minChars: number;
  overlapChars: number;
  maxSegments: number;
  /** How far back from the hard cutoff to look for a sentence end. */
  backtrackChars?: number;
}

const SENTENCE_END = new Set([".", "?", "!"]);
const SENTENCE_START = /\s+[A-Z(]/y;
const WHITESPACE = /\s/;

/** True when `pos` sits right after `.`, `?` or `!` followed by space and a capital or `(`. */
function isSentenceBoundary(text: string, pos: number): boolean {
  if (!SENTENCE_END.has(text.charAt(pos - 1))) return false;
  SENTENCE_START.lastIndex = pos;
  return SENTENCE_START.test(text);
}

/**
 * Cut position for the segment starting at `start`: last sentence boundary
 * in the backtrack window, else just after the last whitespace before the
 * cutoff, else the cutoff itself.
 */
export function findCut(
  text: string,
  start: number,
  maxChars: number,
  minChars: number,
  backtrackChars: number,
): number {
  const cutoff = start + maxChars;
  const windowStart = Math.max(start + minChars, cutoff - backtrackChars);

  for (let pos = cutoff; pos > windowStart; pos--) {
    if (isSentenceBoundary(text, pos)) return pos;
  }

  for (let pos = cutoff - 1; pos > start; pos--) {
    if (WHITESPACE.test(text.charAt(pos))) return pos + 1;
  }

  return cutoff;
}

/**
 * Splits text into overlapping segments of at most `maxChars`, preferring
 * sentence ends. Stops at `maxSegments`; whatever is left is dropped and
 * reported through `truncated` / `droppedChars`. Segments shorter than
 * `minChars` are folded into the one before.
 */
export function segmentText(text: string, options: SegmentOptions): SegmentationResult {
  const { maxChars, minChars, overlapChars, maxSegments } = options;
  const backtrackChars = options.backtrackChars ?? 1_200;
  if (maxChars <= 0) throw new RangeError("maxChars must be positive");

  const spans: Array<{ start: number; end: number }> = [];
  let truncated = false;
  let droppedChars = 0;
  let i = 0;

  while (i < text.length) {
    if (spans.length >= maxSegments) {
      truncated = true;
      droppedChars = text.length - (spans.at(-1)?.end ?? 0);
      break;
    }

    if (text.length - i <= maxChars) {
      spans.push({ start: i, end: text.length });
      break;
    }

    const cut = findCut(text, i, maxChars, minChars, backtrackChars);
    spans.push({ start: i, end: cut });

    const next = Math.max(cut - overlapChars, 0);
    i = next > i ? next : cut;
  }

  if (truncated) {
    logger.warn("Segment limit reached; remaining text dropped", {
      maxSegments,
      droppedChars,
      textLength: text.length,
    });
  }

  const merged: Array<{ start: number; end: number }> = [];
  for (const span of spans) {
    const prev = merged.at(-1);
    if (prev && span.end - span.start < minChars) {
      prev.end = span.end;
    } else {
      merged.push({ ...span });
    }
  }

  const segments: TextSegment[] = merged.map((span, idx) => ({
    text: text.slice(span.start, span.end),
    start: span.start,
    end: span.end,
    ordinal: idx + 1,
    total: merged.length,
  }));

  return { segments, truncated, droppedChars };
}
