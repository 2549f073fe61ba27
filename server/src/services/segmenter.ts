/**
 * Splits text into model-sized chunks without breaking words.
 *
 * Work happens on word spans of the original string, so every chunk's
 * content is an exact slice of the input and the whitespace between chunks
 * is kept as each chunk's `separator`.
 */
import { InvalidInputError } from "../errors.js";
import type { TextChunk } from "../types/audio.js";

export type SegmentOptions = {
  /** Chunks shorter than `maxChars * minChunkRatio` are merged into a neighbour. */
  minChunkRatio?: number;
  /** Extra characters a merge of a short chunk may exceed `maxChars` by. */
  mergeTolerance?: number;
};

type WordSpan = { start: number; end: number };

/** Inclusive range of word indices. */
type Unit = { first: number; last: number };

const DEFAULT_MIN_CHUNK_RATIO = 0.2;
const SENTENCE_END = /[.!?]+["'”’)\]]*$/;
const CLAUSE_END = /,["'”’)\]]*$/;
const PAUSE_PUNCTUATION = /[,.!?;:]/g;

export function segment(
  text: string,
  maxChars: number,
  options: SegmentOptions = {},
): TextChunk[] {
  if (!Number.isInteger(maxChars) || maxChars <= 0) {
    throw new InvalidInputError(`maxChars must be a positive integer, got ${maxChars}`);
  }

  const words = tokenize(text);
  if (words.length === 0) {
    throw new InvalidInputError("Text is empty");
  }

  const spanLength = (unit: Unit): number =>
    words[unit.last].end - words[unit.first].start;

  const units: Unit[] = [];
  for (const sentence of splitAfter(words, { first: 0, last: words.length - 1 }, SENTENCE_END, text)) {
    if (spanLength(sentence) <= maxChars) {
      units.push(sentence);
      continue;
    }
    for (const clause of splitAfter(words, sentence, CLAUSE_END, text)) {
      if (spanLength(clause) <= maxChars) {
        units.push(clause);
      } else {
        units.push(...packWords(clause, maxChars, spanLength));
      }
    }
  }

  const packed = packUnits(units, maxChars, spanLength);
  const merged = mergeShortUnits(packed, {
    maxChars,
    minChars: maxChars * (options.minChunkRatio ?? DEFAULT_MIN_CHUNK_RATIO),
    tolerance: Math.max(0, options.mergeTolerance ?? 0),
    spanLength,
  });

  return merged.map((unit, index) => {
    const start = words[unit.first].start;
    const end = words[unit.last].end;
    const nextStart =
      index + 1 < merged.length ? words[merged[index + 1].first].start : text.length;
    const content = text.slice(start, end);
    return {
      index,
      content,
      start,
      end,
      separator: text.slice(end, nextStart),
      estimatedChars: estimateModelLength(content),
    };
  });
}

/** UTF-8 length plus a weight of 3 for every pause punctuation mark. */
export function estimateModelLength(content: string): number {
  const pauses = content.match(PAUSE_PUNCTUATION)?.length ?? 0;
  return Buffer.byteLength(content, "utf8") + 3 * pauses;
}

function tokenize(text: string): WordSpan[] {
  const spans: WordSpan[] = [];
  for (const match of text.matchAll(/\S+/g)) {
    const start = match.index ?? 0;
    spans.push({ start, end: start + match[0].length });
  }
  return spans;
}

/** Splits a unit after every word matching `boundary`. */
function splitAfter(
  words: WordSpan[],
  unit: Unit,
  boundary: RegExp,
  text: string,
): Unit[] {
  const out: Unit[] = [];
  let first = unit.first;
  for (let index = unit.first; index <= unit.last; index += 1) {
    const word = text.slice(words[index].start, words[index].end);
    if (boundary.test(word) || index === unit.last) {
      out.push({ first, last: index });
      first = index + 1;
    }
  }
  return out;
}

/** Greedy word packing; a single word longer than `maxChars` stays whole. */
function packWords(
  unit: Unit,
  maxChars: number,
  spanLength: (unit: Unit) => number,
): Unit[] {
  const out: Unit[] = [];
  let current: Unit = { first: unit.first, last: unit.first };
  for (let index = unit.first + 1; index <= unit.last; index += 1) {
    const extended = { first: current.first, last: index };
    if (spanLength(extended) <= maxChars) {
      current = extended;
    } else {
      out.push(current);
      current = { first: index, last: index };
    }
  }
  out.push(current);
  return out;
}

/** Joins adjacent units while the joined span still fits. */
function packUnits(
  units: Unit[],
  maxChars: number,
  spanLength: (unit: Unit) => number,
): Unit[] {
  const out: Unit[] = [];
  let current: Unit | undefined;
  for (const unit of units) {
    if (!current) {
      current = unit;
      continue;
    }
    const joined = { first: current.first, last: unit.last };
    if (spanLength(joined) <= maxChars) {
      current = joined;
    } else {
      out.push(current);
      current = unit;
    }
  }
  if (current) {
    out.push(current);
  }
  return out;
}

function mergeShortUnits(
  units: Unit[],
  limits: {
    maxChars: number;
    minChars: number;
    tolerance: number;
    spanLength: (unit: Unit) => number;
  },
): Unit[] {
  const { maxChars, minChars, tolerance, spanLength } = limits;
  const ceiling = maxChars + tolerance;
  if (units.length < 2) {
    return units;
  }

  const out: Unit[] = [];
  let index = 0;
  while (index < units.length) {
    const current = units[index];
    if (spanLength(current) < minChars) {
      if (index < units.length - 1) {
        const merged = { first: current.first, last: units[index + 1].last };
        if (spanLength(merged) <= ceiling) {
          out.push(merged);
          index += 2;
          continue;
        }
      } else if (out.length > 0) {
        const previous = out[out.length - 1];
        const merged = { first: previous.first, last: current.last };
        if (spanLength(merged) <= ceiling) {
          out[out.length - 1] = merged;
          index += 1;
          continue;
        }
      }
    }
    out.push(current);
    index += 1;
  }
  return out;
}
