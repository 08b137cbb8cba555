/**
 * Structured extraction of JSON from model output.
 *
 * Model text is not guaranteed to be bare JSON: it can arrive wrapped in a
 * markdown fence, surrounded by prose, or both. extractStructured runs a short
 * list of pure parse attempts and keeps the first one that parses.
 */

export type ExpectedShape = 'object' | 'array';

export type ExtractionStrategy = 'verbatim' | 'fence-stripped' | 'bracket-slice';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type ExtractionFailureReason = 'unparseable' | 'shape-mismatch';

export type ExtractionResult<T extends JsonValue = JsonValue> =
  | { ok: true; value: T; strategy: ExtractionStrategy }
  | { ok: false; reason: ExtractionFailureReason };

/** Wrapper so a parsed JSON `null` is distinguishable from "did not parse". */
export interface Parsed {
  value: JsonValue;
}

type ParseAttempt = (raw: string, expected?: ExpectedShape) => Parsed | undefined;

const LEADING_FENCE = /^```[\w.+-]*[^\S\r\n]*\r?\n?/;
const TRAILING_FENCE = /\r?\n?```$/;

function tryParse(text: string): Parsed | undefined {
  try {
    const value: JsonValue = JSON.parse(text);
    return { value };
  } catch {
    return undefined;
  }
}

/** Remove a leading ```lang line and a trailing ``` marker, then trim. */
export function stripFenceMarkers(raw: string): string {
  return raw.trim().replace(LEADING_FENCE, '').replace(TRAILING_FENCE, '').trim();
}

/** Attempt 1: the text as-is. */
export function parseVerbatim(raw: string): Parsed | undefined {
  return tryParse(raw);
}

/** Attempt 2: the text with markdown fence markers removed. */
export function stripCodeFence(raw: string): Parsed | undefined {
  return tryParse(stripFenceMarkers(raw));
}

/**
 * Attempt 3: first opening bracket to the last closing bracket of the
 * fence-stripped text. `[`…`]` in array mode, `{`…`}` otherwise.
 */
export function sliceBracketed(raw: string, expected?: ExpectedShape): Parsed | undefined {
  const cleaned = stripFenceMarkers(raw);
  const [open, close] = expected === 'array' ? ['[', ']'] : ['{', '}'];
  const start = cleaned.indexOf(open);
  const end = cleaned.lastIndexOf(close);
  if (start === -1 || end <= start) {
    return undefined;
  }
  return tryParse(cleaned.slice(start, end + 1));
}

const ATTEMPTS: ReadonlyArray<readonly [ExtractionStrategy, ParseAttempt]> = [
  ['verbatim', parseVerbatim],
  ['fence-stripped', stripCodeFence],
  ['bracket-slice', sliceBracketed],
];

export function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function matchesShape(value: JsonValue, expected?: ExpectedShape): boolean {
  if (expected === 'array') return Array.isArray(value);
  if (expected === 'object') return isJsonObject(value);
  return true;
}

/**
 * Extract one JSON value from model text.
 *
 * The first attempt that parses decides the result: when its top-level type
 * differs from `expected` the extraction fails without trying later attempts.
 */
export function extractStructured(raw: string, expected?: ExpectedShape): ExtractionResult {
  for (const [strategy, attempt] of ATTEMPTS) {
    const parsed = attempt(raw, expected);
    if (!parsed) {
      continue;
    }
    if (!matchesShape(parsed.value, expected)) {
      return { ok: false, reason: 'shape-mismatch' };
    }
    return { ok: true, value: parsed.value, strategy };
  }
  return { ok: false, reason: 'unparseable' };
}

/** Array-mode extraction; the value is an array when ok. */
export function extractArray(raw: string): ExtractionResult<JsonValue[]> {
  const result = extractStructured(raw, 'array');
  if (!result.ok) return result;
  return Array.isArray(result.value)
    ? { ok: true, value: result.value, strategy: result.strategy }
    : { ok: false, reason: 'shape-mismatch' };
}

/** Object-mode extraction; the value is a plain object when ok. */
export function extractObject(raw: string): ExtractionResult<JsonObject> {
  const result = extractStructured(raw, 'object');
  if (!result.ok) return result;
  return isJsonObject(result.value)
    ? { ok: true, value: result.value, strategy: result.strategy }
    : { ok: false, reason: 'shape-mismatch' };
}
