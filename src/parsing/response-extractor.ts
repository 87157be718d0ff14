/**
 * Recovers the JSON payload embedded in a raw LLM response.
 *
 * Models wrap JSON in markdown fences, prepend commentary or append a
 * closing remark. A fenced block wins when present; otherwise the first
 * object or array is located and cut out with a string-aware balanced scan.
 */

import {
  emptyInput,
  invalidJson,
  isBlank,
  noStructureFound,
  unbalancedStructure,
} from "../errors.js";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type StructuredValue = JsonValue[] | { [key: string]: JsonValue };

type Delimiters = { open: "{"; close: "}" } | { open: "["; close: "]" };

export interface ExtractionCandidate {
  /** Text handed to the JSON parser */
  text: string;
  /** Offset of the candidate within the trimmed response */
  start: number;
  source: "fence" | "object" | "array";
}

const FENCED_BLOCK = /```(?:json)?\s*\n?([\s\S]*?)\n?```/di;

const OBJECT: Delimiters = { open: "{", close: "}" };
const ARRAY: Delimiters = { open: "[", close: "]" };

/**
 * Parses the JSON object or array contained in `raw`.
 *
 * @throws ParserError `EmptyInput`, `NoStructureFound`, `UnbalancedStructure` or `InvalidJson`
 */
export function extractJson(raw: string | null | undefined): StructuredValue {
  if (raw == null || isBlank(raw)) {
    throw emptyInput();
  }

  const text = raw.trim();
  const candidate = findCandidate(text);

  let parsed: unknown;
  try {
    parsed = JSON.parse(candidate.text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw invalidJson(message, candidate.text, error);
  }

  if (!isStructured(parsed)) {
    // A fenced block may hold a bare scalar; only objects and arrays count.
    throw noStructureFound(text);
  }
  return parsed;
}

/**
 * Non-throwing validity check: true when `json` parses as-is.
 */
export function isValidJson(json: string | null | undefined): boolean {
  if (json == null || isBlank(json)) {
    return false;
  }
  try {
    JSON.parse(json);
    return true;
  } catch {
    return false;
  }
}

/**
 * Locates the text to parse, without parsing it.
 */
export function findCandidate(text: string): ExtractionCandidate {
  const fence = FENCED_BLOCK.exec(text);
  const bodyRange = fence?.indices?.[1];
  if (fence && bodyRange) {
    const body = fence[1];
    const inner = body.trim();
    if (inner.length > 0) {
      const [bodyStart] = bodyRange;
      return {
        text: inner,
        start: bodyStart + body.length - body.trimStart().length,
        source: "fence",
      };
    }
  }

  const objectStart = text.indexOf(OBJECT.open);
  const arrayStart = text.indexOf(ARRAY.open);

  if (objectStart === -1 && arrayStart === -1) {
    throw noStructureFound(text);
  }

  const useObject =
    arrayStart === -1 || (objectStart !== -1 && objectStart < arrayStart);
  const delimiters = useObject ? OBJECT : ARRAY;
  const start = useObject ? objectStart : arrayStart;

  return {
    text: scanBalanced(text, start, delimiters),
    start,
    source: useObject ? "object" : "array",
  };
}

/**
 * Cuts out the structure opened at `start`, or throws UnbalancedStructure.
 */
function scanBalanced(
  text: string,
  start: number,
  { open, close }: Delimiters,
): string {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];

    if (escaped) {
      escaped = false;
      continue;
    }
    if (char === "\\" && inString) {
      escaped = true;
      continue;
    }
    if (char === '"') {
      inString = !inString;
      continue;
    }
    if (inString) {
      continue;
    }

    if (char === open) {
      depth++;
    } else if (char === close) {
      depth--;
      if (depth === 0) {
        return text.slice(start, i + 1);
      }
    }
  }

  throw unbalancedStructure(text.slice(start));
}

function isStructured(value: unknown): value is StructuredValue {
  return typeof value === "object" && value !== null;
}
