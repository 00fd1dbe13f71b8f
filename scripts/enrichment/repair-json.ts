import { MalformedShapeError, ResponseParseError } from "./errors";

const LEADING_FENCE = /^```(?:json)?[^\S\n]*\n?/i;
const TRAILING_FENCE = /\n?```\s*$/;
const TRAILING_SEPARATOR = /,(\s*[}\]])/g;
const BARE_KEY = /([{,])\s*([A-Za-z_][A-Za-z0-9_]*)\s*:/g;

type ParseAttempt = { ok: true; value: unknown } | { ok: false; error: unknown };

function tryParse(text: string): ParseAttempt {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, error };
  }
}

export function stripCodeFence(raw: string): string {
  return raw.trim().replace(LEADING_FENCE, "").replace(TRAILING_FENCE, "");
}

export function removeTrailingSeparators(text: string): string {
  return text.replace(TRAILING_SEPARATOR, "$1");
}

export function quoteBareKeys(text: string): string {
  return text.replace(BARE_KEY, '$1"$2":');
}

function extractBetween(text: string, open: string, close: string): string | null {
  const start = text.indexOf(open);
  const end = text.lastIndexOf(close);
  if (start === -1 || end <= start) {
    return null;
  }
  return text.slice(start, end + 1);
}

/**
 * Recovers a JSON value from model output. The cheap rewrites run first; the
 * substring extraction only happens once every rewrite has failed.
 */
export function repairJson(raw: string): unknown {
  const unfenced = stripCodeFence(raw);

  const strict = tryParse(unfenced);
  if (strict.ok) {
    return strict.value;
  }

  const withoutTrailing = removeTrailingSeparators(unfenced);
  const trailingAttempt = tryParse(withoutTrailing);
  if (trailingAttempt.ok) {
    return trailingAttempt.value;
  }

  const quoted = quoteBareKeys(withoutTrailing);
  const quotedAttempt = tryParse(quoted);
  if (quotedAttempt.ok) {
    return quotedAttempt.value;
  }

  const arrayText = extractBetween(quoted, "[", "]");
  if (arrayText) {
    const arrayAttempt = tryParse(arrayText);
    if (arrayAttempt.ok) {
      return arrayAttempt.value;
    }
  }

  const objectText = extractBetween(quoted, "{", "}");
  if (objectText) {
    const objectAttempt = tryParse(objectText);
    if (objectAttempt.ok) {
      return objectAttempt.value;
    }
  }

  throw new ResponseParseError({ cause: strict.error });
}

function describeType(value: unknown): string {
  if (value === null) return "null";
  return typeof value;
}

export function parseGeneratedRecords(raw: string): unknown[] {
  const parsed = repairJson(raw);
  if (!Array.isArray(parsed)) {
    throw new MalformedShapeError(describeType(parsed));
  }
  return parsed;
}
