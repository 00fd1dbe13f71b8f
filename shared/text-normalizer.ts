export function toNfc(value: string): string {
  return value.normalize("NFC");
}

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ");
}

export function normaliseText(value: string | null | undefined): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = collapseWhitespace(value).trim();
  if (!trimmed) {
    return null;
  }
  return toNfc(trimmed);
}

/**
 * Case-insensitive identity key shared by source items, checkpoint records and
 * the artifact sort order.
 */
export function normaliseId(value: string | null | undefined): string | null {
  return normaliseText(value)?.toLowerCase() ?? null;
}

export function compareCanonical(a: string, b: string): number {
  const left = normaliseId(a) ?? "";
  const right = normaliseId(b) ?? "";
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}
