const FLAG_VALUES = new Map<string, boolean>([
  ...["1", "true", "yes", "y", "on", "enabled"].map((value): [string, boolean] => [value, true]),
  ...["0", "false", "no", "n", "off", "disabled"].map((value): [string, boolean] => [value, false]),
]);

/** Unrecognised or blank values fall back to `defaultValue`. */
export function parseBooleanFlag(value: string | undefined, defaultValue: boolean): boolean {
  const normalized = value?.trim().toLowerCase() ?? "";
  return FLAG_VALUES.get(normalized) ?? defaultValue;
}

function parseIntAtLeast(value: string | undefined, minimum: number, fallback: number): number {
  if (!value?.trim()) return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed >= minimum ? parsed : fallback;
}

export function parsePositiveInt(value: string | undefined, fallback: number): number {
  return parseIntAtLeast(value, 1, fallback);
}

export function parseNonNegativeInt(value: string | undefined, fallback: number): number {
  return parseIntAtLeast(value, 0, fallback);
}

export function readTrimmedEnv(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}
