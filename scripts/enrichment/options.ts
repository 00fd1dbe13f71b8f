import { DRY_RUN_SAMPLE, normalisePolicy, type PipelineConfig } from "./pipeline";

export interface EnrichmentOptions {
  overrides: Partial<PipelineConfig>;
  all: boolean;
}

function readValue(argv: readonly string[], index: number, raw: string): { value: string | undefined; consumed: number } {
  const equalsIndex = raw.indexOf("=");
  if (equalsIndex >= 0) {
    return { value: raw.slice(equalsIndex + 1), consumed: 0 };
  }
  const next = argv[index + 1];
  if (next === undefined || next.startsWith("--")) {
    return { value: undefined, consumed: 0 };
  }
  return { value: next, consumed: 1 };
}

function flagName(raw: string): string {
  const equalsIndex = raw.indexOf("=");
  return equalsIndex >= 0 ? raw.slice(0, equalsIndex) : raw;
}

/**
 * Flags map onto config overrides; anything not given falls through to the
 * environment in `resolveConfigFromEnv`.
 */
export function parseEnrichmentOptions(argv: readonly string[]): EnrichmentOptions {
  const overrides: Partial<PipelineConfig> = {};
  let all = false;

  for (let index = 0; index < argv.length; index += 1) {
    const raw = argv[index];
    if (!raw || raw === "--") {
      continue;
    }

    switch (flagName(raw)) {
      case "--all":
        all = true;
        break;
      case "--no-api":
        overrides.enableAi = false;
        break;
      case "--fresh":
        overrides.resume = false;
        break;
      case "--dry-run":
        overrides.sampleLimit = DRY_RUN_SAMPLE;
        break;
      case "--list":
      case "-l": {
        const { value, consumed } = readValue(argv, index, raw);
        if (value) overrides.list = value;
        index += consumed;
        break;
      }
      case "--output":
      case "-o": {
        const { value, consumed } = readValue(argv, index, raw);
        if (value) overrides.outputPath = value;
        index += consumed;
        break;
      }
      case "--sample": {
        const { value, consumed } = readValue(argv, index, raw);
        const parsed = value ? Number.parseInt(value, 10) : Number.NaN;
        if (Number.isFinite(parsed) && parsed > 0) overrides.sampleLimit = parsed;
        index += consumed;
        break;
      }
      case "--batch-size": {
        const { value, consumed } = readValue(argv, index, raw);
        const parsed = value ? Number.parseInt(value, 10) : Number.NaN;
        if (Number.isFinite(parsed) && parsed > 0) overrides.batchSize = parsed;
        index += consumed;
        break;
      }
      case "--policy": {
        const { value, consumed } = readValue(argv, index, raw);
        if (value) overrides.validationPolicy = normalisePolicy(value);
        index += consumed;
        break;
      }
      default:
        break;
    }
  }

  return { overrides, all } satisfies EnrichmentOptions;
}
