import { readFile, readdir } from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import type {
  Checkpoint,
  DomainContext,
  EnrichmentDomain,
  GeneratorProviderId,
  Item,
  ValidationPolicy,
} from "@shared/enrichment";

import { CheckpointStore } from "./checkpoint";
import { parseBooleanFlag, parseNonNegativeInt, parsePositiveInt, readTrimmedEnv } from "./config";
import { BatchFailedError, SourceUnavailableError } from "./errors";
import { createRunLogger, log } from "./logger";
import { buildArtifact, summariseArtifact, writeArtifact, type ArtifactStats } from "./output";
import { resolveGeneratorCapability, type GeneratorCapability } from "./providers";
import { BatchScheduler, pendingItems, type SchedulerClock, type SchedulerRun } from "./scheduler";
import { loadSourceItems } from "./sources";
import { resolveDomainSchema } from "./validators";

export const DEFAULT_LIST_DIR = path.resolve(process.cwd(), "data", "lists");
const DEFAULT_LIST_ID = "cet4";
const DEFAULT_REQUESTS_PER_MINUTE = 15;
const DEFAULT_MAX_RETRIES = 2;
const DEFAULT_RETRY_DELAY_MS = 5_000;
export const DRY_RUN_SAMPLE = 10;

export const DEFAULT_BATCH_SIZES: Record<EnrichmentDomain, number> = {
  lexical: 15,
  kanji: 10,
};

export const listDefinitionSchema = z.object({
  id: z.string().min(1),
  domain: z.enum(["lexical", "kanji"]),
  name: z.string().min(1),
  language: z.string().min(1),
  description: z.string(),
  countUnit: z.string().default(""),
  iconName: z.string().min(1),
  source: z.string().min(1),
  checkpoint: z.string().min(1),
  output: z.string().min(1),
  level: z.string().optional(),
  difficulty: z.number().int().positive().optional(),
  targetLanguage: z.string().default("Chinese"),
  promptLanguage: z.string().default("English"),
  requiredFields: z.array(z.enum(["translation", "phonetic", "readings"])).default([]),
  batchSize: z.number().int().positive().optional(),
});

export type ListDefinition = z.infer<typeof listDefinitionSchema>;

export interface ResolvedListDefinition extends ListDefinition {
  definitionPath: string;
  sourcePath: string;
  checkpointPath: string;
  outputPath: string;
}

export interface PipelineConfig {
  list: string;
  listDir: string;
  outputPath?: string;
  enableAi: boolean;
  provider: GeneratorProviderId;
  model?: string;
  geminiApiKey?: string;
  openAiApiKey?: string;
  batchSize?: number;
  requestsPerMinute: number;
  maxRetries: number;
  retryDelayMs: number;
  resume: boolean;
  sampleLimit: number;
  validationPolicy: ValidationPolicy;
}

export interface PipelineDependencies {
  capability?: GeneratorCapability;
  clock?: SchedulerClock;
}

export interface PipelineRun {
  config: PipelineConfig;
  list: ResolvedListDefinition;
  items: number;
  pending: number;
  generator: string | null;
  skippedReason?: string;
  scheduled: SchedulerRun | null;
  outputPath: string;
  stats: ArtifactStats;
}

function normaliseProvider(value: string | undefined): GeneratorProviderId {
  return value?.toLowerCase() === "openai" ? "openai" : "gemini";
}

export function normalisePolicy(value: string | undefined): ValidationPolicy {
  return value?.toLowerCase() === "reject" ? "reject" : "accept";
}

export function resolveConfigFromEnv(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  const envBatchSize = parsePositiveInt(process.env.BATCH_SIZE, 0);
  const envListDir = readTrimmedEnv("LIST_DIR");

  return {
    list: overrides.list ?? readTrimmedEnv("ENRICHMENT_LIST") ?? DEFAULT_LIST_ID,
    listDir: overrides.listDir ?? (envListDir ? path.resolve(envListDir) : DEFAULT_LIST_DIR),
    outputPath: overrides.outputPath,
    enableAi: overrides.enableAi ?? parseBooleanFlag(process.env.ENABLE_AI, true),
    provider: overrides.provider ?? normaliseProvider(readTrimmedEnv("GENERATOR_PROVIDER")),
    model: overrides.model ?? readTrimmedEnv("GENERATOR_MODEL"),
    geminiApiKey: overrides.geminiApiKey ?? readTrimmedEnv("GEMINI_API_KEY"),
    openAiApiKey: overrides.openAiApiKey ?? readTrimmedEnv("OPENAI_API_KEY"),
    batchSize: overrides.batchSize ?? (envBatchSize > 0 ? envBatchSize : undefined),
    requestsPerMinute:
      overrides.requestsPerMinute ?? parsePositiveInt(process.env.REQUESTS_PER_MINUTE, DEFAULT_REQUESTS_PER_MINUTE),
    maxRetries: overrides.maxRetries ?? parseNonNegativeInt(process.env.MAX_RETRIES, DEFAULT_MAX_RETRIES),
    retryDelayMs: overrides.retryDelayMs ?? parseNonNegativeInt(process.env.RETRY_DELAY_MS, DEFAULT_RETRY_DELAY_MS),
    resume: overrides.resume ?? parseBooleanFlag(process.env.RESUME, true),
    sampleLimit: overrides.sampleLimit ?? parseNonNegativeInt(process.env.SAMPLE_LIMIT, 0),
    validationPolicy: overrides.validationPolicy ?? normalisePolicy(readTrimmedEnv("VALIDATION_POLICY")),
  } satisfies PipelineConfig;
}

/**
 * A list is either a path to a definition file or an id looked up as
 * `<listDir>/<id>.json`. Paths inside the definition are relative to it.
 */
export function resolveListPath(list: string, listDir: string): string {
  if (list.endsWith(".json") || list.includes("/") || list.includes(path.sep)) {
    return path.resolve(list);
  }
  return path.join(listDir, `${list}.json`);
}

export async function loadListDefinition(definitionPath: string): Promise<ResolvedListDefinition> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(definitionPath, "utf8"));
  } catch (error) {
    throw new SourceUnavailableError(definitionPath, { cause: error });
  }

  const parsed = listDefinitionSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SourceUnavailableError(definitionPath, { cause: parsed.error });
  }
  const definition = parsed.data;
  const baseDir = path.dirname(definitionPath);

  return {
    ...definition,
    definitionPath,
    sourcePath: path.resolve(baseDir, definition.source),
    checkpointPath: path.resolve(baseDir, definition.checkpoint),
    outputPath: path.resolve(baseDir, definition.output),
  } satisfies ResolvedListDefinition;
}

export async function listDefinitionIds(listDir: string): Promise<string[]> {
  const entries = await readdir(listDir);
  return entries
    .filter((entry) => entry.endsWith(".json"))
    .map((entry) => entry.slice(0, -".json".length))
    .sort();
}

function domainContext(list: ResolvedListDefinition): DomainContext {
  return {
    domain: list.domain,
    listId: list.id,
    ...(list.level ? { level: list.level } : {}),
    promptLanguage: list.promptLanguage,
    targetLanguage: list.targetLanguage,
  } satisfies DomainContext;
}

function sampleItems(items: Item[], sampleLimit: number): Item[] {
  return sampleLimit > 0 ? items.slice(0, sampleLimit) : items;
}

/**
 * Runs one list end to end: load the source, generate what the checkpoint is
 * missing, then merge everything the checkpoint holds into the artifact. The
 * checkpoint lock is held for the whole run.
 */
export async function runEnrichment(
  config: PipelineConfig,
  dependencies: PipelineDependencies = {},
): Promise<PipelineRun> {
  const list = await loadListDefinition(resolveListPath(config.list, config.listDir));
  const outputPath = config.outputPath ? path.resolve(config.outputPath) : list.outputPath;
  const batchSize = config.batchSize ?? list.batchSize ?? DEFAULT_BATCH_SIZES[list.domain];

  const sourceItems = await loadSourceItems(list.sourcePath, list.domain, {
    level: list.level,
    difficulty: list.difficulty,
  });
  const items = sampleItems(sourceItems, config.sampleLimit);

  const logger = createRunLogger({ list: list.id });
  const store = new CheckpointStore(list.checkpointPath);
  const lock = await store.acquireLock();
  try {
    let checkpoint = await store.load();
    const baseline: Checkpoint = config.resume ? checkpoint : new Map();
    const pending = pendingItems(items, baseline);

    const capability =
      dependencies.capability ??
      resolveGeneratorCapability({
        enableAi: config.enableAi,
        provider: config.provider,
        model: config.model,
        geminiApiKey: config.geminiApiKey,
        openAiApiKey: config.openAiApiKey,
      });

    logger.event({
      event: "enrichment.run.start",
      message: `Enriching ${list.name}`,
      data: {
        items: items.length,
        checkpointed: checkpoint.size,
        pending: pending.length,
        batchSize,
        resume: config.resume,
        policy: config.validationPolicy,
        generator: capability.available ? capability.generator.id : null,
      },
    });

    let scheduled: SchedulerRun | null = null;
    if (capability.available) {
      const scheduler = new BatchScheduler(capability.generator, store, {
        batchSize,
        requestsPerMinute: config.requestsPerMinute,
        maxRetries: config.maxRetries,
        retryDelayMs: config.retryDelayMs,
        validationPolicy: config.validationPolicy,
        schema: resolveDomainSchema(list.domain, list.requiredFields),
        context: domainContext(list),
        clock: dependencies.clock,
        logger,
      });

      try {
        scheduled = await scheduler.run(items, baseline);
      } catch (error) {
        if (error instanceof BatchFailedError) {
          logger.event({
            event: "enrichment.run.aborted",
            level: "error",
            message: error.lastCompletedBatch
              ? `Run aborted; batches up to ${error.lastCompletedBatch} are saved. Re-run to resume.`
              : "Run aborted before any batch completed. Re-run to resume.",
            data: {
              batch: error.batchNumber,
              totalBatches: error.totalBatches,
              lastCompletedBatch: error.lastCompletedBatch,
            },
            error,
          });
        }
        throw error;
      }

      if (scheduled.appended > 0) {
        checkpoint = await store.load();
      }
    } else if (pending.length) {
      log(`Skipping generation for ${pending.length} items: ${capability.reason}`);
    }

    const artifact = buildArtifact(items, checkpoint, {
      name: list.name,
      language: list.language,
      description: list.description,
      countUnit: list.countUnit,
      iconName: list.iconName,
    });
    await writeArtifact(outputPath, artifact);
    const stats = summariseArtifact(artifact);

    logger.event({
      event: "enrichment.run.complete",
      message: `Output written to ${outputPath}`,
      data: { ...stats },
    });

    return {
      config,
      list,
      items: items.length,
      pending: pending.length,
      generator: capability.available ? capability.generator.id : null,
      ...(capability.available ? {} : { skippedReason: capability.reason }),
      scheduled,
      outputPath,
      stats,
    } satisfies PipelineRun;
  } finally {
    await lock.release();
  }
}
