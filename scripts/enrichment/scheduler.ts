import { randomUUID } from "node:crypto";

import type {
  Checkpoint,
  DomainContext,
  EnrichmentRecord,
  Item,
  RecordProvenance,
  ValidationPolicy,
} from "@shared/enrichment";

import type { CheckpointStore } from "./checkpoint";
import { primaryIdentifier, recordFromGenerated } from "./domains";
import { BatchFailedError } from "./errors";
import { createRunLogger, type RunLogger } from "./logger";
import { delay, type Generator } from "./providers";
import { parseGeneratedRecords } from "./repair-json";
import { collectValidationIssues, type DomainSchema, type RecordValidationResult } from "./validators";

export interface SchedulerClock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: SchedulerClock = {
  now: () => Date.now(),
  sleep: delay,
};

export interface SchedulerOptions {
  batchSize: number;
  requestsPerMinute: number;
  maxRetries: number;
  retryDelayMs: number;
  validationPolicy: ValidationPolicy;
  schema: DomainSchema;
  context: DomainContext;
  clock?: SchedulerClock;
  logger?: RunLogger;
}

export interface SchedulerRun {
  pending: number;
  totalBatches: number;
  completedBatches: number;
  appended: number;
  rejected: number;
  missing: string[];
  issues: RecordValidationResult[];
}

/**
 * Spaces generator calls at least `60000 / requestsPerMinute` ms apart.
 */
export class RateLimiter {
  readonly intervalMs: number;
  private lastCallAt: number | null = null;

  constructor(requestsPerMinute: number, private readonly clock: SchedulerClock) {
    if (!Number.isFinite(requestsPerMinute) || requestsPerMinute <= 0) {
      throw new RangeError("requestsPerMinute must be greater than zero");
    }
    this.intervalMs = 60_000 / requestsPerMinute;
  }

  async wait(): Promise<void> {
    if (this.lastCallAt !== null) {
      const elapsed = this.clock.now() - this.lastCallAt;
      if (elapsed < this.intervalMs) {
        await this.clock.sleep(this.intervalMs - elapsed);
      }
    }
    this.lastCallAt = this.clock.now();
  }
}

export function pendingItems<TItem extends Item>(items: readonly TItem[], checkpoint: Checkpoint): TItem[] {
  return items.filter((item) => !checkpoint.has(primaryIdentifier(item)));
}

export function partitionItems<TItem>(items: readonly TItem[], batchSize: number): TItem[][] {
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new RangeError("batchSize must be a positive integer");
  }
  const batches: TItem[][] = [];
  for (let index = 0; index < items.length; index += batchSize) {
    batches.push(items.slice(index, index + batchSize));
  }
  return batches;
}

/**
 * Drives one enrichment run: pending items are split into sequential batches,
 * each batch goes through generate → parse → validate → append, and a batch
 * only counts as done once its records are in the checkpoint log.
 */
export class BatchScheduler {
  private readonly clock: SchedulerClock;
  private readonly rateLimiter: RateLimiter;
  private readonly logger: RunLogger;

  constructor(
    private readonly generator: Generator,
    private readonly store: CheckpointStore,
    private readonly options: SchedulerOptions,
  ) {
    this.clock = options.clock ?? systemClock;
    this.rateLimiter = new RateLimiter(options.requestsPerMinute, this.clock);
    this.logger = options.logger ?? createRunLogger({ list: options.context.listId });
  }

  pending(items: readonly Item[], checkpoint: Checkpoint): Item[] {
    return pendingItems(items, checkpoint);
  }

  partition(pending: readonly Item[], batchSize: number = this.options.batchSize): Item[][] {
    return partitionItems(pending, batchSize);
  }

  async run(items: readonly Item[], checkpoint: Checkpoint): Promise<SchedulerRun> {
    const pending = this.pending(items, checkpoint);
    const batches = this.partition(pending);
    const summary: SchedulerRun = {
      pending: pending.length,
      totalBatches: batches.length,
      completedBatches: 0,
      appended: 0,
      rejected: 0,
      missing: [],
      issues: [],
    };

    if (!batches.length) {
      return summary;
    }

    this.logger.event({
      event: "enrichment.schedule",
      message: `Generating data for ${pending.length} items in ${batches.length} batches`,
      data: {
        generator: this.generator.id,
        batchSize: this.options.batchSize,
      },
    });

    for (const [index, batch] of batches.entries()) {
      const batchNumber = index + 1;
      const batchLogger = this.logger.child({ batch: batchNumber });
      batchLogger.event({
        event: "enrichment.batch.start",
        message: `Batch ${batchNumber}/${batches.length}: ${batch.length} items`,
        data: { preview: batch.slice(0, 3).map((item) => item.displayForm) },
      });

      const records = await this.generateBatch(batch, batchNumber, batches.length, batchLogger);
      const withIssues = collectValidationIssues(records, this.options.schema);

      for (const result of withIssues) {
        batchLogger.event({
          event: "enrichment.validation.issues",
          level: "warn",
          message: `Issues with '${result.record.id}'`,
          data: { issues: result.issues },
        });
      }

      const flagged = new Set(withIssues.map((result) => result.record));
      const accepted =
        this.options.validationPolicy === "reject"
          ? records.filter((record) => !flagged.has(record))
          : records;

      await this.store.append(accepted);

      const returned = new Set(records.map((record) => record.id));
      const missing = batch.map(primaryIdentifier).filter((id) => !returned.has(id));

      summary.completedBatches = batchNumber;
      summary.appended += accepted.length;
      summary.rejected += records.length - accepted.length;
      summary.missing.push(...missing);
      summary.issues.push(...withIssues);

      batchLogger.event({
        event: "enrichment.batch.saved",
        message: `Saved ${accepted.length} records to checkpoint`,
        data: {
          rejected: records.length - accepted.length,
          ...(missing.length ? { missing } : {}),
        },
      });
    }

    return summary;
  }

  private async generateBatch(
    batch: readonly Item[],
    batchNumber: number,
    totalBatches: number,
    logger: RunLogger,
  ): Promise<EnrichmentRecord[]> {
    let attempt = 0;
    while (true) {
      attempt += 1;
      try {
        await this.rateLimiter.wait();
        const raw = await this.generator.generate(batch, this.options.context);
        const parsed = parseGeneratedRecords(raw);
        return this.recordsForBatch(batch, parsed, batchNumber, logger);
      } catch (error) {
        if (attempt > this.options.maxRetries) {
          throw new BatchFailedError(
            batchNumber,
            totalBatches,
            batchNumber > 1 ? batchNumber - 1 : null,
            attempt,
            { cause: error },
          );
        }
        const waitMs = this.options.retryDelayMs * attempt;
        logger.event({
          event: "enrichment.batch.retry",
          level: "warn",
          message: `Attempt ${attempt}/${this.options.maxRetries + 1} failed for batch ${batchNumber}`,
          data: { retryInMs: waitMs },
          error,
        });
        await this.clock.sleep(waitMs);
      }
    }
  }

  private recordsForBatch(
    batch: readonly Item[],
    parsed: readonly unknown[],
    batchNumber: number,
    logger: RunLogger,
  ): EnrichmentRecord[] {
    const provenance: RecordProvenance = {
      generator: this.generator.id,
      ...(this.generator.model ? { model: this.generator.model } : {}),
      batchId: randomUUID(),
      generatedAt: new Date(this.clock.now()).toISOString(),
    };

    const expected = new Set(batch.map(primaryIdentifier));
    const byId = new Map<string, EnrichmentRecord>();
    const unexpected: string[] = [];
    let unusable = 0;

    for (const entry of parsed) {
      const record = recordFromGenerated(this.options.context.domain, entry, provenance);
      if (!record) {
        unusable += 1;
        continue;
      }
      if (!expected.has(record.id)) {
        unexpected.push(record.id);
        continue;
      }
      byId.set(record.id, record);
    }

    if (unexpected.length || unusable) {
      logger.event({
        event: "enrichment.response.unexpected",
        level: "warn",
        message: `Batch ${batchNumber} response contained entries outside the batch`,
        data: { unexpected, unusable },
      });
    }

    const records: EnrichmentRecord[] = [];
    for (const item of batch) {
      const record = byId.get(primaryIdentifier(item));
      if (record) {
        records.push(record);
      }
    }
    return records;
  }
}
