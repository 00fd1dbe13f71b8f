import { randomUUID } from "node:crypto";
import { mkdir, open, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import type { Checkpoint, EnrichmentRecord } from "@shared/enrichment";

import { CheckpointLockedError, StoreUnreadableError } from "./errors";
import { createRunLogger } from "./logger";

const exampleSchema = z.object({
  text: z.string().optional(),
  reading: z.string().optional(),
  translation: z.string().optional(),
});

const enrichmentRecordSchema: z.ZodType<EnrichmentRecord> = z.object({
  domain: z.enum(["lexical", "kanji"]),
  id: z.string().min(1),
  fields: z.object({
    translation: z.string().optional(),
    phonetic: z.string().optional(),
    onyomi: z.string().optional(),
    kunyomi: z.string().optional(),
    examples: z.array(exampleSchema),
  }),
  provenance: z.object({
    generator: z.string(),
    model: z.string().optional(),
    batchId: z.string(),
    generatedAt: z.string(),
  }),
});

export interface CheckpointLock {
  readonly lockPath: string;
  release(): Promise<void>;
}

const lockHolderSchema = z.object({
  pid: z.number().int().positive(),
  acquiredAt: z.string().optional(),
});

const heldLocks = new Set<CheckpointLock>();

/** Releases every lock this process still holds, e.g. on SIGINT. */
export async function releaseHeldLocks(): Promise<void> {
  await Promise.all(Array.from(heldLocks, (lock) => lock.release()));
}

/** EPERM means the process exists but belongs to someone else. */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return !isErrnoException(error, "ESRCH");
  }
}

function parseLockHolder(contents: string | null): z.infer<typeof lockHolderSchema> | null {
  if (!contents) {
    return null;
  }
  try {
    const parsed = lockHolderSchema.safeParse(JSON.parse(contents));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

export function isErrnoException(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

async function readOptionalFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, "utf8");
  } catch (error) {
    if (isErrnoException(error, "ENOENT")) {
      return null;
    }
    throw error;
  }
}

/**
 * Append-only JSON-lines log of enrichment records. Each line is one record;
 * replaying the file top to bottom with last-write-wins per id gives the
 * current checkpoint.
 */
export class CheckpointStore {
  readonly lockPath: string;

  constructor(readonly filePath: string) {
    this.lockPath = `${filePath}.lock`;
  }

  async load(): Promise<Checkpoint> {
    let raw: string | null;
    try {
      raw = await readOptionalFile(this.filePath);
    } catch (error) {
      throw new StoreUnreadableError(this.filePath, null, { cause: error });
    }

    const checkpoint: Checkpoint = new Map();
    if (raw === null) {
      return checkpoint;
    }

    for (const [index, rawLine] of raw.split("\n").entries()) {
      const line = rawLine.trim();
      if (!line) {
        continue;
      }

      let value: unknown;
      try {
        value = JSON.parse(line);
      } catch (error) {
        throw new StoreUnreadableError(this.filePath, index + 1, { cause: error });
      }

      const parsed = enrichmentRecordSchema.safeParse(value);
      if (!parsed.success) {
        throw new StoreUnreadableError(this.filePath, index + 1, { cause: parsed.error });
      }
      checkpoint.set(parsed.data.id, parsed.data);
    }

    return checkpoint;
  }

  /**
   * Appends one batch. The current log is copied to a temporary sibling, the
   * batch lines are added and flushed, then the copy is renamed over the log,
   * so a reader never observes part of a batch.
   */
  async append(records: readonly EnrichmentRecord[]): Promise<void> {
    if (!records.length) {
      return;
    }

    await mkdir(path.dirname(this.filePath), { recursive: true });

    const existing = (await readOptionalFile(this.filePath)) ?? "";
    const prefix = existing && !existing.endsWith("\n") ? `${existing}\n` : existing;
    const lines = records.map((record) => JSON.stringify(record)).join("\n");
    const tempPath = `${this.filePath}.${process.pid}.${randomUUID()}.tmp`;

    try {
      const handle = await open(tempPath, "w");
      try {
        await handle.writeFile(`${prefix}${lines}\n`, "utf8");
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tempPath, this.filePath);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }

  async acquireLock(): Promise<CheckpointLock> {
    await mkdir(path.dirname(this.lockPath), { recursive: true });

    if (!(await this.tryCreateLock())) {
      const current = await readOptionalFile(this.lockPath);
      const holder = parseLockHolder(current);
      if (!holder || isProcessAlive(holder.pid)) {
        throw new CheckpointLockedError(this.lockPath, current?.trim() || null);
      }

      createRunLogger({ lockPath: this.lockPath }).event({
        event: "enrichment.lock.stale",
        level: "warn",
        message: `Reclaiming lock left by exited process ${holder.pid}`,
        data: { pid: holder.pid, acquiredAt: holder.acquiredAt ?? null },
      });
      await rm(this.lockPath, { force: true });
      if (!(await this.tryCreateLock())) {
        const racing = await readOptionalFile(this.lockPath);
        throw new CheckpointLockedError(this.lockPath, racing?.trim() || null);
      }
    }

    const lockPath = this.lockPath;
    let released = false;
    const lock: CheckpointLock = {
      lockPath,
      async release() {
        if (released) {
          return;
        }
        released = true;
        heldLocks.delete(lock);
        await rm(lockPath, { force: true });
      },
    };
    heldLocks.add(lock);
    return lock;
  }

  private async tryCreateLock(): Promise<boolean> {
    const holder = JSON.stringify({ pid: process.pid, acquiredAt: new Date().toISOString() });
    try {
      await writeFile(this.lockPath, holder, { encoding: "utf8", flag: "wx" });
      return true;
    } catch (error) {
      if (isErrnoException(error, "EEXIST")) {
        return false;
      }
      throw error;
    }
  }
}
