import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";

import type {
  ArtifactMeta,
  Checkpoint,
  Item,
  OutputRecord,
  WordListArtifact,
} from "@shared/enrichment";
import { compareCanonical } from "@shared/text-normalizer";

import { mergeInto, primaryIdentifier } from "./domains";

/**
 * One output record per source item, in loader order. Items the checkpoint
 * has nothing for still appear, with empty generated fields.
 */
export function mergeRecords(items: readonly Item[], checkpoint: Checkpoint): OutputRecord[] {
  return items.map((item) => mergeInto(item, checkpoint.get(primaryIdentifier(item))));
}

export function sortRecords<TRecord extends OutputRecord>(records: readonly TRecord[]): TRecord[] {
  return [...records].sort((a, b) => compareCanonical(a.word, b.word));
}

export function emitArtifact(records: readonly OutputRecord[], meta: ArtifactMeta): WordListArtifact {
  return {
    name: meta.name,
    language: meta.language,
    description: `${meta.description} (${records.length}${meta.countUnit})`,
    icon_name: meta.iconName,
    words: [...records],
  } satisfies WordListArtifact;
}

export function buildArtifact(
  items: readonly Item[],
  checkpoint: Checkpoint,
  meta: ArtifactMeta,
): WordListArtifact {
  return emitArtifact(sortRecords(mergeRecords(items, checkpoint)), meta);
}

export function serializeArtifact(artifact: WordListArtifact): string {
  return `${JSON.stringify(artifact, null, 2)}\n`;
}

export async function writeArtifact(filePath: string, artifact: WordListArtifact): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.${process.pid}.tmp`;
  try {
    await writeFile(tempPath, serializeArtifact(artifact), "utf8");
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

export interface ArtifactStats {
  totalWords: number;
  withPhonetic: number;
  withExamples: number;
}

export function summariseArtifact(artifact: WordListArtifact, minExamples = 2): ArtifactStats {
  let withPhonetic = 0;
  let withExamples = 0;
  for (const record of artifact.words) {
    if ("phonetic" in record && record.phonetic) withPhonetic += 1;
    if (record.examples.length >= minExamples) withExamples += 1;
  }
  return { totalWords: artifact.words.length, withPhonetic, withExamples };
}
