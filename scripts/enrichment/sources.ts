import { readFile } from "node:fs/promises";

import { z } from "zod";

import type {
  EnrichmentDomain,
  Item,
  KanjiItem,
  LexicalItem,
  SourcePhrase,
} from "@shared/enrichment";
import { normaliseId, normaliseText } from "@shared/text-normalizer";

import { SourceUnavailableError } from "./errors";

const optionalString = z.string().nullish();
const optionalNumber = z.number().int().nullish();

export const lexicalSourceEntrySchema = z.object({
  word: z.string(),
  reading: optionalString,
  part_of_speech: optionalString,
  translations: z.array(z.string()).default([]),
  phrases: z.array(z.object({ phrase: z.string(), translation: z.string().default("") })).default([]),
  level: optionalString,
  difficulty: optionalNumber,
});

export const kanjiSourceEntrySchema = z.object({
  kanji: z.string(),
  strokes: optionalNumber,
  frequency: optionalNumber,
  level: optionalString,
  difficulty: optionalNumber,
  description: optionalString,
});

export type LexicalSourceEntry = z.input<typeof lexicalSourceEntrySchema>;
export type KanjiSourceEntry = z.input<typeof kanjiSourceEntrySchema>;

export interface SourceDefaults {
  level?: string | null;
  difficulty?: number | null;
}

function pushUnique<T>(target: T[], value: T, key: (entry: T) => string): void {
  const candidate = key(value);
  if (!target.some((entry) => key(entry) === candidate)) {
    target.push(value);
  }
}

/**
 * Collapses entries that share a case-insensitive identifier. The first entry
 * keeps its display form; translations and phrases of later duplicates are
 * merged in order.
 */
export function dedupeLexicalEntries(
  entries: readonly LexicalSourceEntry[],
  defaults: SourceDefaults = {},
): LexicalItem[] {
  const items = new Map<string, LexicalItem>();

  for (const rawEntry of entries) {
    const entry = lexicalSourceEntrySchema.parse(rawEntry);
    const displayForm = normaliseText(entry.word);
    const id = normaliseId(entry.word);
    if (!displayForm || !id) {
      continue;
    }

    let item = items.get(id);
    if (!item) {
      item = {
        domain: "lexical",
        id,
        displayForm,
        reading: normaliseText(entry.reading),
        partOfSpeech: normaliseText(entry.part_of_speech),
        translations: [],
        phrases: [],
        level: normaliseText(entry.level) ?? defaults.level ?? null,
        difficulty: entry.difficulty ?? defaults.difficulty ?? null,
      };
      items.set(id, item);
    }

    for (const translation of entry.translations) {
      const text = normaliseText(translation);
      if (text) {
        pushUnique(item.translations, text, (value) => value);
      }
    }
    for (const phrase of entry.phrases) {
      const text = normaliseText(phrase.phrase);
      if (text) {
        const normalised: SourcePhrase = { phrase: text, translation: normaliseText(phrase.translation) ?? "" };
        pushUnique(item.phrases, normalised, (value) => `${value.phrase}::${value.translation}`);
      }
    }
  }

  return Array.from(items.values());
}

export function dedupeKanjiEntries(
  entries: readonly KanjiSourceEntry[],
  defaults: SourceDefaults = {},
): KanjiItem[] {
  const items = new Map<string, KanjiItem>();

  for (const rawEntry of entries) {
    const entry = kanjiSourceEntrySchema.parse(rawEntry);
    const displayForm = normaliseText(entry.kanji);
    const id = normaliseId(entry.kanji);
    if (!displayForm || !id || items.has(id)) {
      continue;
    }
    items.set(id, {
      domain: "kanji",
      id,
      displayForm,
      strokes: entry.strokes ?? null,
      frequency: entry.frequency ?? null,
      level: normaliseText(entry.level) ?? defaults.level ?? null,
      difficulty: entry.difficulty ?? defaults.difficulty ?? null,
      description: normaliseText(entry.description),
    });
  }

  return Array.from(items.values());
}

/**
 * Reads a normalised source file (a JSON array of entries for one domain).
 * Anything unreadable is fatal: the run cannot start without its items.
 */
export async function loadSourceItems(
  filePath: string,
  domain: EnrichmentDomain,
  defaults: SourceDefaults = {},
): Promise<Item[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(filePath, "utf8"));
  } catch (error) {
    throw new SourceUnavailableError(filePath, { cause: error });
  }

  if (domain === "kanji") {
    const parsed = z.array(kanjiSourceEntrySchema).safeParse(raw);
    if (!parsed.success) {
      throw new SourceUnavailableError(filePath, { cause: parsed.error });
    }
    return dedupeKanjiEntries(parsed.data, defaults);
  }

  const parsed = z.array(lexicalSourceEntrySchema).safeParse(raw);
  if (!parsed.success) {
    throw new SourceUnavailableError(filePath, { cause: parsed.error });
  }
  return dedupeLexicalEntries(parsed.data, defaults);
}
