import { z } from "zod";

import type {
  EnrichmentDomain,
  EnrichmentExample,
  EnrichmentRecord,
  Item,
  KanjiItem,
  KanjiOutputRecord,
  LexicalItem,
  LexicalOutputRecord,
  OutputRecord,
  RecordProvenance,
  SentenceExample,
} from "@shared/enrichment";
import { normaliseId, normaliseText } from "@shared/text-normalizer";

const SOURCE_TRANSLATION_SEPARATOR = "；";
const FALLBACK_PHRASE_LIMIT = 2;

const optionalText = z.preprocess(
  (value) => (typeof value === "string" ? normaliseText(value) ?? undefined : undefined),
  z.string().optional(),
);

const generatedExampleSchema = z.object({
  sentence: optionalText,
  word: optionalText,
  reading: optionalText,
  translation: optionalText,
  translation_cn: optionalText,
});

const generatedEntrySchema = z.object({
  word: optionalText,
  kanji: optionalText,
  translation: optionalText,
  translation_cn: optionalText,
  phonetic: optionalText,
  onyomi: optionalText,
  kunyomi: optionalText,
  examples: z.array(z.unknown()).catch([]),
});

type GeneratedEntry = z.infer<typeof generatedEntrySchema>;

/**
 * Capability each domain variant provides to the scheduler and the output
 * builder. The variant is chosen by the item's `domain` tag.
 */
export interface DomainAdapter<TItem extends Item, TOutput extends OutputRecord> {
  readonly domain: TItem["domain"];
  primaryIdentifier(item: TItem): string;
  identifierFromGenerated(entry: GeneratedEntry): string | undefined;
  exampleFromGenerated(example: z.infer<typeof generatedExampleSchema>): EnrichmentExample;
  mergeInto(item: TItem, record: EnrichmentRecord | undefined): TOutput;
}

function fieldsOf(item: Item, record: EnrichmentRecord | undefined) {
  return record && record.domain === item.domain ? record.fields : undefined;
}

const COMPLEX_SUFFIXES = ["tion", "sion", "ment", "ness", "ical", "ious", "eous"];

/** 1 for short words, 3 for long words or complex suffixes, otherwise 2. */
export function estimateDifficulty(word: string): number {
  if (word.length <= 5) {
    return 1;
  }
  const lower = word.toLowerCase();
  if (word.length >= 10 || COMPLEX_SUFFIXES.some((suffix) => lower.endsWith(suffix))) {
    return 3;
  }
  return 2;
}

export const lexicalAdapter: DomainAdapter<LexicalItem, LexicalOutputRecord> = {
  domain: "lexical",
  primaryIdentifier: (item) => item.id,
  identifierFromGenerated: (entry) => entry.word,
  exampleFromGenerated: (example) => ({
    text: example.sentence,
    translation: example.translation ?? example.translation_cn,
  }),
  mergeInto(item, record) {
    const fields = fieldsOf(item, record);
    const generatedExamples: SentenceExample[] = (fields?.examples ?? []).map((example) => ({
      sentence: example.text ?? "",
      translation: example.translation ?? "",
    }));
    const phraseExamples: SentenceExample[] = item.phrases
      .slice(0, FALLBACK_PHRASE_LIMIT)
      .filter((phrase) => phrase.phrase)
      .map((phrase) => ({ sentence: phrase.phrase, translation: phrase.translation }));

    return {
      word: item.displayForm,
      translation: fields?.translation || item.translations.join(SOURCE_TRANSLATION_SEPARATOR),
      part_of_speech: item.partOfSpeech ?? "",
      phonetic: fields?.phonetic ?? "",
      ...(item.reading ? { reading: item.reading } : {}),
      ...(item.level ? { level: item.level } : {}),
      difficulty_level: item.difficulty ?? estimateDifficulty(item.displayForm),
      examples: generatedExamples.length ? generatedExamples : phraseExamples,
    } satisfies LexicalOutputRecord;
  },
};

export const kanjiAdapter: DomainAdapter<KanjiItem, KanjiOutputRecord> = {
  domain: "kanji",
  primaryIdentifier: (item) => item.id,
  identifierFromGenerated: (entry) => entry.kanji ?? entry.word,
  exampleFromGenerated: (example) => ({
    text: example.word,
    reading: example.reading,
    translation: example.translation ?? example.translation_cn,
  }),
  mergeInto(item, record) {
    const fields = fieldsOf(item, record);
    return {
      word: item.displayForm,
      translation: fields?.translation ?? "",
      onyomi: fields?.onyomi ?? "",
      kunyomi: fields?.kunyomi ?? "",
      strokes: item.strokes,
      frequency: item.frequency,
      ...(item.level ? { level: item.level } : {}),
      ...(typeof item.difficulty === "number" ? { difficulty_level: item.difficulty } : {}),
      examples: (fields?.examples ?? []).map((example) => ({
        word: example.text ?? "",
        reading: example.reading ?? "",
        translation: example.translation ?? "",
      })),
    } satisfies KanjiOutputRecord;
  },
};

type AnyAdapter = typeof lexicalAdapter | typeof kanjiAdapter;

const ADAPTERS: Record<EnrichmentDomain, AnyAdapter> = {
  lexical: lexicalAdapter,
  kanji: kanjiAdapter,
};

export function primaryIdentifier(item: Item): string {
  switch (item.domain) {
    case "lexical":
      return lexicalAdapter.primaryIdentifier(item);
    case "kanji":
      return kanjiAdapter.primaryIdentifier(item);
  }
}

export function mergeInto(item: Item, record: EnrichmentRecord | undefined): OutputRecord {
  switch (item.domain) {
    case "lexical":
      return lexicalAdapter.mergeInto(item, record);
    case "kanji":
      return kanjiAdapter.mergeInto(item, record);
  }
}

/**
 * Maps one parsed generator entry onto an enrichment record, or `null` when
 * the entry is not an object or carries no identifier.
 */
export function recordFromGenerated(
  domain: EnrichmentDomain,
  raw: unknown,
  provenance: RecordProvenance,
): EnrichmentRecord | null {
  const parsed = generatedEntrySchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }

  const adapter = ADAPTERS[domain];
  const entry = parsed.data;
  const id = normaliseId(adapter.identifierFromGenerated(entry));
  if (!id) {
    return null;
  }

  const examples: EnrichmentExample[] = [];
  for (const rawExample of entry.examples) {
    const example = generatedExampleSchema.safeParse(rawExample);
    if (example.success) {
      examples.push(adapter.exampleFromGenerated(example.data));
    }
  }

  const translation = entry.translation ?? entry.translation_cn;
  return {
    domain,
    id,
    fields: {
      ...(translation ? { translation } : {}),
      ...(entry.phonetic ? { phonetic: entry.phonetic } : {}),
      ...(entry.onyomi ? { onyomi: entry.onyomi } : {}),
      ...(entry.kunyomi ? { kunyomi: entry.kunyomi } : {}),
      examples,
    },
    provenance,
  } satisfies EnrichmentRecord;
}
