export type EnrichmentDomain = "lexical" | "kanji";
export type ValidationPolicy = "accept" | "reject";
export type GeneratorProviderId = "gemini" | "openai";

export interface SourcePhrase {
  phrase: string;
  translation: string;
}

export interface LexicalItem {
  domain: "lexical";
  id: string;
  displayForm: string;
  reading?: string | null;
  partOfSpeech?: string | null;
  translations: string[];
  phrases: SourcePhrase[];
  level?: string | null;
  difficulty?: number | null;
}

export interface KanjiItem {
  domain: "kanji";
  id: string;
  displayForm: string;
  strokes: number | null;
  frequency: number | null;
  level?: string | null;
  difficulty?: number | null;
  description?: string | null;
}

export type Item = LexicalItem | KanjiItem;

export interface EnrichmentExample {
  text?: string;
  reading?: string;
  translation?: string;
}

export interface EnrichmentFields {
  translation?: string;
  phonetic?: string;
  onyomi?: string;
  kunyomi?: string;
  examples: EnrichmentExample[];
}

export interface RecordProvenance {
  generator: string;
  model?: string;
  batchId: string;
  generatedAt: string;
}

export interface EnrichmentRecord {
  domain: EnrichmentDomain;
  id: string;
  fields: EnrichmentFields;
  provenance: RecordProvenance;
}

export type Checkpoint = Map<string, EnrichmentRecord>;

export interface SentenceExample {
  sentence: string;
  translation: string;
}

export interface KanjiWordExample {
  word: string;
  reading: string;
  translation: string;
}

export interface LexicalOutputRecord {
  word: string;
  translation: string;
  part_of_speech: string;
  phonetic: string;
  reading?: string;
  level?: string;
  difficulty_level?: number;
  examples: SentenceExample[];
}

export interface KanjiOutputRecord {
  word: string;
  translation: string;
  onyomi: string;
  kunyomi: string;
  strokes: number | null;
  frequency: number | null;
  level?: string;
  difficulty_level?: number;
  examples: KanjiWordExample[];
}

export type OutputRecord = LexicalOutputRecord | KanjiOutputRecord;

export interface ArtifactMeta {
  name: string;
  language: string;
  description: string;
  countUnit: string;
  iconName: string;
}

export interface WordListArtifact {
  name: string;
  language: string;
  description: string;
  icon_name: string;
  words: OutputRecord[];
}

/**
 * Context handed to a generator alongside each batch. `targetLanguage` is the
 * language translations are written in, `promptLanguage` the language of the
 * items themselves.
 */
export interface DomainContext {
  domain: EnrichmentDomain;
  listId: string;
  level?: string;
  promptLanguage: string;
  targetLanguage: string;
}
