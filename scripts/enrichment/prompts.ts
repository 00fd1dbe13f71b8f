import type { DomainContext, Item, KanjiItem, LexicalItem } from "@shared/enrichment";

function describeLexicalItem(item: LexicalItem): string {
  const details: string[] = [];
  if (item.reading) details.push(`reading: ${item.reading}`);
  if (item.partOfSpeech) details.push(`part of speech: ${item.partOfSpeech}`);
  return details.length ? `${item.displayForm} (${details.join("; ")})` : item.displayForm;
}

function describeKanjiItem(item: KanjiItem): string {
  return item.description ? `${item.displayForm} (${item.description})` : item.displayForm;
}

function buildLexicalPrompt(items: readonly LexicalItem[], context: DomainContext): string {
  const words = items.map(describeLexicalItem).join(", ");
  const level = context.level ? ` (${context.level})` : "";

  return `Generate learning data for these ${context.promptLanguage} words${level}: ${words}

For each word, provide:
1. A concise ${context.targetLanguage} translation
2. A phonetic transcription (IPA between slashes, e.g. /ɪɡˈzæmpəl/; use kana for Japanese)
3. Two simple, practical example sentences with ${context.targetLanguage} translations

Return a JSON array with this exact structure for each word:
[
  {
    "word": "example",
    "translation": "...",
    "phonetic": "/ɪɡˈzæmpəl/",
    "examples": [
      {"sentence": "This is an example sentence.", "translation": "..."},
      {"sentence": "Can you give me an example?", "translation": "..."}
    ]
  }
]

Requirements:
- "word" must repeat the word exactly as given
- Example sentences should be simple and suitable for learners
- Translations should be natural and accurate
- Each word MUST have exactly 2 examples
- Return ONLY the JSON array, no other text`;
}

function buildKanjiPrompt(items: readonly KanjiItem[], context: DomainContext): string {
  const kanji = items.map(describeKanjiItem).join(", ");
  const level = context.level ? ` (${context.level})` : "";

  return `Generate study data for these kanji${level}: ${kanji}

For each kanji, provide:
1. A concise ${context.targetLanguage} meaning
2. On'yomi readings in katakana and kun'yomi readings in hiragana (comma separated, empty string if none)
3. Two common example words using the kanji, each with its reading and ${context.targetLanguage} translation

Return a JSON array with this exact structure for each kanji:
[
  {
    "kanji": "日",
    "translation": "...",
    "onyomi": "ニチ, ジツ",
    "kunyomi": "ひ, か",
    "examples": [
      {"word": "日本", "reading": "にほん", "translation": "..."},
      {"word": "毎日", "reading": "まいにち", "translation": "..."}
    ]
  }
]

Requirements:
- "kanji" must repeat the character exactly as given
- Prefer everyday vocabulary for the example words
- Each kanji MUST have exactly 2 examples
- Return ONLY the JSON array, no other text`;
}

export function buildBatchPrompt(items: readonly Item[], context: DomainContext): string {
  if (context.domain === "kanji") {
    const kanji = items.filter((item): item is KanjiItem => item.domain === "kanji");
    return buildKanjiPrompt(kanji, context);
  }
  const words = items.filter((item): item is LexicalItem => item.domain === "lexical");
  return buildLexicalPrompt(words, context);
}
