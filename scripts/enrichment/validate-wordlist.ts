import { readFile, readdir } from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import { normaliseId } from "@shared/text-normalizer";

const entrySchema = z.record(z.string(), z.unknown());

const wordListFileSchema = z.object({
  name: z.unknown(),
  language: z.unknown(),
  words: z.array(entrySchema).default([]),
});

export interface WordListValidation {
  filePath: string;
  totalWords: number;
  uniqueWords: number;
  duplicateCount: number;
  issues: string[];
  valid: boolean;
}

function textOf(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

function isKanjiEntry(entry: Record<string, unknown>): boolean {
  return "onyomi" in entry || "kunyomi" in entry;
}

function examplesOf(entry: Record<string, unknown>): Record<string, unknown>[] {
  const parsed = z.array(entrySchema).safeParse(entry.examples);
  return parsed.success ? parsed.data : [];
}

/**
 * Re-checks a written artifact. Phonetic transcriptions are expected in IPA
 * slashes except for Japanese lists, where the generator returns kana.
 */
export function validateWordList(data: unknown, filePath: string): WordListValidation {
  const parsed = wordListFileSchema.safeParse(data);
  if (!parsed.success) {
    return {
      filePath,
      totalWords: 0,
      uniqueWords: 0,
      duplicateCount: 0,
      issues: ["Word list is not an object with a 'words' array"],
      valid: false,
    };
  }

  const { name, language, words } = parsed.data;
  const issues: string[] = [];
  const seen = new Set<string>();

  if (!textOf(name)) issues.push("Missing 'name' field in metadata");
  if (!textOf(language)) issues.push("Missing 'language' field in metadata");
  const checkIpa = textOf(language) !== "ja";

  for (const [index, entry] of words.entries()) {
    const ref = `[${index + 1}]`;
    const word = textOf(entry.word);
    const key = normaliseId(word);

    if (!key) {
      issues.push(`${ref} Missing 'word' field`);
      continue;
    }
    if (seen.has(key)) {
      issues.push(`${ref} Duplicate: ${word}`);
    }
    seen.add(key);

    if (!textOf(entry.translation)) {
      issues.push(`${ref} Missing translation: ${word}`);
    }

    const kanji = isKanjiEntry(entry);
    if (kanji) {
      if (!textOf(entry.onyomi) && !textOf(entry.kunyomi)) {
        issues.push(`${ref} Missing readings: ${word}`);
      }
    } else {
      const phonetic = textOf(entry.phonetic);
      if (!phonetic) {
        issues.push(`${ref} Missing phonetic: ${word}`);
      } else if (checkIpa && !phonetic.startsWith("/")) {
        issues.push(`${ref} Invalid phonetic format for: ${word} (got: ${phonetic})`);
      }
    }

    const examples = examplesOf(entry);
    if (examples.length < 2) {
      issues.push(`${ref} <2 examples: ${word} (has ${examples.length})`);
    }

    const exampleFields = kanji ? ["word", "reading", "translation"] : ["sentence", "translation"];
    for (const [exampleIndex, example] of examples.entries()) {
      for (const field of exampleFields) {
        if (!textOf(example[field])) {
          issues.push(`${ref} Example ${exampleIndex + 1} missing '${field}' for: ${word}`);
        }
      }
    }
  }

  return {
    filePath,
    totalWords: words.length,
    uniqueWords: seen.size,
    duplicateCount: words.length - seen.size,
    issues,
    valid: issues.length === 0,
  } satisfies WordListValidation;
}

export async function validateWordListFile(filePath: string): Promise<WordListValidation> {
  const raw: unknown = JSON.parse(await readFile(filePath, "utf8"));
  return validateWordList(raw, filePath);
}

export async function findWordListFiles(directory: string): Promise<string[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await findWordListFiles(fullPath)));
    } else if (entry.isFile() && entry.name.endsWith(".json")) {
      files.push(fullPath);
    }
  }
  return files.sort();
}
