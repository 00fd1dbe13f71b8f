import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  findWordListFiles,
  validateWordList,
  validateWordListFile,
} from '../../scripts/enrichment/validate-wordlist';

const completeWord = {
  word: 'cat',
  translation: '猫',
  part_of_speech: 'n.',
  phonetic: '/kæt/',
  examples: [
    { sentence: 'The cat sleeps.', translation: '猫在睡觉。' },
    { sentence: 'I have a cat.', translation: '我有一只猫。' },
  ],
};

describe('validateWordList', () => {
  it('passes a complete lexical list', () => {
    const result = validateWordList(
      { name: 'List', language: 'en', words: [completeWord, { ...completeWord, word: 'dog' }] },
      'list.json',
    );

    expect(result).toEqual({
      filePath: 'list.json',
      totalWords: 2,
      uniqueWords: 2,
      duplicateCount: 0,
      issues: [],
      valid: true,
    });
  });

  it('reports metadata, duplicates and incomplete entries', () => {
    const result = validateWordList(
      {
        words: [
          completeWord,
          { ...completeWord, word: 'Cat' },
          { word: 'dog', translation: '', phonetic: 'dɒɡ', examples: [{ sentence: 'A dog.' }] },
          { word: '' },
        ],
      },
      'list.json',
    );

    expect(result.issues).toEqual([
      "Missing 'name' field in metadata",
      "Missing 'language' field in metadata",
      '[2] Duplicate: Cat',
      '[3] Missing translation: dog',
      '[3] Invalid phonetic format for: dog (got: dɒɡ)',
      '[3] <2 examples: dog (has 1)',
      "[3] Example 1 missing 'translation' for: dog",
      "[4] Missing 'word' field",
    ]);
    expect(result).toMatchObject({ totalWords: 4, uniqueWords: 2, duplicateCount: 2, valid: false });
  });

  it('accepts kana phonetics in Japanese lists and checks kanji readings', () => {
    const result = validateWordList(
      {
        name: 'Kanji',
        language: 'ja',
        words: [
          { word: '猫', translation: '猫', phonetic: 'ねこ', examples: completeWord.examples },
          {
            word: '日',
            translation: '日；太阳',
            onyomi: '',
            kunyomi: '',
            examples: [
              { word: '日本', reading: 'にほん', translation: '日本' },
              { word: '毎日', translation: '每天' },
            ],
          },
        ],
      },
      'kanji.json',
    );

    expect(result.issues).toEqual([
      '[2] Missing readings: 日',
      "[2] Example 2 missing 'reading' for: 日",
    ]);
  });

  it('rejects a file that is not a word list', () => {
    expect(validateWordList([1, 2], 'bad.json').issues).toEqual([
      "Word list is not an object with a 'words' array",
    ]);
  });
});

describe('word list files', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(tmpdir(), 'wordlists-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('finds JSON files recursively and validates them from disk', async () => {
    await mkdir(path.join(tempDir, 'english'));
    const filePath = path.join(tempDir, 'english', 'cet4.json');
    await writeFile(filePath, JSON.stringify({ name: 'CET-4', language: 'en', words: [completeWord] }), 'utf8');
    await writeFile(path.join(tempDir, 'README.md'), '# lists', 'utf8');

    expect(await findWordListFiles(tempDir)).toEqual([filePath]);
    expect((await validateWordListFile(filePath)).valid).toBe(true);
  });
});
