import { access, mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { Item } from '../../shared/enrichment';
import { CheckpointStore } from '../../scripts/enrichment/checkpoint';
import { CheckpointLockedError, SourceUnavailableError } from '../../scripts/enrichment/errors';
import {
  listDefinitionIds,
  loadListDefinition,
  resolveListPath,
  runEnrichment,
  type PipelineConfig,
} from '../../scripts/enrichment/pipeline';
import type { GeneratorCapability } from '../../scripts/enrichment/providers';
import type { SchedulerClock } from '../../scripts/enrichment/scheduler';

const clock: SchedulerClock = {
  now: () => 0,
  sleep: async () => {},
};

function generatedEntry(word: string, translation: string | null = `${word}-zh`) {
  return {
    word,
    ...(translation === null ? {} : { translation }),
    phonetic: `/${word}/`,
    examples: [
      { sentence: `${word} one.`, translation: 'a' },
      { sentence: `${word} two.`, translation: 'b' },
    ],
  };
}

function stubGenerator(respond: (items: readonly Item[]) => string = (items) =>
  JSON.stringify(items.map((item) => generatedEntry(item.displayForm)))) {
  const generate = vi.fn(async (items: readonly Item[]) => respond(items));
  const capability: GeneratorCapability = { available: true, generator: { id: 'stub', generate } };
  return { generate, capability };
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

describe('runEnrichment', () => {
  let tempDir: string;
  let listPath: string;
  let checkpointPath: string;
  let outputPath: string;

  function config(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
    return {
      list: listPath,
      listDir: path.join(tempDir, 'lists'),
      enableAi: true,
      provider: 'gemini',
      batchSize: 2,
      requestsPerMinute: 60,
      maxRetries: 0,
      retryDelayMs: 0,
      resume: true,
      sampleLimit: 0,
      validationPolicy: 'accept',
      ...overrides,
    };
  }

  async function readArtifact(): Promise<{ description: string; words: Array<Record<string, unknown>> }> {
    return JSON.parse(await readFile(outputPath, 'utf8'));
  }

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(tmpdir(), 'pipeline-'));
    await mkdir(path.join(tempDir, 'lists'));
    await mkdir(path.join(tempDir, 'sources'));
    listPath = path.join(tempDir, 'lists', 'sample.json');
    checkpointPath = path.join(tempDir, 'checkpoints', 'sample.jsonl');
    outputPath = path.join(tempDir, 'wordlists', 'sample.json');

    await writeFile(
      listPath,
      JSON.stringify({
        id: 'sample',
        domain: 'lexical',
        name: 'Sample list',
        language: 'en',
        description: 'Sample words',
        countUnit: ' words',
        iconName: 'school',
        source: '../sources/sample.json',
        checkpoint: '../checkpoints/sample.jsonl',
        output: '../wordlists/sample.json',
      }),
      'utf8',
    );
    await writeFile(
      path.join(tempDir, 'sources', 'sample.json'),
      JSON.stringify([
        { word: 'cat' },
        { word: 'dog', translations: ['狗'] },
        { word: 'Cat', translations: ['猫'] },
        { word: 'bird' },
        { word: 'ant' },
      ]),
      'utf8',
    );

    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
  });

  it('writes one artifact entry per distinct source id', async () => {
    const { generate, capability } = stubGenerator();

    const result = await runEnrichment(config(), { capability, clock });

    const artifact = await readArtifact();
    expect(artifact.words.map((entry) => entry.word)).toEqual(['ant', 'bird', 'cat', 'dog']);
    expect(artifact.description).toBe('Sample words (4 words)');
    expect(generate).toHaveBeenCalledTimes(2);
    expect(result).toMatchObject({ items: 4, pending: 4, generator: 'stub', outputPath });
    expect(result.stats).toEqual({ totalWords: 4, withPhonetic: 4, withExamples: 4 });
    expect(await exists(`${checkpointPath}.lock`)).toBe(false);
  });

  it('keeps a record with a missing translation and reports one issue for it', async () => {
    const { capability } = stubGenerator((items) =>
      JSON.stringify(
        items.map((item) =>
          generatedEntry(item.displayForm, item.id === 'bird' ? null : `${item.displayForm}-zh`),
        ),
      ),
    );

    const result = await runEnrichment(config(), { capability, clock });

    expect(result.scheduled?.issues.map((entry) => entry.issues)).toEqual([["Missing 'translation' for: bird"]]);
    const stored = (await new CheckpointStore(checkpointPath).load()).get('bird');
    expect(stored?.fields).toEqual({
      phonetic: '/bird/',
      examples: [
        { text: 'bird one.', translation: 'a' },
        { text: 'bird two.', translation: 'b' },
      ],
    });
    const bird = (await readArtifact()).words.find((entry) => entry.word === 'bird');
    expect(bird).toEqual({
      word: 'bird',
      translation: '',
      part_of_speech: '',
      phonetic: '/bird/',
      difficulty_level: 1,
      examples: [
        { sentence: 'bird one.', translation: 'a' },
        { sentence: 'bird two.', translation: 'b' },
      ],
    });
  });

  it('builds the artifact from fallbacks when no generator is available', async () => {
    const result = await runEnrichment(config(), {
      capability: { available: false, reason: 'AI generation disabled' },
    });

    expect(result).toMatchObject({ generator: null, skippedReason: 'AI generation disabled', scheduled: null });
    const dog = (await readArtifact()).words.find((entry) => entry.word === 'dog');
    expect(dog).toMatchObject({ translation: '狗', phonetic: '', examples: [] });
    expect(await exists(checkpointPath)).toBe(false);
  });

  it('only generates items missing from the checkpoint', async () => {
    await runEnrichment(config({ sampleLimit: 2 }), { capability: stubGenerator().capability, clock });
    const { generate, capability } = stubGenerator();

    const result = await runEnrichment(config(), { capability, clock });

    expect(result.pending).toBe(2);
    expect(generate.mock.calls.map(([items]) => items.map((item) => item.id))).toEqual([['bird', 'ant']]);
    expect((await new CheckpointStore(checkpointPath).load()).size).toBe(4);
  });

  it('regenerates everything in fresh mode and keeps the newest records', async () => {
    await runEnrichment(config(), { capability: stubGenerator().capability, clock });
    const { generate, capability } = stubGenerator((items) =>
      JSON.stringify(items.map((item) => generatedEntry(item.displayForm, `${item.displayForm}-v2`))),
    );

    const result = await runEnrichment(config({ resume: false }), { capability, clock });

    expect(result.pending).toBe(4);
    expect(generate).toHaveBeenCalledTimes(2);
    const cat = (await readArtifact()).words.find((entry) => entry.word === 'cat');
    expect(cat).toMatchObject({ translation: 'cat-v2' });
  });

  it('limits the run to the sample size', async () => {
    const { capability } = stubGenerator();

    const result = await runEnrichment(config({ sampleLimit: 1 }), { capability, clock });

    expect(result.items).toBe(1);
    expect((await readArtifact()).words.map((entry) => entry.word)).toEqual(['cat']);
  });

  it('aborts without writing the artifact when a batch fails', async () => {
    const { capability, generate } = stubGenerator();
    generate
      .mockImplementationOnce(async (items) => JSON.stringify(items.map((item) => generatedEntry(item.displayForm))))
      .mockRejectedValueOnce(new Error('quota exceeded'));

    await expect(runEnrichment(config(), { capability, clock })).rejects.toMatchObject({
      name: 'BatchFailedError',
      batchNumber: 2,
      lastCompletedBatch: 1,
    });
    expect(await exists(outputPath)).toBe(false);
    expect(Array.from((await new CheckpointStore(checkpointPath).load()).keys())).toEqual(['cat', 'dog']);
    expect(await exists(`${checkpointPath}.lock`)).toBe(false);
  });

  it('refuses to start while another run holds the checkpoint', async () => {
    const lock = await new CheckpointStore(checkpointPath).acquireLock();
    const { generate, capability } = stubGenerator();

    await expect(runEnrichment(config(), { capability, clock })).rejects.toBeInstanceOf(CheckpointLockedError);
    expect(generate).not.toHaveBeenCalled();

    await lock.release();
  });

  it('resumes after an interrupted run left its lock behind', async () => {
    await runEnrichment(config({ sampleLimit: 2 }), { capability: stubGenerator().capability, clock });
    await writeFile(`${checkpointPath}.lock`, JSON.stringify({ pid: 424242, acquiredAt: '2024-01-01T00:00:00.000Z' }), 'utf8');
    vi.spyOn(process, 'kill').mockImplementation(() => {
      throw Object.assign(new Error('kill ESRCH'), { code: 'ESRCH' });
    });
    const { generate, capability } = stubGenerator();

    const result = await runEnrichment(config(), { capability, clock });

    expect(result.pending).toBe(2);
    expect(generate.mock.calls.map(([items]) => items.map((item) => item.id))).toEqual([['bird', 'ant']]);
    expect(await exists(`${checkpointPath}.lock`)).toBe(false);
  });

  it('fails before any generator call when the source is unavailable', async () => {
    await rm(path.join(tempDir, 'sources', 'sample.json'));
    const { generate, capability } = stubGenerator();

    await expect(runEnrichment(config(), { capability, clock })).rejects.toBeInstanceOf(SourceUnavailableError);
    expect(generate).not.toHaveBeenCalled();
  });

  it('writes to an explicit output path', async () => {
    const override = path.join(tempDir, 'custom', 'out.json');

    const result = await runEnrichment(config({ outputPath: override }), {
      capability: stubGenerator().capability,
      clock,
    });

    expect(result.outputPath).toBe(override);
    expect(await exists(override)).toBe(true);
    expect(await exists(outputPath)).toBe(false);
  });
});

describe('list definitions', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(tmpdir(), 'lists-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('resolves ids inside the list directory and keeps explicit paths', () => {
    expect(resolveListPath('cet4', '/data/lists')).toBe(path.join('/data/lists', 'cet4.json'));
    expect(resolveListPath('custom/list.json', '/data/lists')).toBe(path.resolve('custom/list.json'));
  });

  it('applies defaults and resolves paths relative to the definition', async () => {
    const definitionPath = path.join(tempDir, 'kanji.json');
    await writeFile(
      definitionPath,
      JSON.stringify({
        id: 'kanji',
        domain: 'kanji',
        name: 'Kanji',
        language: 'ja',
        description: 'Kanji list',
        iconName: 'translate',
        source: 'kanji-source.json',
        checkpoint: 'progress/kanji.jsonl',
        output: '../out/kanji.json',
      }),
      'utf8',
    );

    const definition = await loadListDefinition(definitionPath);

    expect(definition).toMatchObject({
      countUnit: '',
      targetLanguage: 'Chinese',
      promptLanguage: 'English',
      requiredFields: [],
      sourcePath: path.join(tempDir, 'kanji-source.json'),
      checkpointPath: path.join(tempDir, 'progress', 'kanji.jsonl'),
      outputPath: path.resolve(tempDir, '..', 'out', 'kanji.json'),
    });
    expect(definition.batchSize).toBeUndefined();
  });

  it('reports a missing definition as unavailable source data', async () => {
    const definitionPath = path.join(tempDir, 'missing.json');

    const failure = loadListDefinition(definitionPath);

    await expect(failure).rejects.toBeInstanceOf(SourceUnavailableError);
    await expect(failure).rejects.toMatchObject({
      sourcePath: definitionPath,
      cause: expect.objectContaining({ code: 'ENOENT' }),
    });
  });

  it('reports an invalid definition as unavailable source data', async () => {
    const definitionPath = path.join(tempDir, 'broken.json');
    await writeFile(definitionPath, JSON.stringify({ id: 'broken', domain: 'audio' }), 'utf8');

    await expect(loadListDefinition(definitionPath)).rejects.toMatchObject({
      name: 'SourceUnavailableError',
      sourcePath: definitionPath,
    });
  });

  it('lists definition ids in name order', async () => {
    await writeFile(path.join(tempDir, 'b.json'), '{}', 'utf8');
    await writeFile(path.join(tempDir, 'a.json'), '{}', 'utf8');
    await writeFile(path.join(tempDir, 'notes.txt'), '', 'utf8');

    expect(await listDefinitionIds(tempDir)).toEqual(['a', 'b']);
  });
});
