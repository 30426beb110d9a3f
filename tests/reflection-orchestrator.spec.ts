import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { createReflectionDeps, generateReflection, openResolver } from '../src/features/llm/reflection-orchestrator.js';
import { GenerationPipeline } from '../src/features/llm/generation-pipeline.js';
import { PromptAssembler } from '../src/features/llm/prompt-templates.js';
import { MockBackend } from '../src/features/llm/providers.js';
import type { BackendResponse, GenerationBackend } from '../src/features/llm/types.js';
import { ReferenceResolver } from '../src/features/scripture/reference-resolver.js';
import { VerseStore } from '../src/features/scripture/verse-store.js';
import type { ReadingContent } from '../src/features/scripture/types.js';
import { loadConfig } from '../src/config.js';
import { GenerationExhaustedError } from '../src/utils/errors.js';
import { globalErrorReporter, ErrorCategory } from '../src/utils/error-reporter.js';
import { buildCorpus } from './fixtures/corpus.js';

const settings = {
  temperature: 0.7,
  retryTemperature: 0.4,
  maxOutputTokens: 1000,
  maxOutputTokensCeiling: 4096,
  backoffMs: 0,
  promptPrefixChars: 100,
  promptSuffixChars: 50,
};

const reading: ReadingContent = {
  date: '2024-05-01',
  sourceUrl: 'https://example.org/readings/2024-05-01',
  citation: 'Matthew 5:3-4',
  body: 'Blessed are the poor in spirit.',
};

describe('generateReflection', () => {
  let store: VerseStore;

  beforeAll(async () => {
    store = await VerseStore.open({ data: await buildCorpus() });
  });

  afterAll(() => store.close());

  it('enriches, assembles and generates', async () => {
    const backend = new MockBackend();
    const result = await generateReflection(reading, {
      resolver: new ReferenceResolver(store),
      assembler: new PromptAssembler({ defaultTemplate: 'Reflect on {date}\n{body}' }),
      pipeline: new GenerationPipeline(backend, settings),
    });

    expect(result.content.resolvedReference?.reference).toBe('Matthew 5:3-4');
    expect(reading.resolvedReference).toBeUndefined();
    expect(result.prompt).toBe(
      'Reflect on 2024-05-01\nDate: 2024-05-01\n\nCitation: Matthew 5:3-4\n\nBlessed are the poor in spirit.\n\n' +
      'Vietnamese text (Bản Việt ngữ) - Matthew 5:3-4:\nPhúc thay người nghèo. Phúc thay người hiền.',
    );
    expect(result.text).toBe(`[MOCK t=0.7 max=1000] ${result.prompt.slice(0, 120)}`);
    expect(result.attempts).toHaveLength(1);
    expect(backend.calls).toBe(1);
  });

  it('uses the reading as given without a resolver', async () => {
    const result = await generateReflection(reading, {
      assembler: new PromptAssembler({ defaultTemplate: '{date}: {body}' }),
      pipeline: new GenerationPipeline(new MockBackend(), settings),
      template: '{date} / {body}',
    });
    expect(result.content.resolvedReference).toBeUndefined();
    expect(result.prompt).toBe('2024-05-01 / Date: 2024-05-01\n\nCitation: Matthew 5:3-4\n\nBlessed are the poor in spirit.');
  });

  it('propagates terminal generation failures', async () => {
    const silent: GenerationBackend = {
      name: 'silent',
      generate: async (): Promise<BackendResponse> => ({ candidates: [] }),
    };
    await expect(generateReflection(reading, {
      assembler: new PromptAssembler(),
      pipeline: new GenerationPipeline(silent, settings),
    })).rejects.toBeInstanceOf(GenerationExhaustedError);
  });
});

describe('createReflectionDeps', () => {
  it('carries on without enrichment when the corpus is missing', async () => {
    const config = loadConfig({ BIBLE_DB_PATH: '/nonexistent/bible.SQLite3' });
    const opened = await openResolver(config);
    expect(opened).toEqual({});
    const reports = globalErrorReporter.getReports();
    expect(reports).toHaveLength(1);
    expect(reports[0]?.category).toBe(ErrorCategory.STORAGE);

    const deps = await createReflectionDeps(config, new MockBackend());
    expect(deps.resolver).toBeUndefined();
    expect(deps.store).toBeUndefined();
    const result = await generateReflection(reading, deps);
    expect(result.text.startsWith('[MOCK t=0.7 max=2048] Please create a thoughtful')).toBe(true);
  });
});
