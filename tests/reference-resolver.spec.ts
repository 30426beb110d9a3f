import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { ReferenceResolver } from '../src/features/scripture/reference-resolver.js';
import { VerseStore } from '../src/features/scripture/verse-store.js';
import type { ReadingContent } from '../src/features/scripture/types.js';
import { buildCorpus } from './fixtures/corpus.js';

describe('ReferenceResolver', () => {
  let store: VerseStore;
  let resolver: ReferenceResolver;

  beforeAll(async () => {
    store = await VerseStore.open({ data: await buildCorpus() });
    resolver = new ReferenceResolver(store);
  });

  afterAll(() => store.close());

  it('resolves an English citation against an English-named book', () => {
    const ref = resolver.resolve('Matthew 5:3-8');
    expect(ref?.reference).toBe('Matthew 5:3-8');
    expect(ref?.text).toBe('Phúc thay người nghèo. Phúc thay người hiền. Phúc thay người khát khao. Phúc thay người trong sạch.');
    expect(ref?.book.canonicalId).toBe(470);
    expect(ref?.book.aliases).toEqual(new Set(['matthew', 'matt', 'mt']));
    expect([ref?.chapter, ref?.verseStart, ref?.verseEnd]).toEqual([5, 3, 8]);
  });

  it('is idempotent', () => {
    expect(resolver.resolve('Matthew 5:3-8')).toEqual(resolver.resolve('Matthew 5:3-8'));
  });

  it('resolves through the normalized name', () => {
    expect(resolver.resolve('Mt 5:4')?.reference).toBe('Matthew 5:4');
    const john = resolver.resolve('john 3:16');
    expect(john?.reference).toBe('Gioan 3:16');
    expect(john?.text).toBe('Thiên Chúa yêu thế gian.');
  });

  it('does not guess a book from partial alias matches', () => {
    expect(resolver.tryResolve('Jhn 3:16-17')).toEqual({
      success: false,
      reason: 'BookNotFound',
      citation: { rawText: 'Jhn 3:16-17', bookToken: 'Jhn', chapter: 3, verseStart: 16, verseEnd: 17 },
    });
  });

  it('leaves ordinary prose that looks like a citation unresolved', async () => {
    const only = await VerseStore.open({
      data: await buildCorpus({ books: [[470, 'Mt', 'Mátthêu']], verses: [[470, 5, 3, 'Phúc thay người nghèo.']] }),
    });
    try {
      const prose = new ReferenceResolver(only);
      expect(prose.tryResolve('Gather at 5:3 for morning prayer')).toMatchObject({ success: false, reason: 'BookNotFound' });
      const content: ReadingContent = { date: '2024-05-04', sourceUrl: '', body: 'Gather at 5:3 for morning prayer' };
      expect(prose.enrich(content).resolvedReference).toBeUndefined();
      expect(prose.resolve('Mt 5:3')?.reference).toBe('Mátthêu 5:3');
    } finally {
      only.close();
    }
  });

  it('accepts an already extracted citation', () => {
    const ref = resolver.resolve({ rawText: 'Ga 3:17', bookToken: 'Ga', chapter: 3, verseStart: 17 });
    expect(ref?.reference).toBe('Gioan 3:17');
    expect(ref?.verseEnd).toBe(17);
  });

  it('reports why resolution failed', () => {
    expect(resolver.tryResolve('no citation here')).toEqual({ success: false, reason: 'NoCitation' });
    expect(resolver.tryResolve('Tobit 1:1')).toMatchObject({ success: false, reason: 'BookNotFound' });
    const missing = resolver.tryResolve('Matthew 28:1');
    expect(missing).toEqual({
      success: false,
      reason: 'VerseRangeNotFound',
      citation: { rawText: 'Matthew 28:1', bookToken: 'Matthew', chapter: 28, verseStart: 1 },
    });
    expect(resolver.resolve('Matthew 28:1')).toBeUndefined();
  });

  it('enriches a copy of the reading', () => {
    const content: ReadingContent = {
      date: '2024-05-01',
      sourceUrl: 'https://example.org/readings/2024-05-01',
      citation: 'Matthew 5:3-4',
      body: 'Blessed are the poor in spirit.',
    };
    const enriched = resolver.enrich(content);
    expect(enriched).not.toBe(content);
    expect(content.resolvedReference).toBeUndefined();
    expect(enriched.resolvedReference?.reference).toBe('Matthew 5:3-4');
    expect(enriched.resolvedReference?.text).toBe('Phúc thay người nghèo. Phúc thay người hiền.');
  });

  it('looks for a citation in the body when none is given', () => {
    const enriched = resolver.enrich({ date: '2024-05-02', sourceUrl: '', body: 'Gospel: Ga 3:16' });
    expect(enriched.resolvedReference?.reference).toBe('Gioan 3:16');
  });

  it('returns an unchanged copy when nothing resolves', () => {
    const content: ReadingContent = { date: '2024-05-03', sourceUrl: '', citation: 'Tobit 1:1', body: 'Tobit 1:1' };
    const enriched = resolver.enrich(content);
    expect(enriched).toEqual(content);
    expect(enriched).not.toBe(content);
  });
});
