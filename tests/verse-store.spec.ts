import { describe, it, expect, beforeAll, afterEach } from 'vitest';
import { VerseStore } from '../src/features/scripture/verse-store.js';
import { StoreUnavailableError } from '../src/utils/errors.js';
import { globalErrorReporter, ErrorCategory } from '../src/utils/error-reporter.js';
import { buildCorpus } from './fixtures/corpus.js';

describe('VerseStore', () => {
  let corpus: Uint8Array;
  let store: VerseStore | undefined;

  beforeAll(async () => {
    corpus = await buildCorpus();
  });

  afterEach(() => {
    store?.close();
    store = undefined;
  });

  async function openStore(): Promise<VerseStore> {
    store = await VerseStore.open({ data: corpus });
    return store;
  }

  it('describes the corpus schema', async () => {
    const s = await openStore();
    expect(s.describeSchema()).toEqual({
      books: ['book_number', 'short_name', 'long_name'],
      info: ['name', 'value'],
      verses: ['book_number', 'chapter', 'verse', 'text'],
    });
  });

  it('finds book numbers case-insensitively', async () => {
    const s = await openStore();
    expect(s.findBookNumber('Matthew')).toBe(470);
    expect(s.findBookNumber('MATTHEW')).toBe(s.findBookNumber('matthew'));
    expect(s.findBookNumber('matt')).toBe(470);
    expect(s.findBookNumber('THƯ 1 GIOAN')).toBe(690);
  });

  it('returns the first book in corpus order for ambiguous names', async () => {
    const s = await openStore();
    expect(s.findBookNumber('gioan')).toBe(500);
  });

  it('matches nothing for blank or unknown names', async () => {
    const s = await openStore();
    expect(s.findBookNumber('   ')).toBeUndefined();
    expect(s.findBookNumber('Tobit')).toBeUndefined();
  });

  it('joins verses in order with single spaces, skipping empty ones', async () => {
    const s = await openStore();
    expect(s.getVerses(470, 5, 3, 8)).toBe(
      'Phúc thay người nghèo. Phúc thay người hiền. Phúc thay người khát khao. Phúc thay người trong sạch.',
    );
    expect(s.getVerses(500, 3, 16, 16)).toBe('Thiên Chúa yêu thế gian.');
  });

  it('returns undefined when no verse text remains', async () => {
    const s = await openStore();
    expect(s.getVerses(470, 5, 9, 9)).toBeUndefined();
    expect(s.getVerses(470, 5, 5, 5)).toBeUndefined();
    expect(s.getVerses(470, 28, 1, 3)).toBeUndefined();
  });

  it('lists books by number and fetches one', async () => {
    const s = await openStore();
    expect(s.listBooks().map(b => b.canonicalId)).toEqual([10, 470, 500, 690]);
    expect(s.getBook(470)).toEqual({ canonicalId: 470, shortName: 'Mt', longName: 'Matthew', aliases: new Set() });
    expect(s.getBook(999)).toBeUndefined();
  });

  it('reports query failures and degrades to absent results', async () => {
    store = await VerseStore.open({ data: await buildCorpus({ withVerses: false }) });
    expect(store.getVerses(470, 5, 3, 3)).toBeUndefined();
    const reports = globalErrorReporter.getReports();
    expect(reports).toHaveLength(1);
    expect(reports[0]?.category).toBe(ErrorCategory.STORAGE);
    expect(reports[0]?.context).toEqual({ op: 'getVerses', source: 'memory' });
  });

  it('closes idempotently and answers nothing afterwards', async () => {
    const s = await openStore();
    s.close();
    s.close();
    expect(s.isOpen).toBe(false);
    expect(s.findBookNumber('Matthew')).toBeUndefined();
    expect(s.listBooks()).toEqual([]);
  });

  it('fails to open a missing file', async () => {
    await expect(VerseStore.open({ path: '/nonexistent/bible.SQLite3' })).rejects.toBeInstanceOf(StoreUnavailableError);
  });

  it('fails to open bytes that are not a SQLite image', async () => {
    const garbage = new TextEncoder().encode('x'.repeat(4096));
    await expect(VerseStore.open({ data: garbage })).rejects.toThrow(/not a readable SQLite image/);
  });
});
