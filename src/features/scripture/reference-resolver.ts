import { BookNameTable, loadDefaultBookNameTable } from './book-names.js';
import { CitationExtractor } from './citation-extractor.js';
import type { VerseStore } from './verse-store.js';
import { formatReference } from './types.js';
import type { BookEntry, Citation, ReadingContent, ResolveResult, ResolvedReference } from './types.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('resolver');

export interface ReferenceResolverOptions {
  books?: BookNameTable;
  extractor?: CitationExtractor;
}

/**
 * Turns a citation (or free text containing one) into verse text from the
 * corpus. Holds no per-call state; results are built fresh on every call.
 */
export class ReferenceResolver {
  private readonly books: BookNameTable;
  private readonly extractor: CitationExtractor;

  constructor(private readonly store: VerseStore, opts: ReferenceResolverOptions = {}) {
    this.books = opts.books ?? loadDefaultBookNameTable();
    this.extractor = opts.extractor ?? new CitationExtractor();
  }

  resolve(input: string | Citation): ResolvedReference | undefined {
    const result = this.tryResolve(input);
    return result.success ? result.reference : undefined;
  }

  tryResolve(input: string | Citation): ResolveResult {
    const citation = typeof input === 'string' ? this.extractor.extractFirst(input) : input;
    if (!citation) {
      log.debug('citation:none', { input: typeof input === 'string' ? input.slice(0, 80) : undefined });
      return { success: false, reason: 'NoCitation' };
    }

    const bookNumber = this.findBookNumber(citation.bookToken);
    if (bookNumber === undefined) {
      log.warn('book:not_found', { book: citation.bookToken });
      return { success: false, reason: 'BookNotFound', citation };
    }

    const verseEnd = citation.verseEnd ?? citation.verseStart;
    const text = this.store.getVerses(bookNumber, citation.chapter, citation.verseStart, verseEnd);
    if (text === undefined) {
      return { success: false, reason: 'VerseRangeNotFound', citation };
    }

    const book = this.bookEntry(bookNumber, citation.bookToken);
    const reference = formatReference(book.longName, citation.chapter, citation.verseStart, verseEnd);
    log.debug('resolved', { reference, bookNumber });
    return {
      success: true,
      reference: { book, chapter: citation.chapter, verseStart: citation.verseStart, verseEnd, text, reference },
    };
  }

  /** Copy of `content` carrying the resolved reference, when its citation (or body) resolves. */
  enrich(content: ReadingContent): ReadingContent {
    const source = content.citation?.trim() ? content.citation : content.body;
    const reference = this.resolve(source);
    if (!reference) return { ...content };
    return { ...content, resolvedReference: reference };
  }

  // Normalized name, then the token as written.
  private findBookNumber(token: string): number | undefined {
    for (const name of new Set([this.books.normalize(token) ?? token, token])) {
      const n = this.store.findBookNumber(name);
      if (n !== undefined) return n;
    }
    return undefined;
  }

  private bookEntry(bookNumber: number, token: string): BookEntry {
    const stored = this.store.getBook(bookNumber);
    const known = this.books.entries().find(e => e.canonicalId === bookNumber);
    const aliases = known?.aliases ?? new Set<string>();
    if (stored) {
      return { ...stored, longName: stored.longName || stored.shortName || token, aliases };
    }
    return known ?? { canonicalId: bookNumber, shortName: token, longName: token, aliases };
  }
}
