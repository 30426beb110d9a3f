export interface Citation {
  /** Exact matched substring */
  rawText: string;
  bookToken: string;
  chapter: number;
  verseStart: number;
  /** Absent for a single verse */
  verseEnd?: number;
}

export interface BookEntry {
  canonicalId: number;
  shortName: string;
  longName: string;
  /** Lower-cased free-text names */
  aliases: ReadonlySet<string>;
}

export interface ResolvedReference {
  book: BookEntry;
  chapter: number;
  verseStart: number;
  verseEnd: number;
  text: string;
  /** Canonical form: `longName chapter:start[-end]` */
  reference: string;
}

export interface ReadingContent {
  date: string;
  sourceUrl: string;
  citation?: string;
  citationLink?: string;
  body: string;
  resolvedReference?: ResolvedReference;
}

export type ResolveFailure = 'NoCitation' | 'BookNotFound' | 'VerseRangeNotFound';

export type ResolveResult =
  | { success: true; reference: ResolvedReference }
  | { success: false; reason: ResolveFailure; citation?: Citation };

export function formatReference(bookName: string, chapter: number, verseStart: number, verseEnd: number): string {
  return verseEnd > verseStart ? `${bookName} ${chapter}:${verseStart}-${verseEnd}` : `${bookName} ${chapter}:${verseStart}`;
}
