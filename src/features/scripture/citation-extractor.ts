import type { Citation } from './types.js';
import { logDebug } from '../../utils/logger.js';

// Book token: optional ordinal digit ("1 Cor", "2Tm") followed by one word of letters or hyphens.
const BOOK = String.raw`(\d?\s?[\p{L}-]+)`;
const RANGE_END = String.raw`(?:\s?[-–]\s?(\d+))?`;

/**
 * Recognized citation shapes, scanned in this order:
 *   "Matthew 5:3-8"   book chapter:verse[-verse]
 *   "1 Cor 13, 4-8"   book chapter, verse[-verse]
 */
export const CITATION_PATTERNS: readonly RegExp[] = [
  new RegExp(String.raw`${BOOK}\s+(\d+):(\d+)${RANGE_END}`, 'giu'),
  new RegExp(String.raw`${BOOK}\s+(\d+),\s*(\d+)${RANGE_END}`, 'giu'),
];

export interface CitationExtractorOptions {
  patterns?: readonly RegExp[];
  /** Collapse citations found by several patterns into the first one seen */
  dedupe?: boolean;
}

function toPositiveInt(digits: string | undefined): number | undefined {
  if (digits === undefined) return undefined;
  const n = Number(digits);
  return Number.isSafeInteger(n) && n >= 1 ? n : undefined;
}

/** Build a citation from a match, or undefined when a numeric field is unusable. */
function toCitation(m: RegExpMatchArray): Citation | undefined {
  const [raw, book, ch, vs, ve] = m;
  const bookToken = book?.trim();
  const chapter = toPositiveInt(ch);
  const verseStart = toPositiveInt(vs);
  if (!raw || !bookToken || chapter === undefined || verseStart === undefined) return undefined;
  if (ve === undefined) return { rawText: raw.trim(), bookToken, chapter, verseStart };
  const verseEnd = toPositiveInt(ve);
  if (verseEnd === undefined || verseEnd < verseStart) return undefined;
  return { rawText: raw.trim(), bookToken, chapter, verseStart, verseEnd };
}

export function citationKey(c: Citation): string {
  return `${c.bookToken.toLowerCase()}|${c.chapter}|${c.verseStart}|${c.verseEnd ?? c.verseStart}`;
}

export class CitationExtractor {
  private readonly patterns: readonly RegExp[];
  private readonly dedupe: boolean;

  constructor(opts: CitationExtractorOptions = {}) {
    this.patterns = opts.patterns ?? CITATION_PATTERNS;
    this.dedupe = opts.dedupe ?? false;
  }

  /**
   * Citations in pattern order, then match position. The returned iterable
   * rescans `text` every time it is iterated.
   */
  extract(text: string): Iterable<Citation> {
    return { [Symbol.iterator]: () => this.scan(text) };
  }

  extractAll(text: string): Citation[] {
    return [...this.extract(text)];
  }

  extractFirst(text: string): Citation | undefined {
    for (const c of this.extract(text)) return c;
    return undefined;
  }

  private *scan(text: string): Generator<Citation> {
    const seen = new Set<string>();
    for (const pattern of this.patterns) {
      const re = pattern.global ? new RegExp(pattern.source, pattern.flags) : new RegExp(pattern.source, `${pattern.flags}g`);
      for (const m of text.matchAll(re)) {
        const citation = toCitation(m);
        if (!citation) {
          logDebug('citations', 'malformed:dropped', { match: m[0] });
          continue;
        }
        if (this.dedupe) {
          const key = citationKey(citation);
          if (seen.has(key)) continue;
          seen.add(key);
        }
        yield citation;
      }
    }
  }
}
