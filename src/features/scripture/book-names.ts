import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { BookEntry } from './types.js';

const BookRowSchema = z.object({
  canonicalId: z.number().int().positive(),
  shortName: z.string().min(1),
  longName: z.string().min(1),
  aliases: z.array(z.string().min(1)),
});
const BookTableSchema = z.array(BookRowSchema).superRefine((rows, ctx) => {
  const seen = new Set<number>();
  rows.forEach((r, i) => {
    if (seen.has(r.canonicalId)) ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, 'canonicalId'], message: `duplicate canonicalId ${r.canonicalId}` });
    seen.add(r.canonicalId);
  });
});
const AliasMapSchema = z.record(z.string().min(1));

export type BookRow = z.infer<typeof BookRowSchema>;

const lower = (s: string) => s.trim().toLowerCase();

/**
 * Bidirectional book-name table. Entry order is significant: `lookupAlias`
 * returns the first entry whose names contain the text, so the order in
 * data/books.json is the tie-break for short, ambiguous aliases.
 */
export class BookNameTable {
  private readonly table: readonly BookEntry[];
  private readonly canonicalNames: ReadonlyMap<string, string>;

  constructor(rows: BookRow[], aliasMap: Record<string, string>) {
    this.table = BookTableSchema.parse(rows).map(r => ({
      canonicalId: r.canonicalId,
      shortName: r.shortName,
      longName: r.longName,
      aliases: new Set(r.aliases.map(lower)),
    }));
    this.canonicalNames = new Map(Object.entries(AliasMapSchema.parse(aliasMap)).map(([k, v]) => [lower(k), v]));
  }

  entries(): readonly BookEntry[] {
    return this.table;
  }

  /** Case-insensitive containment of `text` in a name or alias; first entry wins. */
  lookupAlias(text: string): BookEntry | undefined {
    const needle = lower(text);
    if (!needle) return undefined;
    return this.table.find(e =>
      lower(e.shortName).includes(needle) ||
      lower(e.longName).includes(needle) ||
      [...e.aliases].some(a => a.includes(needle)));
  }

  /** Exact alias → canonical name; undefined means keep the token as written. */
  normalize(token: string): string | undefined {
    return this.canonicalNames.get(lower(token));
  }
}

function readJson(file: string): unknown {
  return JSON.parse(readFileSync(new URL(`./data/${file}`, import.meta.url), 'utf-8'));
}

let defaultTable: BookNameTable | undefined;

/** Table built from the bundled English/Vietnamese data files. */
export function loadDefaultBookNameTable(): BookNameTable {
  if (!defaultTable) {
    defaultTable = new BookNameTable(BookTableSchema.parse(readJson('books.json')), AliasMapSchema.parse(readJson('book-aliases.json')));
  }
  return defaultTable;
}
