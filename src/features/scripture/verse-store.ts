import { existsSync, readFileSync } from 'node:fs';
import { createRequire } from 'node:module';
import type { Database, SqlJsStatic, SqlValue, Statement } from 'sql.js';
import type { BookEntry } from './types.js';
import { StoreUnavailableError } from '../../utils/errors.js';
import { globalErrorReporter, ErrorCategory, ErrorSeverity } from '../../utils/error-reporter.js';
import { createLogger } from '../../utils/logger.js';

const require = createRequire(import.meta.url);
const log = createLogger('verse-store');

let sqlJsPromise: Promise<SqlJsStatic> | null = null;

/** sql.js runtime, initialised once per process. */
export function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJsPromise) {
    const init: () => Promise<SqlJsStatic> = require('sql.js');
    sqlJsPromise = init();
  }
  return sqlJsPromise;
}

export type VerseStoreSource = { path: string } | { data: Uint8Array };

const REQUIRED_TABLES = ['books', 'verses'];

function asNumber(v: SqlValue | undefined): number | undefined {
  if (typeof v === 'number') return v;
  if (typeof v === 'string' && v.trim() !== '' && Number.isFinite(Number(v))) return Number(v);
  return undefined;
}

function asText(v: SqlValue | undefined): string {
  if (typeof v === 'string') return v;
  if (typeof v === 'number') return String(v);
  return '';
}

function toBookEntry(row: SqlValue[]): BookEntry | undefined {
  const canonicalId = asNumber(row[0]);
  if (canonicalId === undefined) return undefined;
  return { canonicalId, shortName: asText(row[1]), longName: asText(row[2]), aliases: new Set() };
}

/**
 * Read-only view over a MyBible-style SQLite image:
 * `books(book_number, short_name, long_name)` and `verses(book_number, chapter, verse, text)`.
 * Query failures are reported and come back as absent results.
 */
export class VerseStore {
  private db: Database | undefined;

  private constructor(db: Database, readonly label: string) {
    this.db = db;
  }

  static async open(source: VerseStoreSource): Promise<VerseStore> {
    let bytes: Uint8Array;
    let label = 'memory';
    if ('path' in source) {
      label = source.path;
      if (!existsSync(source.path)) throw new StoreUnavailableError(`Bible database not found: ${source.path}`);
      try {
        bytes = readFileSync(source.path);
      } catch (err) {
        throw new StoreUnavailableError(`Bible database could not be read: ${source.path}`, err);
      }
    } else {
      bytes = source.data;
    }

    const SQL = await loadSqlJs();
    const db = new SQL.Database(bytes);
    try {
      // sql.js only validates the image on first use
      db.exec("SELECT name FROM sqlite_master WHERE type='table'");
    } catch (err) {
      db.close();
      throw new StoreUnavailableError(`Bible database is not a readable SQLite image: ${label}`, err);
    }

    const store = new VerseStore(db, label);
    const schema = store.describeSchema();
    const missing = REQUIRED_TABLES.filter(t => !(t in schema));
    if (missing.length) log.warn('schema:missing_tables', { source: label, missing });
    log.debug('open', { source: label, tables: schema });
    return store;
  }

  get isOpen(): boolean { return this.db !== undefined; }

  /** Case-insensitive substring match on short or long name; first row in corpus order. */
  findBookNumber(name: string): number | undefined {
    const needle = name.trim().toLowerCase();
    if (!needle) return undefined;
    const rows = this.query('findBookNumber', 'SELECT book_number, short_name, long_name FROM books', []);
    const hit = rows?.find(r =>
      asText(r[1]).toLowerCase().includes(needle) || asText(r[2]).toLowerCase().includes(needle));
    return hit ? asNumber(hit[0]) : undefined;
  }

  getVerses(bookNumber: number, chapter: number, verseStart: number, verseEnd: number): string | undefined {
    const rows = this.query(
      'getVerses',
      'SELECT verse, text FROM verses WHERE book_number = ? AND chapter = ? AND verse >= ? AND verse <= ? ORDER BY verse',
      [bookNumber, chapter, verseStart, verseEnd],
    );
    if (!rows) return undefined;
    const verses = rows.map(r => asText(r[1]).trim()).filter(Boolean);
    if (!verses.length) {
      log.warn('verses:not_found', { bookNumber, chapter, verseStart, verseEnd });
      return undefined;
    }
    return verses.join(' ');
  }

  listBooks(): BookEntry[] {
    const rows = this.query('listBooks', 'SELECT book_number, short_name, long_name FROM books ORDER BY book_number', []);
    return (rows ?? []).flatMap(r => toBookEntry(r) ?? []);
  }

  getBook(bookNumber: number): BookEntry | undefined {
    const rows = this.query('getBook', 'SELECT book_number, short_name, long_name FROM books WHERE book_number = ?', [bookNumber]);
    const first = rows?.[0];
    return first ? toBookEntry(first) : undefined;
  }

  /** Table name → column names, in declaration order. */
  describeSchema(): Record<string, string[]> {
    const tables = this.query('describeSchema', "SELECT name FROM sqlite_master WHERE type='table' ORDER BY name", []) ?? [];
    const schema: Record<string, string[]> = {};
    for (const [name] of tables) {
      const table = asText(name);
      if (!table) continue;
      const cols = this.query('describeSchema', `PRAGMA table_info("${table.replace(/"/g, '""')}")`, []) ?? [];
      schema[table] = cols.map(c => asText(c[1]));
    }
    return schema;
  }

  close(): void {
    if (!this.db) return;
    this.db.close();
    this.db = undefined;
    log.debug('close', { source: this.label });
  }

  private query(op: string, sql: string, params: SqlValue[]): SqlValue[][] | undefined {
    if (!this.db) {
      log.debug('query:closed', { op });
      return undefined;
    }
    let stmt: Statement | undefined;
    try {
      stmt = this.db.prepare(sql);
      stmt.bind(params);
      const rows: SqlValue[][] = [];
      while (stmt.step()) rows.push(stmt.get());
      return rows;
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      log.error('query:failed', { op, message: error.message });
      globalErrorReporter.report(error, {
        category: ErrorCategory.STORAGE,
        severity: ErrorSeverity.MEDIUM,
        context: { op, source: this.label },
      });
      return undefined;
    } finally {
      stmt?.free();
    }
  }
}
