#!/usr/bin/env node
import { loadConfig } from '../config.js';
import { ReferenceResolver } from '../features/scripture/reference-resolver.js';
import { VerseStore } from '../features/scripture/verse-store.js';
import { ConfigurationError, StoreUnavailableError } from '../utils/errors.js';

function argValue(flag: string): string | undefined {
  const i = process.argv.indexOf(flag);
  return i >= 0 ? process.argv[i + 1] : undefined;
}

async function main(): Promise<number> {
  const dbFlag = argValue('--db');
  const query = process.argv.slice(2).filter((a, i, all) => a !== '--db' && all[i - 1] !== '--db').join(' ').trim();
  if (!query) {
    console.error('Usage: npm run resolve -- "<citation>" [--db path/to/bible.SQLite3]');
    console.error('\nExample: npm run resolve -- "Matthew 5:3-8"');
    return 1;
  }

  const config = loadConfig();
  const dbPath = dbFlag ?? config.bibleDbPath;
  console.log(`📖 Opening ${dbPath}...`);
  const store = await VerseStore.open({ path: dbPath });
  try {
    const resolver = new ReferenceResolver(store);
    const result = resolver.tryResolve(query);
    if (!result.success) {
      const detail = result.citation ? ` (${result.citation.rawText})` : '';
      console.error(`❌ Could not resolve "${query}": ${result.reason}${detail}`);
      return 1;
    }
    console.log(`✓ ${result.reference.reference}\n`);
    console.log(result.reference.text);
    return 0;
  } finally {
    store.close();
  }
}

main()
  .then(code => { process.exitCode = code; })
  .catch((err: unknown) => {
    if (err instanceof ConfigurationError || err instanceof StoreUnavailableError) {
      console.error(`❌ ${err.message}`);
    } else {
      console.error('❌ Unexpected error:', err);
    }
    process.exitCode = 1;
  });
