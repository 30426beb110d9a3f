#!/usr/bin/env node
import { readFile, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { loadConfig } from '../config.js';
import { createReflectionDeps, generateReflection } from '../features/llm/reflection-orchestrator.js';
import { isOffline } from '../features/llm/providers.js';
import { ConfigurationError, GenerationBlockedError, GenerationError } from '../utils/errors.js';
import { formatIssues, validateReadingContent } from '../utils/validation.js';

async function main(): Promise<number> {
  const inputPath = process.argv[2];
  const outputPath = process.argv[3];

  if (!inputPath || !existsSync(inputPath)) {
    console.error('Usage: npm run reflect -- <reading.json> [output.md]');
    console.error('\nExample: npm run reflect -- readings/today.json out/today.md');
    return 1;
  }

  console.log('✍️  Scripture Reflection Generator\n');
  if (isOffline()) console.log('🤖 LLM_OFFLINE=1: using the mock backend\n');

  const config = loadConfig();
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(inputPath, 'utf-8'));
  } catch (err) {
    console.error(`❌ ${inputPath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
  const validated = validateReadingContent(raw);
  if (!validated.success) {
    console.error(`❌ ${inputPath} is not a valid reading:`);
    for (const line of formatIssues(validated.errors)) console.error(`   - ${line}`);
    return 1;
  }

  const { store, ...deps } = await createReflectionDeps(config);
  try {
    console.log(`📖 Reading for ${validated.data.date}${validated.data.citation ? ` (${validated.data.citation})` : ''}`);
    const result = await generateReflection(validated.data, deps);
    const ref = result.content.resolvedReference;
    console.log(ref ? `   ✓ Vietnamese passage: ${ref.reference}` : '   • No Vietnamese passage attached');
    console.log(`   ✓ Generated in ${result.attempts.length} attempt(s)\n`);

    if (outputPath) {
      await writeFile(outputPath, result.text + '\n', 'utf-8');
      console.log(`💾 Saved to ${outputPath}`);
    } else {
      console.log(result.text);
    }
    return 0;
  } catch (err) {
    if (err instanceof GenerationError) {
      const kind = err instanceof GenerationBlockedError ? 'blocked' : 'exhausted';
      console.error(`❌ Generation ${kind}: ${err.message}`);
      console.error(`   outcomes: ${err.attempts.map(a => `#${a.stage} ${a.outcome.kind}`).join(', ')}`);
      if (err.partialText) console.error(`   partial text kept (${err.partialText.length} chars)`);
      return 1;
    }
    throw err;
  } finally {
    store?.close();
  }
}

main()
  .then(code => { process.exitCode = code; })
  .catch((err: unknown) => {
    if (err instanceof ConfigurationError) {
      console.error(`❌ ${err.message}`);
    } else {
      console.error('❌ Unexpected error:', err);
    }
    process.exitCode = 1;
  });
