#!/usr/bin/env node
import { loadConfig, requireApiKey } from '../config.js';
import { GeminiBackend } from '../features/llm/providers/google.js';
import { ConfigurationError } from '../utils/errors.js';

const fmt = (n?: number) => (n === undefined ? '?' : n.toLocaleString('en-US'));

async function main(): Promise<number> {
  const config = loadConfig();
  const backend = new GeminiBackend({
    apiKey: requireApiKey(config),
    model: config.gemini.model,
    apiBase: config.gemini.apiBase,
    timeoutMs: config.gemini.timeoutMs,
  });

  console.log(`🔎 Checking ${backend.modelName}...\n`);
  const models = await backend.listModels();
  const current = models.find(m => m.name === backend.modelName);
  if (current) {
    console.log(`✓ ${current.displayName ?? current.name}`);
    console.log(`   input tokens:  ${fmt(current.inputTokenLimit)}`);
    console.log(`   output tokens: ${fmt(current.outputTokenLimit)}`);
    if (current.outputTokenLimit !== undefined && current.outputTokenLimit < config.generation.maxOutputTokensCeiling) {
      console.log(`   ⚠️  GENERATION_MAX_TOKENS_CEILING (${fmt(config.generation.maxOutputTokensCeiling)}) exceeds the model limit`);
    }
  } else {
    console.log(`⚠️  ${backend.modelName} is not visible to this API key`);
  }

  const generators = models.filter(m => m.methods.includes('generateContent'));
  console.log(`\n📋 ${generators.length} model(s) support generateContent:`);
  for (const m of generators) {
    console.log(`   - ${m.name}  in=${fmt(m.inputTokenLimit)} out=${fmt(m.outputTokenLimit)}`);
  }
  return current ? 0 : 1;
}

main()
  .then(code => { process.exitCode = code; })
  .catch((err: unknown) => {
    if (err instanceof ConfigurationError) {
      console.error(`❌ ${err.message}`);
    } else {
      console.error('❌ Model check failed:', err);
    }
    process.exitCode = 1;
  });
