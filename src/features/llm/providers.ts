// Backend selection: the real Gemini backend, or a deterministic offline mock.

import type { AppConfig } from '../../config.js';
import { readEnv, requireApiKey } from '../../config.js';
import type { BackendResponse, GenerationBackend, GenerationRequest } from './types.js';
import { GeminiBackend } from './providers/google.js';

export type { GenerationBackend, GenerationRequest, BackendResponse } from './types.js';

/**
 * Offline stand-in used when LLM_OFFLINE=1. Echoes a prefix of the prompt so
 * runs are reproducible without network access.
 */
export class MockBackend implements GenerationBackend {
  readonly name = 'mock';
  calls = 0;

  async generate(request: GenerationRequest): Promise<BackendResponse> {
    this.calls++;
    const text = `[MOCK t=${request.temperature} max=${request.maxOutputTokens}] ${request.prompt.slice(0, 120)}`;
    return {
      candidates: [{ finishReason: 'STOP', parts: [text] }],
      usage: { in: Math.round(request.prompt.length / 4), out: Math.round(text.length / 4) },
    };
  }
}

export function isOffline(): boolean {
  return (readEnv('LLM_OFFLINE') || '0') === '1';
}

export function createBackend(config: AppConfig): GenerationBackend {
  if (isOffline()) return new MockBackend();
  return new GeminiBackend({
    apiKey: requireApiKey(config),
    model: config.gemini.model,
    apiBase: config.gemini.apiBase,
    timeoutMs: config.gemini.timeoutMs,
  });
}
