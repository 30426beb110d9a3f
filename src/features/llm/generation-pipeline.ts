import type { GenerationSettings } from '../../config.js';
import { GenerationBlockedError, GenerationExhaustedError } from '../../utils/errors.js';
import { globalErrorReporter, ErrorCategory, ErrorSeverity } from '../../utils/error-reporter.js';
import { createLogger } from '../../utils/logger.js';
import { RetryManager } from './retry-manager.js';
import type {
  AttemptStage,
  BackendResponse,
  GenerationAttempt,
  GenerationBackend,
  GenerationOutcome,
  GenerationResult,
} from './types.js';

const log = createLogger('pipeline');

// Finish statuses meaning the candidate was withheld for policy reasons.
const BLOCKED_FINISH = new Set(['SAFETY', 'BLOCKLIST', 'PROHIBITED_CONTENT', 'SPII', 'RECITATION', 'IMAGE_SAFETY']);
const TRUNCATED_FINISH = new Set(['MAX_TOKENS']);

export const SHORTENED_PROMPT_MARKER = '\n\n[...]\n\n';

export type PipelineState = 'INITIAL' | 'ATTEMPT_1' | 'ATTEMPT_2' | 'ATTEMPT_3' | 'DONE' | 'FAILED';

export interface PipelineOptions extends GenerationSettings {
  maxBackoffMs?: number;
}

/** Candidates' text parts in order, joined with newlines and trimmed. */
export function mergeCandidateText(response: BackendResponse): string {
  return response.candidates.flatMap(c => c.parts).join('\n').trim();
}

export function classifyResponse(response: BackendResponse): GenerationOutcome {
  if (response.blockReason) return { kind: 'blocked', reason: response.blockReason };
  const blocked = response.candidates.find(c => c.finishReason !== undefined && BLOCKED_FINISH.has(c.finishReason));
  if (blocked?.finishReason) return { kind: 'blocked', reason: blocked.finishReason };
  const text = mergeCandidateText(response);
  if (response.candidates.some(c => c.finishReason !== undefined && TRUNCATED_FINISH.has(c.finishReason))) {
    return text ? { kind: 'truncated', partialText: text } : { kind: 'truncated' };
  }
  if (!text) return { kind: 'empty' };
  return { kind: 'success', text };
}

/**
 * Keep `prefixChars` from the start and `suffixChars` from the end; the tail
 * carries the task instructions. Prompts already within budget are returned as-is.
 */
export function shortenPrompt(prompt: string, prefixChars: number, suffixChars: number): string {
  if (prompt.length <= prefixChars + suffixChars) return prompt;
  return prompt.slice(0, prefixChars) + SHORTENED_PROMPT_MARKER + prompt.slice(prompt.length - suffixChars);
}

/**
 * Runs one prompt against a backend with up to three sequential attempts:
 * the configured tier, a doubled budget at a lower temperature, and (after a
 * second truncation only) a shortened prompt at the second tier.
 *
 * State lives in each `run()` call, so one instance may serve concurrent runs.
 */
export class GenerationPipeline {
  constructor(
    private backend: GenerationBackend,
    private options: PipelineOptions,
    private retry: RetryManager = new RetryManager(),
  ) {}

  async run(prompt: string): Promise<GenerationResult> {
    const o = this.options;
    const attempts: GenerationAttempt[] = [];
    const backoff = { backoffMs: o.backoffMs, maxBackoffMs: o.maxBackoffMs ?? 5_000 };
    let state: PipelineState = 'INITIAL';
    const enter = (next: PipelineState) => {
      log.debug('state', { from: state, to: next });
      state = next;
    };
    let lastError: unknown;

    enter('ATTEMPT_1');
    const first = await this.attempt(1, prompt, o.temperature, o.maxOutputTokens, attempts, e => { lastError = e; });
    if (first.kind === 'success') {
      enter('DONE');
      return this.done(first.text, attempts);
    }

    const retryBudget = Math.min(o.maxOutputTokens * 2, o.maxOutputTokensCeiling);
    await this.retry.wait(1, backoff, lastError);
    lastError = undefined;
    enter('ATTEMPT_2');
    const second = await this.attempt(2, prompt, o.retryTemperature, retryBudget, attempts, e => { lastError = e; });
    if (second.kind === 'success') {
      enter('DONE');
      return this.done(second.text, attempts);
    }

    if (second.kind === 'truncated') {
      const shortened = shortenPrompt(prompt, o.promptPrefixChars, o.promptSuffixChars);
      log.info('prompt:shortened', { from: prompt.length, to: shortened.length });
      await this.retry.wait(2, backoff, lastError);
      enter('ATTEMPT_3');
      const third = await this.attempt(3, shortened, o.retryTemperature, retryBudget, attempts, () => undefined);
      if (third.kind === 'success') {
        enter('DONE');
        return this.done(third.text, attempts);
      }
    }

    enter('FAILED');
    throw this.failure(attempts);
  }

  private async attempt(
    stage: AttemptStage,
    prompt: string,
    temperature: number,
    maxOutputTokens: number,
    attempts: GenerationAttempt[],
    onTransportError: (err: unknown) => void,
  ): Promise<GenerationOutcome> {
    log.debug('attempt:start', { stage, backend: this.backend.name, temperature, maxOutputTokens, promptChars: prompt.length });
    let outcome: GenerationOutcome;
    try {
      const response = await this.backend.generate({ prompt, temperature, maxOutputTokens });
      outcome = classifyResponse(response);
    } catch (err) {
      onTransportError(err);
      const detail = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
      outcome = { kind: 'transport_error', detail };
      log.warn('attempt:transport_error', { stage, detail });
      globalErrorReporter.report(err instanceof Error ? err : new Error(detail), {
        category: ErrorCategory.LLM_PROVIDER,
        severity: ErrorSeverity.MEDIUM,
        context: { stage, backend: this.backend.name, maxOutputTokens },
      });
    }
    attempts.push({ stage, prompt, temperature, maxOutputTokens, outcome });
    if (outcome.kind === 'empty') log.warn('attempt:empty', { stage });
    else if (outcome.kind !== 'transport_error') log.info(`attempt:${outcome.kind}`, { stage });
    return outcome;
  }

  private done(text: string, attempts: GenerationAttempt[]): GenerationResult {
    log.debug('pipeline:done', { attempts: attempts.length, chars: text.length });
    return { text, attempts };
  }

  private failure(attempts: GenerationAttempt[]): Error {
    const blocked = attempts.find(a => a.outcome.kind === 'blocked');
    if (blocked && blocked.outcome.kind === 'blocked') {
      log.error('pipeline:blocked', { reason: blocked.outcome.reason, attempts: attempts.length });
      return new GenerationBlockedError(blocked.outcome.reason, attempts);
    }
    let partial: string | undefined;
    for (const a of attempts) {
      if (a.outcome.kind === 'truncated' && a.outcome.partialText) partial = a.outcome.partialText;
    }
    log.error('pipeline:exhausted', { attempts: attempts.length, outcomes: attempts.map(a => a.outcome.kind) });
    return new GenerationExhaustedError(attempts, partial);
  }
}
