import type { GenerationAttempt } from '../features/llm/types.js';

export class ConfigurationError extends Error {
  issues: string[];
  constructor(msg: string, issues: string[] = []) { super(msg); this.name = 'ConfigurationError'; this.issues = issues; }
}

export class TemplateError extends ConfigurationError {
  missing: string[];
  constructor(missing: string[]) {
    super(`Prompt template is missing placeholder(s): ${missing.map(p => `{${p}}`).join(', ')}`, missing);
    this.name = 'TemplateError';
    this.missing = missing;
  }
}

export class StoreUnavailableError extends Error {
  constructor(msg: string, cause?: unknown) { super(msg, { cause }); this.name = 'StoreUnavailableError'; }
}

/** Terminal pipeline failure: no usable text after every permitted attempt. */
export class GenerationError extends Error {
  attempts: GenerationAttempt[];
  partialText?: string;
  constructor(msg: string, attempts: GenerationAttempt[], partialText?: string) {
    super(msg);
    this.name = 'GenerationError';
    this.attempts = attempts;
    this.partialText = partialText;
  }
}

export class GenerationBlockedError extends GenerationError {
  reason: string;
  constructor(reason: string, attempts: GenerationAttempt[]) {
    super(`Generation blocked by the backend (${reason})`, attempts);
    this.name = 'GenerationBlockedError';
    this.reason = reason;
  }
}

export class GenerationExhaustedError extends GenerationError {
  constructor(attempts: GenerationAttempt[], partialText?: string) {
    super(`Generation produced no usable text after ${attempts.length} attempt(s)`, attempts, partialText);
    this.name = 'GenerationExhaustedError';
  }
}
