export interface GenerationRequest {
  prompt: string;
  temperature: number;
  maxOutputTokens: number;
}

export interface BackendCandidate {
  /** Provider completion status, e.g. STOP, MAX_TOKENS, SAFETY */
  finishReason?: string;
  parts: string[];
}

export interface BackendResponse {
  candidates: BackendCandidate[];
  /** Set when the prompt itself was refused and no candidates were produced */
  blockReason?: string;
  usage?: { in: number; out: number };
}

export interface GenerationBackend {
  readonly name: string;
  generate(request: GenerationRequest): Promise<BackendResponse>;
}

export type GenerationOutcome =
  | { kind: 'success'; text: string }
  | { kind: 'truncated'; partialText?: string }
  | { kind: 'blocked'; reason: string }
  | { kind: 'empty' }
  | { kind: 'transport_error'; detail: string };

export type AttemptStage = 1 | 2 | 3;

export interface GenerationAttempt {
  stage: AttemptStage;
  prompt: string;
  temperature: number;
  maxOutputTokens: number;
  outcome: GenerationOutcome;
}

export interface GenerationResult {
  text: string;
  attempts: GenerationAttempt[];
}
