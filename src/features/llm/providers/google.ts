import { z } from 'zod';
import type { BackendCandidate, BackendResponse, GenerationBackend, GenerationRequest } from '../types.js';
import { logDebug } from '../../../utils/logger.js';

// --- Error types -----------------------------------------------------
export class GeminiAPIError extends Error { status?: number; code?: string; raw?: unknown; constructor(msg: string, status?: number, code?: string, raw?: unknown) { super(msg); this.name = 'GeminiAPIError'; this.status = status; this.code = code; this.raw = raw; } }
export class GeminiAuthError extends GeminiAPIError { constructor(msg = 'Invalid Gemini API key', raw?: unknown) { super(msg, 401, 'unauthorized', raw); this.name = 'GeminiAuthError'; } }
export class GeminiRateLimitError extends GeminiAPIError { retryAfterMs?: number; constructor(msg = 'Gemini rate limit exceeded', retryAfterMs?: number, raw?: unknown) { super(msg, 429, 'resource_exhausted', raw); this.name = 'GeminiRateLimitError'; this.retryAfterMs = retryAfterMs; } }
export class GeminiNetworkError extends Error { constructor(msg: string, cause?: unknown) { super(msg, { cause }); this.name = 'GeminiNetworkError'; } }
export class GeminiResponseError extends Error { constructor(msg: string, public raw?: unknown) { super(msg); this.name = 'GeminiResponseError'; } }

// --- Wire schemas (subset) -------------------------------------------
const PartSchema = z.object({ text: z.string().optional() }).passthrough();
const CandidateSchema = z.object({
  content: z.object({ role: z.string().optional(), parts: z.array(PartSchema).optional() }).passthrough().optional(),
  finishReason: z.string().optional(),
}).passthrough();
const GenerateResponseSchema = z.object({
  candidates: z.array(CandidateSchema).optional(),
  usageMetadata: z.object({ promptTokenCount: z.number().optional(), candidatesTokenCount: z.number().optional() }).passthrough().optional(),
  promptFeedback: z.object({ blockReason: z.string().optional() }).passthrough().optional(),
}).passthrough();
const ModelListSchema = z.object({
  models: z.array(z.object({
    name: z.string(),
    displayName: z.string().optional(),
    inputTokenLimit: z.number().optional(),
    outputTokenLimit: z.number().optional(),
    supportedGenerationMethods: z.array(z.string()).optional(),
  }).passthrough()).default([]),
}).passthrough();
const ErrorBodySchema = z.object({
  error: z.object({ code: z.number().optional(), status: z.string().optional(), message: z.string().optional() }).passthrough(),
}).passthrough();

export interface GeminiModelLimits {
  name: string;
  displayName?: string;
  inputTokenLimit?: number;
  outputTokenLimit?: number;
  methods: string[];
}

export interface GeminiBackendOptions {
  apiKey: string;
  model: string;
  apiBase?: string;
  timeoutMs?: number;
  safetyThreshold?: string;
  fetchImpl?: typeof fetch;
}

const SAFETY_CATEGORIES = [
  'HARM_CATEGORY_HATE_SPEECH',
  'HARM_CATEGORY_HARASSMENT',
  'HARM_CATEGORY_SEXUALLY_EXPLICIT',
  'HARM_CATEGORY_DANGEROUS_CONTENT',
];

export class GeminiBackend implements GenerationBackend {
  readonly name = 'gemini';
  private apiBase: string;
  private apiKey: string;
  private model: string;
  private timeoutMs: number;
  private safetyThreshold: string;
  private fetchImpl: typeof fetch;

  constructor(opts: GeminiBackendOptions) {
    this.apiKey = opts.apiKey;
    this.model = opts.model.startsWith('models/') ? opts.model : `models/${opts.model}`;
    this.apiBase = (opts.apiBase ?? 'https://generativelanguage.googleapis.com').replace(/\/+$/, '');
    this.timeoutMs = opts.timeoutMs ?? 60_000;
    this.safetyThreshold = opts.safetyThreshold ?? 'BLOCK_MEDIUM_AND_ABOVE';
    this.fetchImpl = opts.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  get modelName(): string { return this.model; }

  async generate(request: GenerationRequest): Promise<BackendResponse> {
    const start = Date.now();
    const url = `${this.apiBase}/v1beta/${this.model}:generateContent?key=${encodeURIComponent(this.apiKey)}`;
    const res = await this.doFetch(url, { method: 'POST', headers: { 'content-type': 'application/json' }, body: JSON.stringify(this.buildRequest(request)) });
    if (!res.ok) await this.throwForResponse(res);
    const data = await this.readJson(res);
    const response = this.toBackendResponse(data);
    logDebug('gemini', 'call:complete', { model: this.model, ms: Date.now() - start, candidates: response.candidates.length, finish: response.candidates.map(c => c.finishReason ?? 'none'), usage: response.usage });
    return response;
  }

  /** Models visible to this key with their token limits. */
  async listModels(): Promise<GeminiModelLimits[]> {
    const url = `${this.apiBase}/v1beta/models?key=${encodeURIComponent(this.apiKey)}`;
    const res = await this.doFetch(url, { method: 'GET' });
    if (!res.ok) await this.throwForResponse(res);
    const parsed = ModelListSchema.safeParse(await this.readJson(res));
    if (!parsed.success) throw new GeminiResponseError(`Malformed model list: ${parsed.error.message}`, parsed.error);
    return parsed.data.models.map(m => ({
      name: m.name,
      displayName: m.displayName,
      inputTokenLimit: m.inputTokenLimit,
      outputTokenLimit: m.outputTokenLimit,
      methods: m.supportedGenerationMethods ?? [],
    }));
  }

  // --- Helpers -------------------------------------------------------
  private buildRequest(req: GenerationRequest): Record<string, unknown> {
    return {
      contents: [{ role: 'user', parts: [{ text: req.prompt }] }],
      generationConfig: { temperature: req.temperature, maxOutputTokens: req.maxOutputTokens },
      safetySettings: SAFETY_CATEGORIES.map(category => ({ category, threshold: this.safetyThreshold })),
    };
  }

  private toBackendResponse(data: unknown): BackendResponse {
    const parsed = GenerateResponseSchema.safeParse(data);
    if (!parsed.success) throw new GeminiResponseError(`Malformed Gemini response: ${parsed.error.message}`, data);
    const resp = parsed.data;
    const candidates: BackendCandidate[] = (resp.candidates ?? []).map(c => ({
      finishReason: c.finishReason,
      parts: (c.content?.parts ?? []).map(p => p.text ?? '').filter(t => t.length > 0),
    }));
    const u = resp.usageMetadata;
    return {
      candidates,
      blockReason: resp.promptFeedback?.blockReason,
      usage: u ? { in: Math.max(0, u.promptTokenCount ?? 0), out: Math.max(0, u.candidatesTokenCount ?? 0) } : undefined,
    };
  }

  private async readJson(res: Response): Promise<unknown> {
    try { return await res.json(); } catch (e) { throw new GeminiResponseError('Gemini returned a body that is not valid JSON', e); }
  }

  private async doFetch(url: string, init: RequestInit): Promise<Response> {
    try {
      return await this.fetchImpl(url, { ...init, signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (e) {
      const timedOut = e instanceof Error && (e.name === 'TimeoutError' || e.name === 'AbortError');
      throw new GeminiNetworkError(timedOut ? `Gemini request timed out after ${this.timeoutMs}ms` : 'Network error contacting Gemini API', e);
    }
  }

  private async throwForResponse(res: Response): Promise<never> {
    let body: unknown = undefined;
    try { body = await res.json(); } catch { body = undefined; }
    const parsed = ErrorBodySchema.safeParse(body);
    const err = parsed.success ? parsed.data.error : undefined;
    const status = err?.status ?? `${res.status}`;
    const msg = err?.message ?? `${res.status} ${res.statusText}`;
    if (res.status === 401 || (res.status === 403 && /api key/i.test(msg))) throw new GeminiAuthError(msg, body);
    if (res.status === 429 || status === 'RESOURCE_EXHAUSTED') {
      const ra = Number(res.headers.get('retry-after'));
      throw new GeminiRateLimitError(msg, Number.isFinite(ra) && ra > 0 ? ra * 1000 : undefined, body);
    }
    throw new GeminiAPIError(msg, res.status, status, body);
  }
}
