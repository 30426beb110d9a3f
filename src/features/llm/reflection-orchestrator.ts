import type { AppConfig } from '../../config.js';
import type { ReadingContent } from '../scripture/types.js';
import { ReferenceResolver } from '../scripture/reference-resolver.js';
import { VerseStore } from '../scripture/verse-store.js';
import { StoreUnavailableError } from '../../utils/errors.js';
import { globalErrorReporter, ErrorCategory, ErrorSeverity } from '../../utils/error-reporter.js';
import { createLogger } from '../../utils/logger.js';
import { GenerationPipeline } from './generation-pipeline.js';
import { PromptAssembler, loadPromptTemplate } from './prompt-templates.js';
import { createBackend } from './providers.js';
import type { GenerationAttempt, GenerationBackend } from './types.js';

const log = createLogger('reflection');

export type ReflectionDeps = {
  /** Absent when no corpus is available; the reading is then used as given */
  resolver?: ReferenceResolver;
  assembler: PromptAssembler;
  pipeline: GenerationPipeline;
  template?: string;
};

export type ReflectionResult = {
  content: ReadingContent;
  prompt: string;
  text: string;
  attempts: GenerationAttempt[];
};

/** Enrich the reading, build the prompt and run it through the pipeline. */
export async function generateReflection(content: ReadingContent, deps: ReflectionDeps): Promise<ReflectionResult> {
  const enriched = deps.resolver ? deps.resolver.enrich(content) : { ...content };
  if (enriched.resolvedReference) {
    log.info('reference:resolved', { reference: enriched.resolvedReference.reference });
  } else if (deps.resolver) {
    log.info('reference:unresolved', { citation: content.citation ?? null });
  }

  const prompt = deps.assembler.assemble(enriched, deps.template);
  log.debug('prompt:assembled', { chars: prompt.length });

  const { text, attempts } = await deps.pipeline.run(prompt);
  log.info('reflection:done', { attempts: attempts.length, chars: text.length });
  return { content: enriched, prompt, text, attempts };
}

/** Open the corpus, degrading to no enrichment when it cannot be opened. */
export async function openResolver(config: AppConfig): Promise<{ resolver?: ReferenceResolver; store?: VerseStore }> {
  try {
    const store = await VerseStore.open({ path: config.bibleDbPath });
    return { resolver: new ReferenceResolver(store), store };
  } catch (err) {
    if (!(err instanceof StoreUnavailableError)) throw err;
    log.warn('corpus:unavailable', { path: config.bibleDbPath, message: err.message });
    globalErrorReporter.report(err, { category: ErrorCategory.STORAGE, severity: ErrorSeverity.LOW, context: { path: config.bibleDbPath } });
    return {};
  }
}

/** Wire the default dependencies from configuration. The caller closes `store`. */
export async function createReflectionDeps(
  config: AppConfig,
  backend: GenerationBackend = createBackend(config),
): Promise<ReflectionDeps & { store?: VerseStore }> {
  const { resolver, store } = await openResolver(config);
  const template = loadPromptTemplate(config.promptTemplatePath);
  return {
    resolver,
    store,
    assembler: new PromptAssembler({ defaultTemplate: template }),
    pipeline: new GenerationPipeline(backend, config.generation),
  };
}
