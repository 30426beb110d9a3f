import { describe, it, expect, vi } from 'vitest';
import { ErrorReporter, ErrorCategory, ErrorSeverity } from '../error-reporter.js';
import { ConfigurationError, GenerationExhaustedError, StoreUnavailableError } from '../errors.js';
import { GeminiNetworkError } from '../../features/llm/providers/google.js';

describe('ErrorReporter', () => {
  it('categorizes domain errors', () => {
    const reporter = new ErrorReporter({ enableConsoleLogging: false });
    expect(reporter.report(new ConfigurationError('bad env')).category).toBe(ErrorCategory.CONFIGURATION);
    expect(reporter.report(new StoreUnavailableError('missing')).category).toBe(ErrorCategory.STORAGE);
    expect(reporter.report(new GeminiNetworkError('Network error contacting Gemini API')).category).toBe(ErrorCategory.NETWORK);
    expect(reporter.report(new GenerationExhaustedError([])).category).toBe(ErrorCategory.LLM_PROVIDER);
    expect(reporter.report(new Error('something odd')).category).toBe(ErrorCategory.UNKNOWN);
  });

  it('derives severity from the category unless given', () => {
    const reporter = new ErrorReporter({ enableConsoleLogging: false });
    expect(reporter.report(new ConfigurationError('bad env')).severity).toBe(ErrorSeverity.HIGH);
    expect(reporter.report(new Error('x'), { category: ErrorCategory.STORAGE }).severity).toBe(ErrorSeverity.MEDIUM);
    expect(reporter.report(new Error('x'), { severity: ErrorSeverity.CRITICAL }).severity).toBe(ErrorSeverity.CRITICAL);
  });

  it('keeps a bounded history with stats', () => {
    const reporter = new ErrorReporter({ enableConsoleLogging: false, maxStoredReports: 2 });
    reporter.report(new Error('a'), { category: ErrorCategory.STORAGE });
    reporter.report(new Error('b'), { category: ErrorCategory.STORAGE });
    reporter.report(new Error('c'), { category: ErrorCategory.VALIDATION });
    expect(reporter.getReports().map(r => r.originalError.message)).toEqual(['b', 'c']);
    const stats = reporter.getStats();
    expect(stats.totalErrors).toBe(2);
    expect(stats.errorsByCategory).toEqual({ [ErrorCategory.STORAGE]: 1, [ErrorCategory.VALIDATION]: 1 });
    reporter.clear();
    expect(reporter.getStats().totalErrors).toBe(0);
  });

  it('records without printing by default', () => {
    const spies = (['error', 'warn', 'info', 'log'] as const).map(m => vi.spyOn(console, m).mockImplementation(() => undefined));
    const reporter = new ErrorReporter();
    reporter.report(new Error('disk'), { category: ErrorCategory.STORAGE });
    expect(reporter.getReports()).toHaveLength(1);
    for (const spy of spies) expect(spy).not.toHaveBeenCalled();
  });

  it('logs by severity when console logging is on', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const reporter = new ErrorReporter({ enableConsoleLogging: true });
    reporter.report(new Error('disk'), { category: ErrorCategory.STORAGE, context: { op: 'getVerses' } });
    expect(warn).toHaveBeenCalledWith('[storage] Scripture Store Error: disk', { op: 'getVerses' });
  });
});
