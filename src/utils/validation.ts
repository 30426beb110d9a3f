import { z } from 'zod';
import { globalErrorReporter, ErrorCategory, ErrorSeverity } from './error-reporter.js';
import { createLogger } from './logger.js';

const log = createLogger('validation');

export const CitationSchema = z.object({
  rawText: z.string().min(1, 'Citation text is required'),
  bookToken: z.string().min(1, 'Book token is required'),
  chapter: z.number().int().min(1),
  verseStart: z.number().int().min(1),
  verseEnd: z.number().int().min(1).optional()
}).refine(c => c.verseEnd === undefined || c.verseEnd >= c.verseStart, {
  message: 'verseEnd must not be lower than verseStart',
  path: ['verseEnd']
});

// Resolved references are computed, never read from input.
export const ReadingContentSchema = z.object({
  date: z.string().min(1, 'Reading date is required'),
  sourceUrl: z.string(),
  citation: z.string().optional(),
  citationLink: z.string().url().optional(),
  body: z.string()
});

export type ReadingContentInput = z.infer<typeof ReadingContentSchema>;

export type ValidationResult<T> = {
  success: true;
  data: T;
} | {
  success: false;
  errors: z.ZodError;
};

export class DataValidator {
  /**
   * Validate data against a schema, reporting failures
   */
  static validate<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    data: unknown,
    context?: {
      operation?: string;
      dataType?: string;
    }
  ): ValidationResult<T> {
    const result = schema.safeParse(data);
    if (result.success) {
      return { success: true, data: result.data };
    }

    const operation = context?.operation || 'data-validation';
    log.warn('failed', { operation, issues: formatIssues(result.error) });
    globalErrorReporter.report(
      new Error(`Data validation failed: ${result.error.message}`),
      {
        category: ErrorCategory.VALIDATION,
        severity: ErrorSeverity.MEDIUM,
        context: {
          operation,
          dataType: context?.dataType || 'unknown',
          validationErrors: result.error.errors.map(e => ({
            path: e.path.join('.'),
            message: e.message,
            code: e.code
          }))
        }
      }
    );
    return { success: false, errors: result.error };
  }

  /**
   * Validate array of items
   */
  static validateArray<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    items: unknown[],
    context?: { operation?: string; dataType?: string }
  ): { valid: T[]; invalid: { index: number; error: z.ZodError }[] } {
    const valid: T[] = [];
    const invalid: { index: number; error: z.ZodError }[] = [];

    items.forEach((item, index) => {
      const result = this.validate(schema, item, context);
      if (result.success) {
        valid.push(result.data);
      } else {
        invalid.push({ index, error: result.errors });
      }
    });

    return { valid, invalid };
  }
}

/** One line per issue: `path: message`. */
export function formatIssues(error: z.ZodError): string[] {
  return error.errors.map(e => `${e.path.join('.') || '(root)'}: ${e.message}`);
}

export function validateReadingContent(data: unknown): ValidationResult<ReadingContentInput> {
  return DataValidator.validate(ReadingContentSchema, data, { operation: 'reading-content', dataType: 'ReadingContent' });
}

export function validateCitation(data: unknown): ValidationResult<z.infer<typeof CitationSchema>> {
  return DataValidator.validate(CitationSchema, data, { operation: 'citation', dataType: 'Citation' });
}
