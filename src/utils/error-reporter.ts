// Error categories for better organization and handling
export enum ErrorCategory {
  NETWORK = 'network',
  PARSING = 'parsing',
  VALIDATION = 'validation',
  AUTHENTICATION = 'authentication',
  RATE_LIMIT = 'rate_limit',
  TIMEOUT = 'timeout',
  STORAGE = 'storage',
  LLM_PROVIDER = 'llm_provider',
  CONFIGURATION = 'configuration',
  UNKNOWN = 'unknown'
}

// Error severity levels
export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

const ERROR_MESSAGES: Record<ErrorCategory, { title: string; message: string }> = {
  [ErrorCategory.NETWORK]: {
    title: 'Connection Error',
    message: 'Unable to reach the generation service.'
  },
  [ErrorCategory.PARSING]: {
    title: 'Data Processing Error',
    message: 'A response or input file could not be parsed.'
  },
  [ErrorCategory.VALIDATION]: {
    title: 'Data Validation Error',
    message: 'The provided data does not meet the required format or constraints.'
  },
  [ErrorCategory.AUTHENTICATION]: {
    title: 'Authentication Error',
    message: 'The API key was rejected by the generation service.'
  },
  [ErrorCategory.RATE_LIMIT]: {
    title: 'Rate Limit Exceeded',
    message: 'Too many requests have been made to the generation service.'
  },
  [ErrorCategory.TIMEOUT]: {
    title: 'Request Timeout',
    message: 'The generation request took too long to complete.'
  },
  [ErrorCategory.STORAGE]: {
    title: 'Scripture Store Error',
    message: 'The reference-text database could not be queried.'
  },
  [ErrorCategory.LLM_PROVIDER]: {
    title: 'AI Service Error',
    message: 'The AI service returned an unusable response.'
  },
  [ErrorCategory.CONFIGURATION]: {
    title: 'Configuration Error',
    message: 'The environment or prompt template is invalid.'
  },
  [ErrorCategory.UNKNOWN]: {
    title: 'Unexpected Error',
    message: 'An unexpected error occurred.'
  }
};

export interface ErrorReport {
  id: string;
  timestamp: Date;
  category: ErrorCategory;
  severity: ErrorSeverity;
  originalError: Error;
  context?: Record<string, unknown>;
  userMessage: { title: string; message: string };
  stackTrace?: string;
}

export interface ErrorReporterConfig {
  enableConsoleLogging?: boolean;
  maxStoredReports?: number;
}

export interface ErrorStats {
  totalErrors: number;
  errorsByCategory: Partial<Record<ErrorCategory, number>>;
  errorsBySeverity: Partial<Record<ErrorSeverity, number>>;
  recentErrors: ErrorReport[];
}

/**
 * Centralized error reporting. Keeps a bounded in-memory history; console
 * output is opt-in since callers log the event through their scoped logger.
 */
export class ErrorReporter {
  private reports: ErrorReport[] = [];
  private config: Required<ErrorReporterConfig>;
  private counter = 0;

  constructor(config: ErrorReporterConfig = {}) {
    this.config = {
      enableConsoleLogging: false,
      maxStoredReports: 100,
      ...config
    };
  }

  configure(config: ErrorReporterConfig): void {
    this.config = { ...this.config, ...config };
  }

  /**
   * Report a new error with automatic categorization when none is given
   */
  report(
    error: Error,
    options: {
      category?: ErrorCategory;
      severity?: ErrorSeverity;
      context?: Record<string, unknown>;
    } = {}
  ): ErrorReport {
    const category = options.category ?? this.categorizeError(error);
    const severity = options.severity ?? this.determineSeverity(category);

    const report: ErrorReport = {
      id: this.generateErrorId(),
      timestamp: new Date(),
      category,
      severity,
      originalError: error,
      context: options.context,
      userMessage: ERROR_MESSAGES[category],
      stackTrace: error.stack
    };

    this.reports.push(report);
    if (this.reports.length > this.config.maxStoredReports) {
      this.reports = this.reports.slice(-this.config.maxStoredReports);
    }

    if (this.config.enableConsoleLogging) this.logToConsole(report);
    return report;
  }

  getStats(): ErrorStats {
    const errorsByCategory: Partial<Record<ErrorCategory, number>> = {};
    const errorsBySeverity: Partial<Record<ErrorSeverity, number>> = {};
    for (const r of this.reports) {
      errorsByCategory[r.category] = (errorsByCategory[r.category] ?? 0) + 1;
      errorsBySeverity[r.severity] = (errorsBySeverity[r.severity] ?? 0) + 1;
    }
    return {
      totalErrors: this.reports.length,
      errorsByCategory,
      errorsBySeverity,
      recentErrors: this.reports.slice(-10)
    };
  }

  getReports(): readonly ErrorReport[] {
    return this.reports;
  }

  clear(): void {
    this.reports = [];
  }

  private categorizeError(error: Error): ErrorCategory {
    const message = error.message.toLowerCase();
    const name = error.name.toLowerCase();

    if (name.includes('configuration') || name.includes('template')) return ErrorCategory.CONFIGURATION;
    if (message.includes('timeout') || name.includes('timeout') || name.includes('abort')) return ErrorCategory.TIMEOUT;
    if (message.includes('network') || message.includes('fetch') || message.includes('connection')) return ErrorCategory.NETWORK;
    if (message.includes('unauthorized') || message.includes('api key') || message.includes('401')) return ErrorCategory.AUTHENTICATION;
    if (message.includes('rate limit') || message.includes('429')) return ErrorCategory.RATE_LIMIT;
    if (message.includes('database') || message.includes('sql') || name.includes('store')) return ErrorCategory.STORAGE;
    if (message.includes('parse') || message.includes('json')) return ErrorCategory.PARSING;
    if (message.includes('validation') || message.includes('schema')) return ErrorCategory.VALIDATION;
    if (name.includes('gemini') || name.includes('generation')) return ErrorCategory.LLM_PROVIDER;
    return ErrorCategory.UNKNOWN;
  }

  private determineSeverity(category: ErrorCategory): ErrorSeverity {
    switch (category) {
      case ErrorCategory.CONFIGURATION:
      case ErrorCategory.AUTHENTICATION:
        return ErrorSeverity.HIGH;
      case ErrorCategory.NETWORK:
      case ErrorCategory.TIMEOUT:
      case ErrorCategory.RATE_LIMIT:
      case ErrorCategory.STORAGE:
      case ErrorCategory.LLM_PROVIDER:
        return ErrorSeverity.MEDIUM;
      default:
        return ErrorSeverity.LOW;
    }
  }

  private generateErrorId(): string {
    this.counter += 1;
    return `error-${Date.now()}-${this.counter}`;
  }

  private logToConsole(report: ErrorReport): void {
    const line = `[${report.category}] ${report.userMessage.title}: ${report.originalError.message}`;
    if (report.severity === ErrorSeverity.CRITICAL || report.severity === ErrorSeverity.HIGH) {
      console.error(line, report.context ?? '');
    } else if (report.severity === ErrorSeverity.MEDIUM) {
      console.warn(line, report.context ?? '');
    } else {
      console.info(line, report.context ?? '');
    }
  }
}

export const globalErrorReporter = new ErrorReporter();
