/**
 * Error Handler for Focus Agreements
 *
 * Centralized error handling: normalization, console logging by severity,
 * statistics and handler dispatch. Never throws, so the polling loop can
 * route every per-agreement failure through it.
 */

import {
  FocusAgreementsError,
  ErrorHandler,
  ErrorSeverity,
  ErrorCategory,
  ErrorCode,
  ErrorContext,
} from './types';

/** Error handler configuration */
export interface ErrorHandlerConfig {
  /** Whether to log errors to console */
  console_logging: boolean;
  /** Minimum severity to log */
  min_log_severity: ErrorSeverity;
  /** How many recent errors to keep for inspection */
  history_size: number;
  /** Custom error handlers by category */
  category_handlers?: Partial<Record<ErrorCategory, ErrorHandler>>;
}

/** Error statistics */
export interface ErrorStats {
  total_errors: number;
  errors_by_severity: Record<ErrorSeverity, number>;
  errors_by_category: Record<ErrorCategory, number>;
  last_error_at?: Date;
}

function emptyStats(): ErrorStats {
  return {
    total_errors: 0,
    errors_by_severity: {
      [ErrorSeverity.INFO]: 0,
      [ErrorSeverity.LOW]: 0,
      [ErrorSeverity.MEDIUM]: 0,
      [ErrorSeverity.HIGH]: 0,
      [ErrorSeverity.CRITICAL]: 0,
    },
    errors_by_category: {
      [ErrorCategory.AGREEMENT]: 0,
      [ErrorCategory.NEGOTIATION]: 0,
      [ErrorCategory.COMPLIANCE]: 0,
      [ErrorCategory.ENFORCEMENT]: 0,
      [ErrorCategory.CAPABILITY]: 0,
      [ErrorCategory.STORAGE]: 0,
      [ErrorCategory.CONFIG]: 0,
      [ErrorCategory.VALIDATION]: 0,
      [ErrorCategory.SYSTEM]: 0,
    },
  };
}

/**
 * Centralized Error Handler
 */
export class CentralErrorHandler {
  private config: ErrorHandlerConfig;
  private stats: ErrorStats = emptyStats();
  private recent: FocusAgreementsError[] = [];
  private globalHandlers: ErrorHandler[] = [];

  constructor(config: Partial<ErrorHandlerConfig> = {}) {
    this.config = {
      console_logging: true,
      min_log_severity: ErrorSeverity.LOW,
      history_size: 50,
      ...config,
    };
  }

  /**
   * Register a global error handler
   * Returns a function that removes it again
   */
  addGlobalHandler(handler: ErrorHandler): () => void {
    this.globalHandlers.push(handler);
    return () => {
      const index = this.globalHandlers.indexOf(handler);
      if (index > -1) {
        this.globalHandlers.splice(index, 1);
      }
    };
  }

  /**
   * Handle an error. Plain errors and thrown values are wrapped as
   * SYSTEM errors. Returns the normalized error.
   */
  handleError(
    error: unknown,
    context: Partial<ErrorContext> = {}
  ): FocusAgreementsError {
    const normalized = this.normalize(error, context);

    this.updateStats(normalized);
    this.remember(normalized);

    if (
      this.config.console_logging &&
      normalized.severity >= this.config.min_log_severity
    ) {
      this.logToConsole(normalized);
    }

    const categoryHandler = this.config.category_handlers?.[normalized.category];
    if (categoryHandler) {
      this.dispatch(categoryHandler, normalized);
    }

    for (const handler of this.globalHandlers) {
      this.dispatch(handler, normalized);
    }

    return normalized;
  }

  /** Get error statistics */
  getStats(): ErrorStats {
    return {
      ...this.stats,
      errors_by_severity: { ...this.stats.errors_by_severity },
      errors_by_category: { ...this.stats.errors_by_category },
    };
  }

  /** Most recent errors, newest first */
  getRecentErrors(limit?: number): FocusAgreementsError[] {
    const newestFirst = [...this.recent].reverse();
    return limit === undefined ? newestFirst : newestFirst.slice(0, limit);
  }

  /** Reset error statistics */
  resetStats(): void {
    this.stats = emptyStats();
    this.recent = [];
  }

  private normalize(
    error: unknown,
    context: Partial<ErrorContext>
  ): FocusAgreementsError {
    if (error instanceof FocusAgreementsError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    return new FocusAgreementsError(
      message,
      ErrorCode.SYSTEM_INTERNAL_ERROR,
      ErrorCategory.SYSTEM,
      ErrorSeverity.HIGH,
      { ...context, stack: error instanceof Error ? error.stack : undefined },
      { cause: error }
    );
  }

  private dispatch(handler: ErrorHandler, error: FocusAgreementsError): void {
    try {
      const result = handler(error);
      if (result instanceof Promise) {
        result.catch((handlerError: unknown) => {
          console.error('Error handler failed:', handlerError);
        });
      }
    } catch (handlerError) {
      console.error('Error handler failed:', handlerError);
    }
  }

  private updateStats(error: FocusAgreementsError): void {
    this.stats.total_errors++;
    this.stats.errors_by_severity[error.severity]++;
    this.stats.errors_by_category[error.category]++;
    this.stats.last_error_at = new Date();
  }

  private remember(error: FocusAgreementsError): void {
    this.recent.push(error);
    if (this.recent.length > this.config.history_size) {
      this.recent.shift();
    }
  }

  private logToConsole(error: FocusAgreementsError): void {
    const prefix = `[${ErrorSeverity[error.severity]}] [${error.category}]`;
    const message = `${prefix} ${error.message} (${error.code})`;

    switch (error.severity) {
      case ErrorSeverity.CRITICAL:
      case ErrorSeverity.HIGH:
        console.error(message, error.context);
        break;
      case ErrorSeverity.MEDIUM:
        console.warn(message, error.context);
        break;
      default:
        // INFO and LOW stay out of the console to reduce noise
        break;
    }
  }
}
