/**
 * Focus Agreements Error Types
 *
 * Structured error handling with severity levels, error codes
 * and categories.
 */

/** Error severity levels */
export enum ErrorSeverity {
  /** Informational - normal operation events */
  INFO = 0,
  /** Low - minor issues that don't affect operation */
  LOW = 1,
  /** Medium - issues that may affect some functionality */
  MEDIUM = 2,
  /** High - significant issues affecting core functionality */
  HIGH = 3,
  /** Critical - the engine cannot continue */
  CRITICAL = 4,
}

/** Error categories for classification */
export enum ErrorCategory {
  /** Agreement entity errors */
  AGREEMENT = 'agreement',
  /** Negotiation session errors */
  NEGOTIATION = 'negotiation',
  /** Compliance tracking errors */
  COMPLIANCE = 'compliance',
  /** Enforcement failures */
  ENFORCEMENT = 'enforcement',
  /** Capability resolution errors */
  CAPABILITY = 'capability',
  /** Storage/persistence errors */
  STORAGE = 'storage',
  /** Configuration errors */
  CONFIG = 'config',
  /** Validation errors */
  VALIDATION = 'validation',
  /** System/internal errors */
  SYSTEM = 'system',
}

/** Error codes for specific error types */
export enum ErrorCode {
  // Agreement errors (1000-1999)
  AGREEMENT_NOT_FOUND = 1001,
  AGREEMENT_INVALID_STATE = 1002,
  AGREEMENT_INVALID = 1003,

  // Negotiation errors (2000-2999)
  NEGOTIATION_INVALID_STATE = 2001,

  // Compliance errors (3000-3999)
  COMPLIANCE_MALFORMED_SIGNAL = 3001,
  COMPLIANCE_CALLBACK_FAILED = 3003,

  // Enforcement errors (4000-4999)
  ENFORCEMENT_FAILED = 4001,
  ENFORCEMENT_ATTEMPT_FAILED = 4002,

  // Capability errors (5000-5999)
  CAPABILITY_UNAVAILABLE = 5001,
  CAPABILITY_CALL_FAILED = 5002,

  // Storage errors (6000-6999)
  STORAGE_READ_FAILED = 6001,
  STORAGE_WRITE_FAILED = 6002,
  STORAGE_INTEGRITY_VIOLATION = 6003,
  STORAGE_NOT_INITIALIZED = 6004,

  // Config errors (7000-7999)
  CONFIG_INVALID = 7001,

  // System errors (10000+)
  SYSTEM_INTERNAL_ERROR = 10001,
}

/** Context information for errors */
export interface ErrorContext {
  /** Agreement ID if applicable */
  agreement_id?: string;
  /** Negotiation session ID if applicable */
  session_id?: string;
  /** Capability name if applicable */
  capability?: string;
  /** Operation that failed */
  operation?: string;
  /** Additional metadata */
  metadata?: Record<string, unknown>;
  /** Stack trace */
  stack?: string;
  /** Timestamp */
  timestamp: Date;
  /** Source component */
  source_component?: string;
}

/** Error handler callback type */
export type ErrorHandler = (error: FocusAgreementsError) => void | Promise<void>;

/** Options shared by the specialized error classes */
export interface ErrorOptions {
  recoverable?: boolean;
  remediation?: string;
  cause?: unknown;
}

/**
 * Base error class for Focus Agreements
 */
export class FocusAgreementsError extends Error {
  readonly code: ErrorCode;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly context: ErrorContext;
  readonly recoverable: boolean;
  readonly remediation?: string;

  constructor(
    message: string,
    code: ErrorCode,
    category: ErrorCategory,
    severity: ErrorSeverity,
    context: Partial<ErrorContext> = {},
    options: ErrorOptions = {}
  ) {
    super(message);
    this.name = 'FocusAgreementsError';
    if (options.cause !== undefined) {
      Object.defineProperty(this, 'cause', {
        value: options.cause,
        writable: true,
        configurable: true,
      });
    }
    this.code = code;
    this.category = category;
    this.severity = severity;
    this.context = {
      timestamp: new Date(),
      stack: this.stack,
      ...context,
    };
    this.recoverable = options.recoverable ?? false;
    this.remediation = options.remediation;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** Convert to JSON for log sinks */
  toJSON(): Record<string, unknown> {
    return {
      error_type: this.name,
      code: this.code,
      category: this.category,
      severity: this.severity,
      severity_name: ErrorSeverity[this.severity],
      message: this.message,
      context: {
        ...this.context,
        timestamp: this.context.timestamp.toISOString(),
      },
      recoverable: this.recoverable,
      remediation: this.remediation,
    };
  }
}

// Specialized error classes

/**
 * Operation attempted on a terminated or unknown negotiation session.
 * Programmer error: never retried.
 */
export class InvalidNegotiationStateError extends FocusAgreementsError {
  constructor(message: string, context?: Partial<ErrorContext>, options?: ErrorOptions) {
    super(
      message,
      ErrorCode.NEGOTIATION_INVALID_STATE,
      ErrorCategory.NEGOTIATION,
      ErrorSeverity.HIGH,
      context,
      { recoverable: false, ...options }
    );
    this.name = 'InvalidNegotiationStateError';
  }
}

export class InvalidAgreementStateError extends FocusAgreementsError {
  constructor(message: string, context?: Partial<ErrorContext>, options?: ErrorOptions) {
    super(
      message,
      ErrorCode.AGREEMENT_INVALID_STATE,
      ErrorCategory.AGREEMENT,
      ErrorSeverity.MEDIUM,
      context,
      { recoverable: false, ...options }
    );
    this.name = 'InvalidAgreementStateError';
  }
}

/**
 * No registered service for a capability is available.
 * Recovered locally by degrading, except for close_resource.
 */
export class NoCapabilityAvailableError extends FocusAgreementsError {
  constructor(capability: string, context?: Partial<ErrorContext>, options?: ErrorOptions) {
    super(
      `No service available for capability '${capability}'`,
      ErrorCode.CAPABILITY_UNAVAILABLE,
      ErrorCategory.CAPABILITY,
      ErrorSeverity.MEDIUM,
      { capability, ...context },
      { recoverable: true, ...options }
    );
    this.name = 'NoCapabilityAvailableError';
  }
}

/**
 * Every attempt of the terminal enforcement action failed.
 * The agreement is still marked violated and inactive.
 */
export class EnforcementFailedError extends FocusAgreementsError {
  constructor(message: string, context?: Partial<ErrorContext>, options?: ErrorOptions) {
    super(
      message,
      ErrorCode.ENFORCEMENT_FAILED,
      ErrorCategory.ENFORCEMENT,
      ErrorSeverity.MEDIUM,
      context,
      {
        recoverable: true,
        remediation: 'Close the resource manually; compliance state is already recorded',
        ...options,
      }
    );
    this.name = 'EnforcementFailedError';
  }
}

/**
 * Activity signal is missing required fields. The tick is skipped.
 */
export class MalformedActivitySignalError extends FocusAgreementsError {
  constructor(message: string, context?: Partial<ErrorContext>, options?: ErrorOptions) {
    super(
      message,
      ErrorCode.COMPLIANCE_MALFORMED_SIGNAL,
      ErrorCategory.COMPLIANCE,
      ErrorSeverity.MEDIUM,
      context,
      { recoverable: true, ...options }
    );
    this.name = 'MalformedActivitySignalError';
  }
}

export class ConfigError extends FocusAgreementsError {
  constructor(message: string, context?: Partial<ErrorContext>, options?: ErrorOptions) {
    super(
      message,
      ErrorCode.CONFIG_INVALID,
      ErrorCategory.CONFIG,
      ErrorSeverity.HIGH,
      context,
      options
    );
    this.name = 'ConfigError';
  }
}

export class StorageError extends FocusAgreementsError {
  constructor(
    message: string,
    code: ErrorCode,
    context?: Partial<ErrorContext>,
    options?: ErrorOptions
  ) {
    super(message, code, ErrorCategory.STORAGE, ErrorSeverity.HIGH, context, options);
    this.name = 'StorageError';
  }
}
