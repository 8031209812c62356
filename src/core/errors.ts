/**
 * Custom error types for Honeytrap
 */

export class HoneytrapError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'HoneytrapError';
    this.code = code;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends HoneytrapError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCodes.INVALID_CONFIG, context);
    this.name = 'ConfigurationError';
  }
}

export interface ValidationErrorDetail {
  field: string;
  message: string;
  value?: unknown;
}

export class ValidationError extends HoneytrapError {
  public readonly validationErrors: ValidationErrorDetail[];

  constructor(message: string, errors: ValidationErrorDetail[]) {
    super(message, ErrorCodes.VALIDATION_FAILED, { errors });
    this.name = 'ValidationError';
    this.validationErrors = errors;
  }
}

export class AuthenticationError extends HoneytrapError {
  public readonly status: 401 | 403;

  constructor(message: string, status: 401 | 403) {
    super(message, status === 401 ? ErrorCodes.MISSING_API_KEY : ErrorCodes.INVALID_API_KEY);
    this.name = 'AuthenticationError';
    this.status = status;
  }
}

export class PayloadTooLargeError extends HoneytrapError {
  public readonly limitBytes: number;

  constructor(limitBytes: number) {
    super(`Request body exceeds ${limitBytes} bytes`, ErrorCodes.PAYLOAD_TOO_LARGE, { limitBytes });
    this.name = 'PayloadTooLargeError';
    this.limitBytes = limitBytes;
  }
}

export class LLMError extends HoneytrapError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCodes.LLM_REQUEST_FAILED, context);
    this.name = 'LLMError';
  }
}

export class TimeoutError extends HoneytrapError {
  public readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message, ErrorCodes.LLM_TIMEOUT, { timeoutMs });
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class IntegrationError extends HoneytrapError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCodes.CALLBACK_DELIVERY_FAILED, context);
    this.name = 'IntegrationError';
  }
}

/**
 * Error code constants
 */
export const ErrorCodes = {
  // Configuration
  INVALID_CONFIG: 'INVALID_CONFIG',

  // Request
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  MISSING_API_KEY: 'MISSING_API_KEY',
  INVALID_API_KEY: 'INVALID_API_KEY',
  PAYLOAD_TOO_LARGE: 'PAYLOAD_TOO_LARGE',

  // LLM
  LLM_REQUEST_FAILED: 'LLM_REQUEST_FAILED',
  LLM_TIMEOUT: 'LLM_TIMEOUT',

  // Integration
  CALLBACK_DELIVERY_FAILED: 'CALLBACK_DELIVERY_FAILED',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
