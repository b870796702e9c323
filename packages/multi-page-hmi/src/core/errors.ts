/**
 * Custom error types for the page navigation engine
 */

export class HmiError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'HmiError';
    this.code = code;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A page update failed fatally.
 *
 * The only way a page reports an unrecoverable condition to the manager.
 * The canonical case is the shutdown page whose timer ran out, which tells
 * the run loop to terminate.
 */
export class PageError extends HmiError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCodes.PAGE_UPDATE_FAILED, context);
    this.name = 'PageError';
  }
}

export class ConfigurationError extends HmiError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], context?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIGURATION_ERROR, { ...context, issues });
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class SettingError extends HmiError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCodes.INVALID_SETTING_VALUE, context);
    this.name = 'SettingError';
  }
}

/**
 * Error code constants
 */
export const ErrorCodes = {
  PAGE_UPDATE_FAILED: 'PAGE_UPDATE_FAILED',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  INVALID_SETTING_VALUE: 'INVALID_SETTING_VALUE',
  INVALID_STATE: 'INVALID_STATE',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
