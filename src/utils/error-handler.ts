import { ErrorCode } from '../types';

export class CheckerError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'CheckerError';
  }
}

export class ErrorHandler {
  static createError(code: ErrorCode, message: string, details?: unknown): CheckerError {
    return new CheckerError(code, message, details);
  }

  static isCheckerError(error: unknown): error is CheckerError {
    return error instanceof CheckerError;
  }

  static isFatalInputError(error: unknown): boolean {
    return ErrorHandler.isCheckerError(error) &&
      (error.code === ErrorCode.FileNotFound ||
       error.code === ErrorCode.FileUnreadable);
  }

  static isSettingsError(error: unknown): boolean {
    return ErrorHandler.isCheckerError(error) && error.code === ErrorCode.InvalidSettings;
  }

  static formatError(error: unknown): string {
    if (ErrorHandler.isCheckerError(error)) {
      return `[${error.code}] ${error.message}`;
    }
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
      return error.message;
    }
    return String(error);
  }
}
