// Command result types
export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class PackageFormulaError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'PackageFormulaError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  MALFORMED_VERSION = 'MALFORMED_VERSION',
  SYNTAX_ERROR = 'SYNTAX_ERROR',
  UNKNOWN_PACKAGE = 'UNKNOWN_PACKAGE',
  DUPLICATE_VERSION = 'DUPLICATE_VERSION',
  INVALID_MANIFEST = 'INVALID_MANIFEST',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
  /** Logger whose lines carry `[scope]` after the level */
  child(scope: string): Logger;
}
