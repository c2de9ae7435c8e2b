import { PackageFormulaError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Error classes for the formula engine and the tooling around it
 */

export class MalformedVersionError extends PackageFormulaError {
  readonly input: string;

  constructor(input: string, reason: string) {
    super(`Malformed version '${input}': ${reason}`, ErrorCodes.MALFORMED_VERSION, { input, reason });
    this.name = 'MalformedVersionError';
    this.input = input;
  }
}

function formatSyntaxErrorMessage(source: string, expected: string, position: number, found?: string): string {
  const clamped = Number.isFinite(position)
    ? Math.min(Math.max(0, Math.trunc(position)), source.length)
    : 0;
  const detail = found === undefined ? `Expected ${expected}` : `Expected ${expected} but found ${found}`;
  return `${detail} at position ${clamped}\n  ${source}\n  ${' '.repeat(clamped)}^`;
}

export class FormulaSyntaxError extends PackageFormulaError {
  readonly source: string;
  readonly position: number;
  readonly expected: string;
  readonly found?: string;

  constructor(source: string, position: number, expected: string, found?: string) {
    super(
      formatSyntaxErrorMessage(source, expected, position, found),
      ErrorCodes.SYNTAX_ERROR,
      { position, expected, found }
    );
    this.name = 'FormulaSyntaxError';
    this.source = source;
    this.position = position;
    this.expected = expected;
    this.found = found;
  }
}

export class UnknownPackageError extends PackageFormulaError {
  constructor(packageName: string) {
    super(`Package '${packageName}' not found in universe`, ErrorCodes.UNKNOWN_PACKAGE, { packageName });
    this.name = 'UnknownPackageError';
  }
}

export class DuplicateVersionError extends PackageFormulaError {
  constructor(packageName: string, version: string, existing: string) {
    super(
      `Package '${packageName}' already has version ${existing}; cannot add ${version}`,
      ErrorCodes.DUPLICATE_VERSION,
      { packageName, version, existing }
    );
    this.name = 'DuplicateVersionError';
  }
}

export class InvalidManifestError extends PackageFormulaError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super(`Invalid package manifest: ${reason}`, ErrorCodes.INVALID_MANIFEST, details);
    this.name = 'InvalidManifestError';
  }
}

export class ValidationError extends PackageFormulaError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export class FileSystemError extends PackageFormulaError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

/**
 * Maps any thrown value to a failed CommandResult
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof PackageFormulaError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}
