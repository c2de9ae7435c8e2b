/**
 * @pkgformula/core
 *
 * Dependency formula parsing, evaluation and backtracking resolution,
 * plus loaders for on-disk package repositories. No terminal UI
 * dependencies: user-facing output goes through OutputPort.
 */

// ============================================================================
// Types, errors, logging
// ============================================================================

export { PackageFormulaError, ErrorCodes, LogLevel } from './types/index.js';
export type { CommandResult, Logger } from './types/index.js';
export {
  MalformedVersionError,
  FormulaSyntaxError,
  UnknownPackageError,
  DuplicateVersionError,
  InvalidManifestError,
  ValidationError,
  FileSystemError,
  handleError
} from './utils/errors.js';
export { logger, createLogger, resolveLogLevel, ConsoleLogger } from './utils/logger.js';
export type { LogSink } from './utils/logger.js';
export { FILE_PATTERNS, ENV_VARS, RESOLVER_DEFAULTS, COMPARATORS } from './constants/index.js';

// ============================================================================
// Output port
// ============================================================================

export type { OutputPort, UnifiedSpinner } from './core/ports/output.js';
export { consoleOutput } from './core/ports/console-output.js';

// ============================================================================
// Versions and constraints
// ============================================================================

export {
  parseVersion,
  tryParseVersion,
  compareVersions,
  versionsEqual,
  sortVersionsDescending,
  formatVersion
} from './core/version/version.js';
export type { Version, VersionSegment, Ordering } from './core/version/version.js';
export {
  isComparator,
  createConstraint,
  applyComparator,
  constraintHolds,
  constraintsHold,
  constraintsEqual,
  formatConstraint,
  formatConstraints,
  quoteString
} from './core/version/constraint.js';
export type { Comparator, Constraint } from './core/version/constraint.js';

// ============================================================================
// Formulas
// ============================================================================

export * from './core/formula/index.js';

// ============================================================================
// Universe and repositories
// ============================================================================

export { PackageUniverse, loadUniverse } from './core/universe/universe.js';
export type {
  PackageVersionEntry,
  PackageRecord,
  UniverseLoadIssue,
  LoadUniverseOptions
} from './core/universe/universe.js';
export { parseOpamFile, parseVersionedDirName } from './core/repository/opam-file.js';
export type { OpamFileFallback } from './core/repository/opam-file.js';
export { parsePackageManifest } from './core/repository/package-manifest.js';
export { readPackageRecords, loadRepository } from './core/repository/repository-loader.js';

// ============================================================================
// Resolver
// ============================================================================

export { resolve } from './core/resolver/resolver.js';
export type {
  PackageRef,
  ConflictReason,
  Conflict,
  ResolutionOutcome,
  ResolutionEvent,
  ResolveOptions
} from './core/resolver/types.js';
export { buildResolvedGraph, computeInstallOrder, formatSelection } from './core/resolver/report.js';
export type { ResolvedNode, ResolvedGraph } from './core/resolver/report.js';
export { displaySelection, displayConflict, formatResolutionEvent } from './core/resolver/display.js';
