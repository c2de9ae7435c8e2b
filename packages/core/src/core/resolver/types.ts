/**
 * Types for the backtracking resolver.
 */

import type { Selection } from '../formula/evaluate.js';
import type { Constraint } from '../version/constraint.js';
import type { Version } from '../version/version.js';

export type { Selection };

export interface PackageRef {
  readonly name: string;
  readonly version: Version;
}

export type ConflictReason =
  /** A formula names a package the universe does not know */
  | 'unknown-package'
  /** No available version satisfies the leaf's constraints */
  | 'no-matching-version'
  /** The package is already selected at a version the leaf rejects */
  | 'version-mismatch'
  /** A selected package's formula is false under the final selection (NOT violations) */
  | 'formula-unsatisfied'
  /** The step limit was reached */
  | 'search-limit';

/**
 * Why resolution failed: the deepest point the search could not get past.
 */
export interface Conflict {
  reason: ConflictReason;
  /** Package that could not be chosen or whose formula failed */
  packageName: string;
  /** Constraints that could not be met (empty for unconstrained leaves) */
  constraints: readonly Constraint[];
  /** Package/version whose formula could not be satisfied; null for the root request */
  requestedBy: PackageRef | null;
  /** Version already selected, for 'version-mismatch' */
  selectedVersion?: Version;
  /** All versions of `packageName` in the universe, newest first */
  availableVersions: readonly Version[];
  /** Selection at the point of failure */
  partialSelection: Selection;
  message: string;
}

export type ResolutionOutcome =
  | { status: 'solved'; selection: Selection; steps: number }
  | { status: 'conflict'; conflict: Conflict; steps: number }
  | { status: 'cancelled'; partialSelection: Selection; steps: number };

/**
 * Search progress, one event per state machine transition.
 */
export type ResolutionEvent =
  | { type: 'choosing'; packageName: string; candidates: readonly Version[]; depth: number }
  | { type: 'committed'; packageName: string; version: Version; depth: number }
  | { type: 'backtrack'; choice: string; depth: number }
  | { type: 'solved'; selection: Selection }
  | { type: 'exhausted'; conflict: Conflict };

export interface ResolveOptions {
  /** Safety valve on search iterations (default: 100_000) */
  maxSteps?: number;
  /** Checked before every step; an aborted signal ends the run as 'cancelled' */
  signal?: AbortSignal;
  onEvent?: (event: ResolutionEvent) => void;
}
