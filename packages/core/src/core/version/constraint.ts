import { COMPARATORS } from '../../constants/index.js';
import { compareVersions, parseVersion, type Ordering, type Version } from './version.js';

export type Comparator = (typeof COMPARATORS)[number];

/**
 * A single version bound. `negated` comes from a `!` in front of the
 * comparator inside a constraint block, e.g. `{! (< "2.5.0")}`.
 */
export interface Constraint {
  readonly comparator: Comparator;
  readonly version: Version;
  readonly negated: boolean;
}

const COMPARATOR_SET: ReadonlySet<string> = new Set<string>(COMPARATORS);

export function isComparator(token: string): token is Comparator {
  return COMPARATOR_SET.has(token);
}

export function createConstraint(
  comparator: Comparator,
  version: Version | string,
  negated = false
): Constraint {
  return Object.freeze({
    comparator,
    version: typeof version === 'string' ? parseVersion(version) : version,
    negated
  });
}

export function applyComparator(comparator: Comparator, ordering: Ordering): boolean {
  switch (comparator) {
    case '=':
      return ordering === 0;
    case '!=':
      return ordering !== 0;
    case '<':
      return ordering < 0;
    case '<=':
      return ordering <= 0;
    case '>':
      return ordering > 0;
    case '>=':
      return ordering >= 0;
  }
}

export function constraintHolds(constraint: Constraint, candidate: Version): boolean {
  const result = applyComparator(constraint.comparator, compareVersions(candidate, constraint.version));
  return constraint.negated ? !result : result;
}

/**
 * Conjunction; an empty list holds for every version.
 */
export function constraintsHold(constraints: readonly Constraint[], candidate: Version): boolean {
  return constraints.every(constraint => constraintHolds(constraint, candidate));
}

export function constraintsEqual(a: Constraint, b: Constraint): boolean {
  return a.comparator === b.comparator && a.negated === b.negated && a.version.raw === b.version.raw;
}

export function quoteString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export function formatConstraint(constraint: Constraint): string {
  const base = `${constraint.comparator} ${quoteString(constraint.version.raw)}`;
  return constraint.negated ? `! (${base})` : base;
}

/**
 * `{>= "1.0.0" & ! (< "2.5.0")}`, or an empty string for no constraints.
 */
export function formatConstraints(constraints: readonly Constraint[]): string {
  if (constraints.length === 0) return '';
  return `{${constraints.map(formatConstraint).join(' & ')}}`;
}
