import { constraintsEqual, constraintsHold } from '../version/constraint.js';
import type { Version } from '../version/version.js';
import type { Formula, PackageFormula } from './types.js';

/**
 * One chosen version per package name. Map insertion order is commit order.
 */
export type Selection = ReadonlyMap<string, Version>;

export interface Candidate {
  readonly name: string;
  readonly version: Version;
}

function evaluate(formula: Formula, leaf: (node: PackageFormula) => boolean): boolean {
  switch (formula.kind) {
    case 'package':
      return leaf(formula);
    case 'and':
      return evaluate(formula.left, leaf) && evaluate(formula.right, leaf);
    case 'or':
      return evaluate(formula.left, leaf) || evaluate(formula.right, leaf);
    case 'not':
      return !evaluate(formula.operand, leaf);
  }
}

/**
 * A leaf holds iff it names the candidate and every constraint holds for
 * the candidate's version.
 */
export function evaluateForCandidate(formula: Formula, candidate: Candidate): boolean {
  return evaluate(
    formula,
    node => node.name === candidate.name && constraintsHold(node.constraints, candidate.version)
  );
}

/**
 * A leaf holds iff its package is selected and the selected version
 * satisfies every constraint.
 */
export function evaluateForSelection(formula: Formula, selection: Selection): boolean {
  return evaluate(formula, node => {
    const selected = selection.get(node.name);
    return selected !== undefined && constraintsHold(node.constraints, selected);
  });
}

/**
 * Package leaves in pre-order, left to right.
 */
export function collectPackageLeaves(formula: Formula): PackageFormula[] {
  const leaves: PackageFormula[] = [];
  const pending: Formula[] = [formula];
  while (pending.length > 0) {
    const node = pending.pop();
    if (!node) break;
    switch (node.kind) {
      case 'package':
        leaves.push(node);
        break;
      case 'and':
      case 'or':
        pending.push(node.right, node.left);
        break;
      case 'not':
        pending.push(node.operand);
        break;
    }
  }
  return leaves;
}

/**
 * Distinct package names in discovery order.
 */
export function collectPackageNames(formula: Formula): string[] {
  return [...new Set(collectPackageLeaves(formula).map(leaf => leaf.name))];
}

export function formulasEqual(a: Formula, b: Formula): boolean {
  switch (a.kind) {
    case 'package':
      return (
        b.kind === 'package' &&
        a.name === b.name &&
        a.constraints.length === b.constraints.length &&
        a.constraints.every((constraint, i) => {
          const other = b.constraints[i];
          return other !== undefined && constraintsEqual(constraint, other);
        })
      );
    case 'and':
    case 'or':
      if (b.kind !== 'and' && b.kind !== 'or') return false;
      return b.kind === a.kind && formulasEqual(a.left, b.left) && formulasEqual(a.right, b.right);
    case 'not':
      return b.kind === 'not' && formulasEqual(a.operand, b.operand);
  }
}
