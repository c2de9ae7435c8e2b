import type { Constraint } from '../version/constraint.js';

/**
 * Leaf naming a dependency. Every constraint must hold (conjunction);
 * no constraints means any version.
 */
export interface PackageFormula {
  readonly kind: 'package';
  readonly name: string;
  readonly constraints: readonly Constraint[];
}

export interface AndFormula {
  readonly kind: 'and';
  readonly left: Formula;
  readonly right: Formula;
}

export interface OrFormula {
  readonly kind: 'or';
  readonly left: Formula;
  readonly right: Formula;
}

export interface NotFormula {
  readonly kind: 'not';
  readonly operand: Formula;
}

export type Formula = PackageFormula | AndFormula | OrFormula | NotFormula;

export type FormulaKind = Formula['kind'];

export function packageFormula(name: string, constraints: readonly Constraint[] = []): PackageFormula {
  return Object.freeze({ kind: 'package', name, constraints: Object.freeze([...constraints]) });
}

export function andFormula(left: Formula, right: Formula): AndFormula {
  return Object.freeze({ kind: 'and', left, right });
}

export function orFormula(left: Formula, right: Formula): OrFormula {
  return Object.freeze({ kind: 'or', left, right });
}

export function notFormula(operand: Formula): NotFormula {
  return Object.freeze({ kind: 'not', operand });
}
