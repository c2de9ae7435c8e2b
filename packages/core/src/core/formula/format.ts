import { formatConstraints, quoteString } from '../version/constraint.js';
import type { Formula } from './types.js';

type BinaryKind = 'and' | 'or';

const OPERATORS: Record<BinaryKind, string> = {
  and: '&',
  or: '|'
};

function needsParens(child: Formula, parent: BinaryKind, side: 'left' | 'right'): boolean {
  if (child.kind === 'or' && parent === 'and') return true;
  // Keeps left nesting stable across a reparse
  return child.kind === parent && side === 'right';
}

function formatChild(child: Formula, parent: BinaryKind, side: 'left' | 'right'): string {
  const text = formatFormula(child);
  return needsParens(child, parent, side) ? `(${text})` : text;
}

/**
 * Canonical text for a formula. Parsing the result yields a structurally
 * equal formula.
 */
export function formatFormula(formula: Formula): string {
  switch (formula.kind) {
    case 'package': {
      const block = formatConstraints(formula.constraints);
      return block ? `${quoteString(formula.name)} ${block}` : quoteString(formula.name);
    }
    case 'and':
    case 'or':
      return `${formatChild(formula.left, formula.kind, 'left')} ${OPERATORS[formula.kind]} ${formatChild(formula.right, formula.kind, 'right')}`;
    case 'not':
      return formula.operand.kind === 'package'
        ? `!${formatFormula(formula.operand)}`
        : `!(${formatFormula(formula.operand)})`;
  }
}
