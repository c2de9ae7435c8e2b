import {
  collectPackageNames,
  formatConstraints,
  formatFormula,
  parseFormula,
  quoteString,
  type CommandResult,
  type Formula,
  type OutputPort
} from '@pkgformula/core';
import { getCliOutput } from '../cli/context.js';

export interface ParseCommandOptions {
  tree?: boolean;
}

/**
 * One line per node, children indented under their operator.
 */
export function renderFormulaTree(formula: Formula, depth = 0): string[] {
  const indent = '  '.repeat(depth);
  switch (formula.kind) {
    case 'package': {
      const constraints = formatConstraints(formula.constraints);
      return [`${indent}${quoteString(formula.name)}${constraints ? ` ${constraints}` : ''}`];
    }
    case 'not':
      return [`${indent}not`, ...renderFormulaTree(formula.operand, depth + 1)];
    case 'and':
    case 'or':
      return [
        `${indent}${formula.kind}`,
        ...renderFormulaTree(formula.left, depth + 1),
        ...renderFormulaTree(formula.right, depth + 1)
      ];
  }
}

export function parseCommand(text: string, options: ParseCommandOptions, output: OutputPort): CommandResult<Formula> {
  const formula = parseFormula(text);

  output.info(formatFormula(formula));
  if (options.tree) {
    output.message(renderFormulaTree(formula).join('\n'));
  }
  output.info(`Packages: ${collectPackageNames(formula).join(', ')}`);

  return { success: true, data: formula };
}

export async function setupParseCommand(text: string, options: ParseCommandOptions): Promise<void> {
  parseCommand(text, options, getCliOutput());
}
