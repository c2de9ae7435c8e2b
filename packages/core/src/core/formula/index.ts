export type { Formula, FormulaKind, PackageFormula, AndFormula, OrFormula, NotFormula } from './types.js';
export { packageFormula, andFormula, orFormula, notFormula } from './types.js';
export { parseFormula, parseDependsList, parseConstraints } from './parser.js';
export { formatFormula } from './format.js';
export {
  evaluateForCandidate,
  evaluateForSelection,
  collectPackageLeaves,
  collectPackageNames,
  formulasEqual,
  type Selection,
  type Candidate
} from './evaluate.js';
