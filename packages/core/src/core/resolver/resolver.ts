/**
 * Backtracking dependency resolver.
 *
 * Depth-first search over version choices with an explicit stack of choice
 * points. Pending obligations live on an agenda (a persistent list of
 * formulas, each tagged with the package/version that declared it), so a
 * choice point only has to remember the selection and agenda it started
 * from.
 *
 * Per step, the goal at the front of the agenda is expanded:
 *   and      -> left, then right
 *   or       -> try left; remember right as a choice point
 *   not      -> deferred to the final check (NOT never commits a package)
 *   package  -> already selected: its version must satisfy the leaf;
 *               otherwise choose among matching versions, newest first,
 *               and put the chosen version's own formula at the front
 *
 * When the agenda is empty every selected package's formula must hold
 * against the final selection; the first selection that passes wins.
 * Each package is committed at most once per path, so cyclic universes
 * terminate.
 */

import { RESOLVER_DEFAULTS } from '../../constants/index.js';
import { logger as rootLogger } from '../../utils/logger.js';
import { evaluateForSelection } from '../formula/evaluate.js';
import { packageFormula, type Formula, type PackageFormula } from '../formula/types.js';
import type { PackageUniverse, PackageVersionEntry } from '../universe/universe.js';
import { constraintsHold, formatConstraints, type Constraint } from '../version/constraint.js';
import type { Version } from '../version/version.js';
import type {
  Conflict,
  ConflictReason,
  PackageRef,
  ResolutionEvent,
  ResolutionOutcome,
  ResolveOptions,
  Selection
} from './types.js';

const logger = rootLogger.child('resolver');

interface Goal {
  readonly formula: Formula;
  readonly owner: PackageRef | null;
}

interface AgendaCell {
  readonly goal: Goal;
  readonly next: Agenda;
}

type Agenda = AgendaCell | null;

interface SearchState {
  readonly selection: Selection;
  readonly agenda: Agenda;
}

type ChoiceFrame =
  | {
      readonly kind: 'version';
      readonly state: SearchState;
      readonly packageName: string;
      readonly candidates: readonly PackageVersionEntry[];
      next: number;
    }
  | {
      readonly kind: 'branch';
      readonly state: SearchState;
      readonly alternative: Goal;
    };

interface FailureDetails {
  reason: ConflictReason;
  packageName: string;
  constraints: readonly Constraint[];
  requestedBy: PackageRef | null;
  selectedVersion?: Version;
}

function push(goal: Goal, next: Agenda): Agenda {
  return { goal, next };
}

function formatRef(ref: PackageRef | null): string {
  return ref ? `${ref.name}@${ref.version.raw}` : 'the root request';
}

function describeConstraints(constraints: readonly Constraint[]): string {
  return constraints.length > 0 ? formatConstraints(constraints) : 'any version';
}

function conflictMessage(details: FailureDetails, available: readonly Version[], steps: number): string {
  const by = formatRef(details.requestedBy);
  switch (details.reason) {
    case 'unknown-package':
      return `Package '${details.packageName}' is not in the universe (required by ${by})`;
    case 'no-matching-version': {
      const versions = available.map(version => version.raw).join(', ');
      return `No version of '${details.packageName}' satisfies ${describeConstraints(details.constraints)} (required by ${by}); available: ${versions}`;
    }
    case 'version-mismatch':
      return `'${details.packageName}' is selected at ${details.selectedVersion?.raw ?? 'unknown'}, which does not satisfy ${describeConstraints(details.constraints)} (required by ${by})`;
    case 'formula-unsatisfied':
      return `Dependencies of ${by} do not hold for the final selection`;
    case 'search-limit':
      return `Search for '${details.packageName}' stopped after ${steps} steps without a solution`;
  }
}

/**
 * State of a single resolution run. Never shared between runs.
 */
class ResolutionRun {
  private readonly stack: ChoiceFrame[] = [];
  private readonly maxSteps: number;
  private steps = 0;
  private deepest: { depth: number; conflict: Conflict } | null = null;

  constructor(
    private readonly universe: PackageUniverse,
    private readonly rootName: string,
    private readonly rootConstraints: readonly Constraint[],
    private readonly options: ResolveOptions
  ) {
    this.maxSteps = options.maxSteps ?? RESOLVER_DEFAULTS.MAX_STEPS;
  }

  run(): ResolutionOutcome {
    let current: SearchState | null = {
      selection: new Map(),
      agenda: push({ formula: packageFormula(this.rootName, this.rootConstraints), owner: null }, null)
    };
    let lastSelection: Selection = current.selection;

    while (true) {
      if (this.options.signal?.aborted) {
        logger.debug(`Resolution of '${this.rootName}' cancelled after ${this.steps} steps`);
        return { status: 'cancelled', partialSelection: current?.selection ?? lastSelection, steps: this.steps };
      }

      if (this.steps >= this.maxSteps) {
        const conflict = this.buildConflict(
          { reason: 'search-limit', packageName: this.rootName, constraints: this.rootConstraints, requestedBy: null },
          current?.selection ?? lastSelection
        );
        this.emit({ type: 'exhausted', conflict });
        return { status: 'conflict', conflict, steps: this.steps };
      }
      this.steps++;

      if (current === null) {
        current = this.backtrack();
        if (current === null) {
          return this.exhausted(lastSelection);
        }
        lastSelection = current.selection;
        continue;
      }

      if (current.agenda === null) {
        const violation = this.findViolation(current.selection);
        if (violation === null) {
          this.emit({ type: 'solved', selection: current.selection });
          logger.info(`Resolution complete: ${current.selection.size} packages in ${this.steps} steps`);
          return { status: 'solved', selection: current.selection, steps: this.steps };
        }
        this.recordFailure(violation, current.selection);
        current = null;
        continue;
      }

      current = this.expand(current.agenda, current.selection);
      if (current !== null) {
        lastSelection = current.selection;
      }
    }
  }

  private expand(agenda: AgendaCell, selection: Selection): SearchState | null {
    const { goal, next } = agenda;
    const formula = goal.formula;

    switch (formula.kind) {
      case 'and':
        return {
          selection,
          agenda: push({ formula: formula.left, owner: goal.owner }, push({ formula: formula.right, owner: goal.owner }, next))
        };
      case 'or':
        this.stack.push({
          kind: 'branch',
          state: { selection, agenda: next },
          alternative: { formula: formula.right, owner: goal.owner }
        });
        return { selection, agenda: push({ formula: formula.left, owner: goal.owner }, next) };
      case 'not':
        return { selection, agenda: next };
      case 'package':
        return this.expandPackage(formula, goal.owner, { selection, agenda: next });
    }
  }

  private expandPackage(leaf: PackageFormula, owner: PackageRef | null, rest: SearchState): SearchState | null {
    const selected = rest.selection.get(leaf.name);
    if (selected !== undefined) {
      if (constraintsHold(leaf.constraints, selected)) {
        return rest;
      }
      this.recordFailure(
        { reason: 'version-mismatch', packageName: leaf.name, constraints: leaf.constraints, requestedBy: owner, selectedVersion: selected },
        rest.selection
      );
      return null;
    }

    const entries = this.universe.versions(leaf.name);
    if (entries.length === 0) {
      this.recordFailure(
        { reason: 'unknown-package', packageName: leaf.name, constraints: leaf.constraints, requestedBy: owner },
        rest.selection
      );
      return null;
    }

    const candidates = entries.filter(entry => constraintsHold(leaf.constraints, entry.version));
    if (candidates.length === 0) {
      this.recordFailure(
        { reason: 'no-matching-version', packageName: leaf.name, constraints: leaf.constraints, requestedBy: owner },
        rest.selection
      );
      return null;
    }

    this.emit({
      type: 'choosing',
      packageName: leaf.name,
      candidates: candidates.map(entry => entry.version),
      depth: rest.selection.size
    });

    const [first] = candidates;
    if (!first) return null;
    if (candidates.length > 1) {
      this.stack.push({ kind: 'version', state: rest, packageName: leaf.name, candidates, next: 1 });
    }
    return this.commit(rest, first);
  }

  private commit(state: SearchState, entry: PackageVersionEntry): SearchState {
    const selection = new Map(state.selection);
    selection.set(entry.name, entry.version);

    const agenda = entry.depends
      ? push({ formula: entry.depends, owner: { name: entry.name, version: entry.version } }, state.agenda)
      : state.agenda;

    logger.debug(`Committed ${entry.name}@${entry.version.raw} (depth ${state.selection.size})`);
    this.emit({ type: 'committed', packageName: entry.name, version: entry.version, depth: state.selection.size });
    return { selection, agenda };
  }

  /**
   * Pops choice points until one still has an untried alternative.
   */
  private backtrack(): SearchState | null {
    while (this.stack.length > 0) {
      const frame = this.stack[this.stack.length - 1];
      if (!frame) break;

      if (frame.kind === 'branch') {
        this.stack.pop();
        logger.debug(`Backtracking to alternative branch (depth ${frame.state.selection.size})`);
        this.emit({ type: 'backtrack', choice: 'or', depth: frame.state.selection.size });
        return { selection: frame.state.selection, agenda: push(frame.alternative, frame.state.agenda) };
      }

      const entry = frame.candidates[frame.next];
      frame.next++;
      if (frame.next >= frame.candidates.length) {
        this.stack.pop();
      }
      if (!entry) continue;

      logger.debug(`Backtracking to ${frame.packageName}, trying ${entry.version.raw}`);
      this.emit({ type: 'backtrack', choice: frame.packageName, depth: frame.state.selection.size });
      return this.commit(frame.state, entry);
    }
    return null;
  }

  /**
   * Final consistency check; this is where NOT constraints are enforced.
   */
  private findViolation(selection: Selection): FailureDetails | null {
    for (const [name, version] of selection) {
      const entry = this.universe.get(name, version);
      if (entry?.depends && !evaluateForSelection(entry.depends, selection)) {
        return { reason: 'formula-unsatisfied', packageName: name, constraints: [], requestedBy: { name, version } };
      }
    }
    return null;
  }

  private recordFailure(details: FailureDetails, selection: Selection): void {
    const depth = selection.size;
    logger.debug(`Dead end at depth ${depth}: ${details.reason} for '${details.packageName}'`);
    if (this.deepest === null || depth > this.deepest.depth) {
      this.deepest = { depth, conflict: this.buildConflict(details, selection) };
    }
  }

  private buildConflict(details: FailureDetails, selection: Selection): Conflict {
    const availableVersions = this.universe.versions(details.packageName).map(entry => entry.version);
    return {
      ...details,
      availableVersions,
      partialSelection: selection,
      message: conflictMessage(details, availableVersions, this.steps)
    };
  }

  private exhausted(lastSelection: Selection): ResolutionOutcome {
    const conflict =
      this.deepest?.conflict ??
      this.buildConflict(
        { reason: 'no-matching-version', packageName: this.rootName, constraints: this.rootConstraints, requestedBy: null },
        lastSelection
      );
    logger.info(`Resolution of '${this.rootName}' failed: ${conflict.message}`);
    this.emit({ type: 'exhausted', conflict });
    return { status: 'conflict', conflict, steps: this.steps };
  }

  private emit(event: ResolutionEvent): void {
    this.options.onEvent?.(event);
  }
}

/**
 * Resolves `rootName` (restricted by `rootConstraints`) against the
 * universe. Failures are returned as data, never thrown; the universe is
 * only read, so concurrent runs may share it.
 */
export function resolve(
  universe: PackageUniverse,
  rootName: string,
  rootConstraints: readonly Constraint[] = [],
  options: ResolveOptions = {}
): ResolutionOutcome {
  return new ResolutionRun(universe, rootName, rootConstraints, options).run();
}
