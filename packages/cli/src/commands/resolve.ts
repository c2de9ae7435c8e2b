import {
  createConstraint,
  displayConflict,
  displaySelection,
  formatResolutionEvent,
  parseConstraints,
  resolve,
  UnknownPackageError,
  ValidationError,
  type CommandResult,
  type Constraint,
  type OutputPort,
  type ResolutionOutcome
} from '@pkgformula/core';
import { getCliOutput } from '../cli/context.js';
import { loadCliRepository, resolveRepositoryDir } from '../utils/repository.js';

export interface ResolveCommandOptions {
  version?: string;
  constraint?: string[];
  repo?: string;
  trace?: boolean;
  maxSteps?: string;
}

function parseMaxSteps(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const steps = Number(value);
  if (!Number.isInteger(steps) || steps <= 0) {
    throw new ValidationError(`--max-steps must be a positive integer, got '${value}'`);
  }
  return steps;
}

/**
 * Root constraints from `--version` (an exact pin) and any number of
 * `--constraint` lists, all ANDed.
 */
export function buildRootConstraints(options: Pick<ResolveCommandOptions, 'version' | 'constraint'>): Constraint[] {
  const constraints: Constraint[] = [];
  if (options.version !== undefined) {
    constraints.push(createConstraint('=', options.version));
  }
  for (const text of options.constraint ?? []) {
    constraints.push(...parseConstraints(text));
  }
  return constraints;
}

export async function resolveCommand(
  packageName: string,
  options: ResolveCommandOptions,
  output: OutputPort
): Promise<CommandResult<ResolutionOutcome>> {
  const rootConstraints = buildRootConstraints(options);
  const maxSteps = parseMaxSteps(options.maxSteps);
  const universe = await loadCliRepository(resolveRepositoryDir(options.repo), output);

  if (!universe.has(packageName)) {
    throw new UnknownPackageError(packageName);
  }

  const outcome = resolve(universe, packageName, rootConstraints, {
    maxSteps,
    onEvent: options.trace ? event => output.message(formatResolutionEvent(event)) : undefined
  });

  switch (outcome.status) {
    case 'solved':
      displaySelection(universe, packageName, outcome.selection, output);
      return { success: true, data: outcome };
    case 'conflict':
      displayConflict(outcome.conflict, output);
      return { success: false, error: outcome.conflict.message, data: outcome };
    case 'cancelled':
      output.warn(`Resolution of '${packageName}' was cancelled after ${outcome.steps} steps`);
      return { success: false, error: 'cancelled', data: outcome };
  }
}

export async function setupResolveCommand(packageName: string, options: ResolveCommandOptions): Promise<void> {
  const result = await resolveCommand(packageName, options, getCliOutput());
  if (!result.success) {
    process.exitCode = 1;
  }
}
