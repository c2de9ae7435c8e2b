/**
 * Display utilities for resolution results.
 */

import type { OutputPort } from '../ports/output.js';
import { consoleOutput } from '../ports/console-output.js';
import type { PackageUniverse } from '../universe/universe.js';
import { buildResolvedGraph, computeInstallOrder, type ResolvedNode } from './report.js';
import type { Conflict, ResolutionEvent, Selection } from './types.js';

function formatDependencies(node: ResolvedNode): string {
  return node.dependencies.length > 0 ? ` -> ${node.dependencies.join(', ')}` : '';
}

function formatPairs(selection: Selection): string {
  return [...selection].map(([name, version]) => `${name}@${version.raw}`).join(', ');
}

/**
 * Show a solved selection as a dependency list plus install order.
 */
export function displaySelection(
  universe: PackageUniverse,
  rootName: string,
  selection: Selection,
  output: OutputPort = consoleOutput
): void {
  const graph = buildResolvedGraph(universe, selection);
  const root = graph.get(rootName);
  if (!root) return;

  output.info(`Resolved ${root.name}@${root.version.raw} with dependencies:`);
  output.info(`${root.name}@${root.version.raw} (root)${formatDependencies(root)}`);

  for (const node of graph.values()) {
    if (node.name === rootName) continue;
    output.info(`├── ${node.name}@${node.version.raw}${formatDependencies(node)}`);
  }

  output.info(`Install order: ${computeInstallOrder(graph, [rootName]).join(', ')}`);
  output.info(`Total: ${graph.size} packages`);
}

export function displayConflict(conflict: Conflict, output: OutputPort = consoleOutput): void {
  output.error(conflict.message);
  if (conflict.partialSelection.size > 0) {
    output.info(`Partial selection: ${formatPairs(conflict.partialSelection)}`);
  }
}

/**
 * One trace line per search event, indented by search depth.
 */
export function formatResolutionEvent(event: ResolutionEvent): string {
  switch (event.type) {
    case 'choosing':
      return `${'  '.repeat(event.depth)}choose ${event.packageName} from ${event.candidates.map(v => v.raw).join(', ')}`;
    case 'committed':
      return `${'  '.repeat(event.depth)}commit ${event.packageName}@${event.version.raw}`;
    case 'backtrack':
      return `${'  '.repeat(event.depth)}backtrack to ${event.choice}`;
    case 'solved':
      return `solved: ${formatPairs(event.selection)}`;
    case 'exhausted':
      return `exhausted: ${event.conflict.message}`;
  }
}
