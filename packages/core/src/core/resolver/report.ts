/**
 * Dependency graph of a solved selection.
 */

import { evaluateForSelection } from '../formula/evaluate.js';
import type { Formula } from '../formula/types.js';
import type { PackageUniverse } from '../universe/universe.js';
import { constraintsHold } from '../version/constraint.js';
import type { Version } from '../version/version.js';
import type { Selection } from './types.js';

export interface ResolvedNode {
  name: string;
  version: Version;
  /** Selected packages this package's formula was satisfied through */
  dependencies: string[];
  /** Selected packages that depend on this one */
  dependents: string[];
}

export type ResolvedGraph = Map<string, ResolvedNode>;

/**
 * Names of the leaves that make the formula true under the selection:
 * both sides of an AND, the first true side of an OR, nothing under NOT.
 */
function witnessNames(formula: Formula, selection: Selection, into: string[]): void {
  switch (formula.kind) {
    case 'package': {
      const selected = selection.get(formula.name);
      if (selected !== undefined && constraintsHold(formula.constraints, selected) && !into.includes(formula.name)) {
        into.push(formula.name);
      }
      return;
    }
    case 'and':
      witnessNames(formula.left, selection, into);
      witnessNames(formula.right, selection, into);
      return;
    case 'or':
      witnessNames(evaluateForSelection(formula.left, selection) ? formula.left : formula.right, selection, into);
      return;
    case 'not':
      return;
  }
}

/**
 * Build the dependency graph for a selection, in selection order.
 */
export function buildResolvedGraph(universe: PackageUniverse, selection: Selection): ResolvedGraph {
  const graph: ResolvedGraph = new Map();

  // First pass: nodes and their dependencies
  for (const [name, version] of selection) {
    const entry = universe.get(name, version);
    const dependencies: string[] = [];
    if (entry?.depends) {
      witnessNames(entry.depends, selection, dependencies);
    }
    graph.set(name, {
      name,
      version,
      dependencies: dependencies.filter(dep => dep !== name),
      dependents: []
    });
  }

  // Second pass: dependents
  for (const [name, node] of graph) {
    for (const depName of node.dependencies) {
      const depNode = graph.get(depName);
      if (depNode && !depNode.dependents.includes(name)) {
        depNode.dependents.push(name);
      }
    }
  }

  return graph;
}

/**
 * Topological order with leaves first, the order in which packages would
 * be built. Post-order DFS from the roots; cycles are visited once.
 */
export function computeInstallOrder(graph: ResolvedGraph, roots: readonly string[]): string[] {
  const order: string[] = [];
  const visited = new Set<string>();

  const visit = (name: string): void => {
    if (visited.has(name)) return;
    visited.add(name);
    const node = graph.get(name);
    if (!node) return;
    for (const dep of node.dependencies) {
      visit(dep);
    }
    order.push(name);
  };

  for (const root of roots) {
    visit(root);
  }

  // Nodes unreachable from the roots
  for (const name of graph.keys()) {
    visit(name);
  }

  return order;
}

/**
 * `name version` lines in selection order.
 */
export function formatSelection(selection: Selection): string[] {
  return [...selection].map(([name, version]) => `${name} ${version.raw}`);
}
