import type { GameTreeNode } from '../types/hypergraph';
import { GrundyEvaluator } from './GrundyEvaluator';
import type { HypergraphState } from './HypergraphState';

export interface GameTreeOptions {
  /** Depth at which children stop being expanded. -1 means unbounded. */
  maxDepth?: number;
  /** Depth of `state` within the overall tree. */
  currentDepth?: number;
  /** Canonical keys of the ancestors on the current path. */
  visited?: ReadonlySet<string>;
  /** Evaluator used for node values. Defaults to a fresh one per call. */
  evaluator?: GrundyEvaluator;
}

/**
 * Explores every line of play from `state`, annotating each node with its
 * Grundy value.
 *
 * Checks run in this order: depth limit, then the path-local cycle guard,
 * then the empty terminal position. Each branch receives its own copy of the
 * visited set, so siblings only ever see their shared ancestors.
 *
 * The vertex-removal move always shrinks the position, so the cycle guard
 * cannot fire for it today; it stays for move types that might not.
 *
 * Child order follows vertex insertion order and is not part of the contract.
 */
export function buildGameTree(state: HypergraphState, options: GameTreeOptions = {}): GameTreeNode {
  const evaluator = options.evaluator ?? new GrundyEvaluator();
  return explore(
    state,
    options.maxDepth ?? -1,
    options.currentDepth ?? 0,
    options.visited ?? new Set<string>(),
    evaluator
  );
}

function explore(
  state: HypergraphState,
  maxDepth: number,
  currentDepth: number,
  visited: ReadonlySet<string>,
  evaluator: GrundyEvaluator
): GameTreeNode {
  const label = state.toString();

  if (maxDepth !== -1 && currentDepth >= maxDepth) {
    return { state: label, grundy: evaluator.grundy(state), children: [], truncated: true };
  }

  const key = state.canonicalKey();
  if (visited.has(key)) {
    return { state: label, grundy: evaluator.grundy(state), children: [], cycleDetected: true };
  }

  if (state.isEmpty()) {
    return { state: label, grundy: 0, children: [] };
  }

  const grundy = evaluator.grundy(state);
  const children: GameTreeNode[] = [];
  for (const v of state.vertexIterationOrder()) {
    const successor = state.copy();
    successor.removeVertex(v);
    const branchVisited = new Set(visited);
    branchVisited.add(key);
    children.push(explore(successor, maxDepth, currentDepth + 1, branchVisited, evaluator));
  }

  return { state: label, grundy, children };
}

export function countTreeNodes(node: GameTreeNode): number {
  return node.children.reduce((sum, child) => sum + countTreeNodes(child), 1);
}

/** Number of edges on the longest root-to-leaf path. */
export function treeDepth(node: GameTreeNode): number {
  let deepest = 0;
  for (const child of node.children) {
    deepest = Math.max(deepest, 1 + treeDepth(child));
  }
  return deepest;
}
