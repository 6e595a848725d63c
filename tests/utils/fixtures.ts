/**
 * Test fixtures and utilities for creating take-away positions
 */

import { HypergraphState } from '../../src/shared/engine/HypergraphState';
import type { GameTreeNode, Vertex } from '../../src/shared/types/hypergraph';

/**
 * Build a position in the order given: vertices first, then edges, then faces.
 */
export function buildState(
  vertices: Vertex[],
  edges: Vertex[][] = [],
  faces: Vertex[][] = []
): HypergraphState {
  const state = new HypergraphState();
  vertices.forEach((v) => state.addVertex(v));
  edges.forEach((e) => state.addEdge(e));
  faces.forEach((f) => state.addFace(f));
  return state;
}

/** n isolated vertices named 'v0'..'v{n-1}'. */
export function isolatedVertices(n: number): HypergraphState {
  return buildState(Array.from({ length: n }, (_, i) => `v${i}`));
}

/** A simple path v0 - v1 - ... - v{n-1}. */
export function pathGraph(n: number): HypergraphState {
  const vertices = Array.from({ length: n }, (_, i) => `v${i}`);
  const edges = vertices.slice(1).map((v, i) => [vertices[i], v]);
  return buildState(vertices, edges);
}

/**
 * Child nodes sorted by label, recursively, so assertions do not depend on
 * vertex iteration order.
 */
export function normalizeTree(node: GameTreeNode): GameTreeNode {
  const children = node.children
    .map(normalizeTree)
    .sort((a, b) => (a.state < b.state ? -1 : a.state > b.state ? 1 : 0));
  return { ...node, children };
}
