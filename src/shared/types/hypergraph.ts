/**
 * Shared hypergraph and game-tree types.
 *
 * These shapes are consumed by the engine, the validation layer and the
 * runtime session. Keep them plain and serialisable so positions can be
 * written to logs and fixtures without a custom encoder.
 */

/** Opaque vertex identifier. */
export type Vertex = string | number;

/**
 * Plain-object form of a position. Member lists are in canonical order when
 * produced by `HypergraphState.toSnapshot()`, but any order is accepted on
 * the way in.
 */
export interface HypergraphSnapshot {
  vertices: Vertex[];
  edges: Vertex[][];
  faces: Vertex[][];
}

/** One node of an explored game tree. */
export interface GameTreeNode {
  /** Display form of the position (see HypergraphState.toString). */
  state: string;
  grundy: number;
  children: GameTreeNode[];
  /** Set when exploration stopped at the depth limit. */
  truncated?: true;
  /** Set when the position already appears on the current path. */
  cycleDetected?: true;
}

/** P-position: previous player wins. N-position: next player wins. */
export type PositionClass = 'P' | 'N';

export type TakeAwayMove =
  | { type: 'remove_vertex'; vertex: Vertex }
  | { type: 'remove_hyperedge'; vertices: Vertex[] };

export interface MoveRecord {
  player: string;
  move: TakeAwayMove;
}
