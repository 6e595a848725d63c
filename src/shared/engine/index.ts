// =============================================================================
// TAKE-AWAY ENGINE - PUBLIC API
// =============================================================================
// Hosts (the runtime session, scripted simulations, tests) should import from
// this file only.
//
// Design principles:
// - NARROW: only the position model, the evaluators and the turn engine
// - DETERMINISTIC: every ordered output goes through the canonical vertex order
// - SYNCHRONOUS: no I/O, no logger, no config
// =============================================================================

export type {
  Vertex,
  HypergraphSnapshot,
  GameTreeNode,
  PositionClass,
  TakeAwayMove,
  MoveRecord,
} from '../types/hypergraph';

// Position model
export {
  HypergraphState,
  compareVertices,
  compareMemberLists,
  simpleHash,
} from './HypergraphState';

// Evaluation
export { mex } from './mex';
export { GrundyEvaluator, GrundyCache } from './GrundyEvaluator';
export type { GrundyCacheStats, GrundyEvaluatorOptions } from './GrundyEvaluator';
export { buildGameTree, countTreeNodes, treeDepth } from './gameTree';
export type { GameTreeOptions } from './gameTree';

// Turn handling
export { TurnEngine, DEFAULT_PLAYERS } from './TurnEngine';

// Errors
export {
  EngineError,
  EngineErrorCode,
  ValidationError,
  InvalidMoveError,
  PositionParseError,
  isEngineError,
  isValidationError,
  isInvalidMoveError,
} from './errors';
export type { EngineErrorJSON } from './errors';
