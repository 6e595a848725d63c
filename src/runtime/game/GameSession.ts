import type winston from 'winston';
import {
  GrundyEvaluator,
  HypergraphState,
  TurnEngine,
  buildGameTree,
  isEngineError,
  type GameTreeNode,
} from '../../shared/engine';
import { parseMove, parsePosition } from '../../shared/validation/schemas';
import { config } from '../config';
import { getLogger } from '../utils/logger';

export interface SessionSnapshot {
  currentPlayer: string;
  isGameOver: boolean;
  winner: string | null;
  display: string;
  /** Null when the position is too large to evaluate. */
  grundy: number | null;
  moveCount: number;
}

export interface GameSessionOptions {
  players?: readonly string[];
  evaluator?: GrundyEvaluator;
  logger?: winston.Logger;
  /** Defaults to config.engine.maxEvalVertices. */
  maxEvalVertices?: number;
  /** Defaults to config.engine.treeMaxDepth. */
  treeMaxDepth?: number;
}

/**
 * Host-side wrapper around a TurnEngine: validates incoming payloads, logs
 * each accepted or rejected move, and reports the position with its Grundy
 * value. The engine itself never logs; this is the layer that does.
 */
export class GameSession {
  readonly engine: TurnEngine;
  private readonly evaluator: GrundyEvaluator;
  private readonly log: winston.Logger;
  private readonly maxEvalVertices: number;
  private readonly treeMaxDepth: number;

  constructor(initial: HypergraphState, options: GameSessionOptions = {}) {
    this.engine = new TurnEngine(initial, options.players);
    this.evaluator = options.evaluator ?? new GrundyEvaluator();
    this.log = options.logger ?? getLogger('GameSession');
    this.maxEvalVertices = options.maxEvalVertices ?? config.engine.maxEvalVertices;
    this.treeMaxDepth = options.treeMaxDepth ?? config.engine.treeMaxDepth;
  }

  /** Start a session from an untrusted position description. */
  static fromInput(input: unknown, options: GameSessionOptions = {}): GameSession {
    return new GameSession(parsePosition(input), options);
  }

  /**
   * Apply a move payload (already typed, or raw input to validate). Rejected
   * moves are logged and rethrown unchanged.
   */
  applyMove(input: unknown): SessionSnapshot {
    const mover = this.engine.currentPlayer;
    try {
      const move = parseMove(input);
      if (move.type === 'remove_vertex') {
        this.engine.moveVertex(move.vertex);
      } else {
        this.engine.moveHyperedge(move.vertices);
      }
      this.log.info('Move applied', { player: mover, move, state: this.engine.state.toString() });
    } catch (error) {
      this.log.warn('Move rejected', {
        player: mover,
        error: isEngineError(error) ? error.toJSON() : error,
      });
      throw error;
    }

    if (this.engine.isGameOver()) {
      this.log.info('Game over', { winner: this.engine.winner });
    }
    return this.snapshot();
  }

  undo(): SessionSnapshot {
    const before = this.engine.historyLength;
    this.engine.undo();
    if (this.engine.historyLength < before) {
      this.log.info('Move undone', { currentPlayer: this.engine.currentPlayer });
    } else {
      this.log.debug('Undo ignored: no history');
    }
    return this.snapshot();
  }

  /** Grundy value of the live position, or null above the evaluation limit. */
  evaluate(): number | null {
    const state = this.engine.state;
    if (state.vertexCount > this.maxEvalVertices) {
      this.log.warn('Position too large to evaluate', {
        vertices: state.vertexCount,
        limit: this.maxEvalVertices,
      });
      return null;
    }
    return this.evaluator.grundyOfSum(state.copy());
  }

  explore(maxDepth: number = this.treeMaxDepth): GameTreeNode {
    return buildGameTree(this.engine.state.copy(), { maxDepth, evaluator: this.evaluator });
  }

  snapshot(): SessionSnapshot {
    return {
      currentPlayer: this.engine.currentPlayer,
      isGameOver: this.engine.isGameOver(),
      winner: this.engine.winner,
      display: this.engine.state.toString(),
      grundy: this.evaluate(),
      moveCount: this.engine.getMoveLog().length,
    };
  }
}
