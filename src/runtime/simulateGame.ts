import type { HypergraphSnapshot, TakeAwayMove } from '../shared/engine';
import { isEngineError } from '../shared/engine';
import { GameSession, type GameSessionOptions } from './game/GameSession';
import { getLogger } from './utils/logger';

export interface SimulationStep {
  mover: string;
  move: TakeAwayMove;
  /** Position after the move, or unchanged when it was rejected. */
  display: string;
  nextPlayer: string;
  gameOver: boolean;
  error?: string;
}

export interface SimulationResult {
  initial: string;
  steps: SimulationStep[];
  winner: string | null;
  /**
   * False when a scripted move was rejected. True otherwise, including when
   * the game ended before every scripted move was played.
   */
  completed: boolean;
}

/** Four vertices: two edges and a face tying A to the C-D pair. */
export const DEMO_POSITION: HypergraphSnapshot = {
  vertices: ['A', 'B', 'C', 'D'],
  edges: [
    ['A', 'B'],
    ['C', 'D'],
  ],
  faces: [['A', 'C', 'D']],
};

export const DEMO_MOVES: TakeAwayMove[] = [
  { type: 'remove_vertex', vertex: 'A' },
  { type: 'remove_vertex', vertex: 'C' },
  { type: 'remove_vertex', vertex: 'B' },
  { type: 'remove_vertex', vertex: 'D' },
];

/**
 * Replays a scripted match. Stops at the first rejected move (recorded on
 * the step as `error`) or as soon as the game is over.
 */
export function runSimulation(
  position: unknown,
  moves: readonly TakeAwayMove[],
  options: GameSessionOptions = {}
): SimulationResult {
  const log = options.logger ?? getLogger('Simulation');
  const session = GameSession.fromInput(position, { ...options, logger: log });
  const initial = session.engine.state.toString();
  const steps: SimulationStep[] = [];

  log.info('Simulation started', { initial, moves: moves.length });

  for (const move of moves) {
    const mover = session.engine.currentPlayer;
    try {
      const snapshot = session.applyMove(move);
      steps.push({
        mover,
        move,
        display: snapshot.display,
        nextPlayer: snapshot.currentPlayer,
        gameOver: snapshot.isGameOver,
      });
    } catch (error) {
      if (!isEngineError(error)) {
        throw error;
      }
      steps.push({
        mover,
        move,
        display: session.engine.state.toString(),
        nextPlayer: session.engine.currentPlayer,
        gameOver: session.engine.isGameOver(),
        error: error.message,
      });
      return { initial, steps, winner: session.engine.winner, completed: false };
    }

    if (session.engine.isGameOver()) {
      break;
    }
  }

  const winner = session.engine.winner;
  log.info('Simulation finished', { winner, steps: steps.length });
  return { initial, steps, winner, completed: true };
}
