/**
 * TurnEngine - two-player alternation over a live take-away position
 *
 * The engine owns its HypergraphState and mutates it in place on every
 * accepted move. Evaluators must be handed `state.copy()`, never the live
 * state.
 *
 * Phases are derived rather than stored: the game is over exactly when the
 * live vertex set is empty. Under normal play the player who removes the
 * last vertex wins.
 *
 * Two behaviours are kept exactly as the game has always had them:
 * - `moveHyperedge` never checks for or records a winner;
 * - `undo` restores the position and the turn but leaves `winner` as it was.
 *
 * @module TurnEngine
 */

import type { MoveRecord, Vertex } from '../types/hypergraph';
import { EngineErrorCode, InvalidMoveError, ValidationError } from './errors';
import { HypergraphState } from './HypergraphState';

export const DEFAULT_PLAYERS: readonly [string, string] = ['Player 1', 'Player 2'];

export class TurnEngine {
  private live: HypergraphState;
  private readonly players: readonly [string, string];
  private activeIndex: 0 | 1 = 0;
  private winnerName: string | null = null;
  private readonly snapshots: HypergraphState[] = [];
  private readonly moveLog: MoveRecord[] = [];

  constructor(initial: HypergraphState, players: readonly string[] = DEFAULT_PLAYERS) {
    if (players.length !== 2) {
      throw new ValidationError(
        EngineErrorCode.VALIDATION_PLAYER_COUNT,
        `A take-away game needs exactly two players, got ${players.length}.`,
        { players: [...players] },
        'TurnEngine'
      );
    }
    this.live = initial;
    this.players = [players[0], players[1]];
  }

  get state(): HypergraphState {
    return this.live;
  }

  get currentPlayer(): string {
    return this.players[this.activeIndex];
  }

  get currentPlayerIndex(): 0 | 1 {
    return this.activeIndex;
  }

  get playerNames(): readonly [string, string] {
    return this.players;
  }

  get winner(): string | null {
    return this.winnerName;
  }

  /** Number of snapshots available to `undo`. */
  get historyLength(): number {
    return this.snapshots.length;
  }

  getMoveLog(): ReadonlyArray<MoveRecord> {
    return this.moveLog;
  }

  isGameOver(): boolean {
    return this.live.isEmpty();
  }

  /**
   * Removes `vertex` and everything incident to it. Throws InvalidMoveError
   * when the vertex is not in the live position; the state is then unchanged.
   */
  moveVertex(vertex: Vertex): void {
    if (!this.live.hasVertex(vertex)) {
      throw new InvalidMoveError(`Vertex ${String(vertex)} not found in hypergraph`, {
        vertex,
        player: this.currentPlayer,
      });
    }

    const mover = this.currentPlayer;
    this.snapshots.push(this.live.copy());
    this.live.removeVertex(vertex);
    this.moveLog.push({ player: mover, move: { type: 'remove_vertex', vertex } });

    if (this.live.isEmpty()) {
      this.winnerName = mover;
    }
    this.nextPlayer();
  }

  /**
   * Retracts a connection: every face containing all of `vertices`, plus
   * the exact edge when two vertices are given. Vertices are never removed
   * here, so no terminal check is made.
   */
  moveHyperedge(vertices: Iterable<Vertex>): void {
    const members = Array.from(vertices);
    this.snapshots.push(this.live.copy());
    this.live.removeHyperedge(members);
    this.moveLog.push({
      player: this.currentPlayer,
      move: { type: 'remove_hyperedge', vertices: members },
    });
    this.nextPlayer();
  }

  undo(): void {
    const previous = this.snapshots.pop();
    if (!previous) {
      return;
    }
    this.live = previous;
    this.moveLog.pop();
    this.nextPlayer();
  }

  private nextPlayer(): void {
    this.activeIndex = this.activeIndex === 0 ? 1 : 0;
  }
}
