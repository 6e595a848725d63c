import winston from 'winston';

import { EngineErrorCode, InvalidMoveError, PositionParseError } from '../../src/shared/engine/errors';
import { countTreeNodes } from '../../src/shared/engine/gameTree';
import { GameSession } from '../../src/runtime/game/GameSession';
import { DEMO_POSITION } from '../../src/runtime/simulateGame';

describe('GameSession', () => {
  let logger: winston.Logger;

  beforeEach(() => {
    logger = winston.createLogger({ silent: true });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('reports the starting position', () => {
    const session = GameSession.fromInput(DEMO_POSITION, { logger });

    expect(session.snapshot()).toEqual({
      currentPlayer: 'Player 1',
      isGameOver: false,
      winner: null,
      display: 'V: {A, B, C, D} | E: {{A, B}, {C, D}} | F: {{A, C, D}}',
      grundy: 0,
      moveCount: 0,
    });
  });

  it('rejects a malformed starting position', () => {
    expect(() => GameSession.fromInput({ vertices: 'ABCD' }, { logger })).toThrow(
      PositionParseError
    );
  });

  describe('applyMove', () => {
    it('applies a vertex removal and logs it', () => {
      const info = jest.spyOn(logger, 'info');
      const session = GameSession.fromInput(DEMO_POSITION, { logger });

      const snapshot = session.applyMove({ type: 'remove_vertex', vertex: 'A' });

      expect(snapshot).toEqual({
        currentPlayer: 'Player 2',
        isGameOver: false,
        winner: null,
        display: 'V: {B, C, D} | E: {{C, D}} | F: {}',
        grundy: 1,
        moveCount: 1,
      });
      expect(info).toHaveBeenCalledWith(
        'Move applied',
        expect.objectContaining({
          player: 'Player 1',
          state: 'V: {B, C, D} | E: {{C, D}} | F: {}',
        })
      );
    });

    it('applies a hyperedge removal', () => {
      const session = GameSession.fromInput(DEMO_POSITION, { logger });

      const snapshot = session.applyMove({ type: 'remove_hyperedge', vertices: ['D', 'C'] });

      expect(snapshot.display).toBe('V: {A, B, C, D} | E: {{A, B}} | F: {}');
      expect(snapshot.currentPlayer).toBe('Player 2');
      expect(snapshot.winner).toBeNull();
    });

    it('logs and rethrows a move on a missing vertex', () => {
      const warn = jest.spyOn(logger, 'warn');
      const session = GameSession.fromInput(DEMO_POSITION, { logger });

      expect(() => session.applyMove({ type: 'remove_vertex', vertex: 'Z' })).toThrow(
        InvalidMoveError
      );
      expect(warn).toHaveBeenCalledWith(
        'Move rejected',
        expect.objectContaining({
          player: 'Player 1',
          error: expect.objectContaining({ code: EngineErrorCode.MOVE_UNKNOWN_VERTEX }),
        })
      );
      expect(session.snapshot().moveCount).toBe(0);
    });

    it('rejects a malformed payload before touching the engine', () => {
      const session = GameSession.fromInput(DEMO_POSITION, { logger });

      expect(() => session.applyMove({ type: 'fly', vertex: 'A' })).toThrow(
        expect.objectContaining({ code: EngineErrorCode.INPUT_INVALID_MOVE })
      );
      expect(session.engine.currentPlayer).toBe('Player 1');
    });

    it('announces the end of the game', () => {
      const info = jest.spyOn(logger, 'info');
      const session = GameSession.fromInput({ vertices: ['x'] }, { logger });

      const snapshot = session.applyMove({ type: 'remove_vertex', vertex: 'x' });

      expect(snapshot).toMatchObject({ isGameOver: true, winner: 'Player 1', grundy: 0 });
      expect(info).toHaveBeenCalledWith('Game over', { winner: 'Player 1' });
    });
  });

  describe('undo', () => {
    it('takes back the last move', () => {
      const info = jest.spyOn(logger, 'info');
      const session = GameSession.fromInput(DEMO_POSITION, { logger });
      session.applyMove({ type: 'remove_vertex', vertex: 'B' });

      const snapshot = session.undo();

      expect(snapshot.moveCount).toBe(0);
      expect(snapshot.currentPlayer).toBe('Player 1');
      expect(snapshot.display).toBe('V: {A, B, C, D} | E: {{A, B}, {C, D}} | F: {{A, C, D}}');
      expect(info).toHaveBeenLastCalledWith('Move undone', { currentPlayer: 'Player 1' });
    });

    it('ignores an undo with no history', () => {
      const debug = jest.spyOn(logger, 'debug');
      const session = GameSession.fromInput(DEMO_POSITION, { logger });

      expect(session.undo().currentPlayer).toBe('Player 1');
      expect(debug).toHaveBeenCalledWith('Undo ignored: no history');
    });
  });

  describe('evaluate', () => {
    it('skips positions above the vertex limit', () => {
      const warn = jest.spyOn(logger, 'warn');
      const session = GameSession.fromInput(DEMO_POSITION, { logger, maxEvalVertices: 2 });

      expect(session.evaluate()).toBeNull();
      expect(warn).toHaveBeenCalledWith('Position too large to evaluate', {
        vertices: 4,
        limit: 2,
      });
    });

    it('evaluates once the position fits the limit', () => {
      const session = GameSession.fromInput(DEMO_POSITION, { logger, maxEvalVertices: 3 });

      expect(session.snapshot().grundy).toBeNull();
      expect(session.applyMove({ type: 'remove_vertex', vertex: 'A' }).grundy).toBe(1);
    });
  });

  describe('explore', () => {
    it('builds a depth-limited tree of the live position', () => {
      const session = GameSession.fromInput(DEMO_POSITION, { logger });

      const tree = session.explore(1);

      expect(tree.grundy).toBe(0);
      expect(tree.children).toHaveLength(4);
      expect(tree.children.every((child) => child.truncated === true)).toBe(true);
    });

    it('defaults to the configured depth', () => {
      const session = GameSession.fromInput(DEMO_POSITION, { logger, treeMaxDepth: -1 });

      // 1 + 4 + 4*3 + 4*3*2 + 4*3*2*1 removal sequences
      expect(countTreeNodes(session.explore())).toBe(65);
    });

    it('leaves the live position alone', () => {
      const session = GameSession.fromInput(DEMO_POSITION, { logger });
      const before = session.engine.state.canonicalKey();

      session.explore();

      expect(session.engine.state.canonicalKey()).toBe(before);
    });
  });

  it('passes custom player names to the engine', () => {
    const session = GameSession.fromInput(DEMO_POSITION, { logger, players: ['Ann', 'Ben'] });

    expect(session.applyMove({ type: 'remove_vertex', vertex: 'C' }).currentPlayer).toBe('Ben');
  });
});
