import {
  EngineError,
  EngineErrorCode,
  InvalidMoveError,
  PositionParseError,
  ValidationError,
  isEngineError,
  isInvalidMoveError,
  isValidationError,
} from '../../src/shared/engine/errors';

describe('engine errors', () => {
  it('keeps the prototype chain for each subclass', () => {
    const validation = new ValidationError(EngineErrorCode.VALIDATION_EDGE_ARITY, 'bad edge');
    const move = new InvalidMoveError('bad move');
    const parse = new PositionParseError('bad input');

    for (const error of [validation, move, parse]) {
      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(EngineError);
    }
    expect(validation).toBeInstanceOf(ValidationError);
    expect(move).toBeInstanceOf(InvalidMoveError);
    expect(parse).toBeInstanceOf(PositionParseError);
    expect(move).not.toBeInstanceOf(ValidationError);
  });

  it('fills in name, domain and code defaults', () => {
    const validation = new ValidationError(EngineErrorCode.VALIDATION_UNKNOWN_VERTEX, 'x');
    const move = new InvalidMoveError('y');
    const parse = new PositionParseError('z');

    expect([validation.name, validation.domain]).toEqual(['ValidationError', 'Hypergraph']);
    expect([move.name, move.domain, move.code]).toEqual([
      'InvalidMoveError',
      'TurnEngine',
      EngineErrorCode.MOVE_UNKNOWN_VERTEX,
    ]);
    expect([parse.name, parse.domain, parse.code]).toEqual([
      'PositionParseError',
      'Input',
      EngineErrorCode.INPUT_INVALID_POSITION,
    ]);
  });

  it('derives the category from the code prefix', () => {
    expect(new ValidationError(EngineErrorCode.VALIDATION_FACE_ARITY, 'x').category).toBe(
      'Malformed position insertion'
    );
    expect(new InvalidMoveError('x').category).toBe('Illegal move');
    expect(
      new PositionParseError('x', {}, EngineErrorCode.INPUT_INVALID_MOVE).category
    ).toBe('Malformed external input');
  });

  it('serializes to a log-friendly object', () => {
    const error = new InvalidMoveError('Vertex q not found in hypergraph', { vertex: 'q' });

    expect(error.toJSON()).toEqual({
      error: true,
      type: 'InvalidMoveError',
      code: 'MOVE_UNKNOWN_VERTEX',
      message: 'Vertex q not found in hypergraph',
      domain: 'TurnEngine',
      context: { vertex: 'q' },
      category: 'Illegal move',
      timestamp: error.timestamp.toISOString(),
    });
  });

  it('narrows unknown values with the type guards', () => {
    const move = new InvalidMoveError('m');
    const validation = new ValidationError(EngineErrorCode.VALIDATION_EDGE_ARITY, 'v');

    expect(isEngineError(move)).toBe(true);
    expect(isEngineError(new Error('plain'))).toBe(false);
    expect(isEngineError('text')).toBe(false);
    expect(isInvalidMoveError(move)).toBe(true);
    expect(isInvalidMoveError(validation)).toBe(false);
    expect(isValidationError(validation)).toBe(true);
    expect(isValidationError(move)).toBe(false);
  });
});
