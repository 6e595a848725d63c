/**
 * Engine Domain Errors - Structured error types for the take-away engine
 *
 * Error Categories:
 * - **ValidationError**: malformed insertions into a position (arity, unknown
 *   vertices) and malformed engine construction
 * - **InvalidMoveError**: a move that references a vertex not in the live state
 * - **PositionParseError**: an external position description that fails its
 *   schema
 *
 * Removal operations never throw; they are permissive no-ops on missing
 * members. Evaluation (mex, Grundy, game tree) is total over well-formed
 * states and defines no error of its own.
 *
 * Usage:
 * ```typescript
 * import { ValidationError, EngineErrorCode } from './errors';
 *
 * throw new ValidationError(
 *   EngineErrorCode.VALIDATION_EDGE_ARITY,
 *   'Edge must connect exactly two vertices',
 *   { size: 3 }
 * );
 * ```
 *
 * @module EngineErrors
 */

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Error codes are prefixed by category:
 * - VALIDATION_*: rejected insertions / construction
 * - MOVE_*: rejected moves
 * - INPUT_*: rejected external input
 */
export enum EngineErrorCode {
  /** Edge does not have exactly two distinct vertices */
  VALIDATION_EDGE_ARITY = 'VALIDATION_EDGE_ARITY',
  /** Face has fewer than three distinct vertices */
  VALIDATION_FACE_ARITY = 'VALIDATION_FACE_ARITY',
  /** Vertex is a non-finite number (NaN or an infinity) */
  VALIDATION_INVALID_VERTEX = 'VALIDATION_INVALID_VERTEX',
  /** Edge or face references a vertex missing from the position */
  VALIDATION_UNKNOWN_VERTEX = 'VALIDATION_UNKNOWN_VERTEX',
  /** Turn engine was not given exactly two players */
  VALIDATION_PLAYER_COUNT = 'VALIDATION_PLAYER_COUNT',

  /** Move references a vertex missing from the live position */
  MOVE_UNKNOWN_VERTEX = 'MOVE_UNKNOWN_VERTEX',

  /** Position description failed schema validation */
  INPUT_INVALID_POSITION = 'INPUT_INVALID_POSITION',
  /** Move payload failed schema validation */
  INPUT_INVALID_MOVE = 'INPUT_INVALID_MOVE',
}

export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  VALIDATION_: 'Malformed position insertion',
  MOVE_: 'Illegal move',
  INPUT_: 'Malformed external input',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Domain that generated the error (e.g. 'Hypergraph', 'TurnEngine') */
  readonly domain: string;

  readonly timestamp: Date;

  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Engine'
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = context;
    this.domain = domain;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    const prefix = this.code.split('_')[0] + '_';
    return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
  }

  /** Serialize to a JSON-safe object for logging */
  toJSON(): EngineErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      context: this.context,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

export interface EngineErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  domain: string;
  context: Record<string, unknown>;
  category: string;
  timestamp: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * Thrown by insertion operations (`addEdge`, `addFace`) and by engine
 * construction. Never thrown by removals.
 */
export class ValidationError extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Hypergraph'
  ) {
    super(code, message, context, domain);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Thrown synchronously by `TurnEngine.moveVertex` when the vertex is not in
 * the live position. Recoverable: the caller may retry with a valid vertex.
 */
export class InvalidMoveError extends EngineError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(EngineErrorCode.MOVE_UNKNOWN_VERTEX, message, context, 'TurnEngine');
    this.name = 'InvalidMoveError';
    Object.setPrototypeOf(this, InvalidMoveError.prototype);
  }
}

export class PositionParseError extends EngineError {
  constructor(
    message: string,
    context: Record<string, unknown> = {},
    code: EngineErrorCode = EngineErrorCode.INPUT_INVALID_POSITION
  ) {
    super(code, message, context, 'Input');
    this.name = 'PositionParseError';
    Object.setPrototypeOf(this, PositionParseError.prototype);
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isInvalidMoveError(error: unknown): error is InvalidMoveError {
  return error instanceof InvalidMoveError;
}
