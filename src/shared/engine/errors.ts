/**
 * Engine Domain Errors - Structured error types for the shogi rules engine
 *
 * Two very different failure families live here:
 *
 * - **Recoverable input errors**: malformed board diagrams or move records.
 *   These surface as {@link NotationParseError} carrying the offending
 *   remainder of the input so callers can correct and retry.
 * - **Defects**: a Move applied to a Position it was not generated for, or a
 *   Position assembled from inconsistent parts. These throw immediately via
 *   {@link assertInvariant} / {@link InvalidState} and are never caught by
 *   engine code.
 *
 * Move generation never throws; an empty move list is a valid result.
 *
 * Usage:
 * ```typescript
 * import { NotationParseError, EngineErrorCode, assertInvariant } from './errors';
 *
 * assertInvariant(position.at(move.from) !== null, 'Origin square is empty', {
 *   from: move.from,
 * });
 * ```
 *
 * @module EngineErrors
 */

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Enumeration of all engine domain error codes.
 *
 * Error codes are prefixed by category:
 * - RULES_*: Moves that are not legal in the position they are applied to
 * - STATE_*: Position corruption/inconsistency
 * - BOARD_*: Coordinates outside the 9x9 board
 * - MOVE_*: Move shape problems
 * - NOTATION_*: Board diagram and move record decoding failures
 * - INTERNAL_*: Broken engine contracts (bugs)
 */
export enum EngineErrorCode {
  // Rules Violations
  /** Decoded move is not among the moves generated for the position */
  RULES_MOVE_NOT_GENERATED = 'RULES_MOVE_NOT_GENERATED',

  // State Errors
  /** Square array does not contain exactly 81 entries */
  STATE_INVALID_SQUARE_COUNT = 'STATE_INVALID_SQUARE_COUNT',
  /** Hand count is negative or not an integer */
  STATE_INVALID_HAND_COUNT = 'STATE_INVALID_HAND_COUNT',
  /** Serialized position failed schema validation */
  STATE_INVALID_SERIALIZED_POSITION = 'STATE_INVALID_SERIALIZED_POSITION',

  // Board Constraint Violations
  /** File or rank outside 1..9, or square index outside 0..80 */
  BOARD_INVALID_SQUARE = 'BOARD_INVALID_SQUARE',

  // Move Errors
  /** Terminal token or move type not recognised */
  MOVE_UNKNOWN_TYPE = 'MOVE_UNKNOWN_TYPE',

  // Notation Errors
  /** Parser expected a different token */
  NOTATION_UNEXPECTED_TOKEN = 'NOTATION_UNEXPECTED_TOKEN',
  /** Tokenizer found a character outside the notation alphabet */
  NOTATION_UNKNOWN_CHARACTER = 'NOTATION_UNKNOWN_CHARACTER',
  /** Move token is well-formed but inconsistent with the position */
  NOTATION_INCONSISTENT_MOVE = 'NOTATION_INCONSISTENT_MOVE',

  // Internal Errors - should never happen in correct code
  /** Assertion failed - indicates a bug */
  INTERNAL_ASSERTION_FAILED = 'INTERNAL_ASSERTION_FAILED',
}

/**
 * Maps error codes to human-readable category descriptions.
 */
export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  RULES_: 'Move is not legal in this position',
  STATE_: 'Corrupted or unexpected position state',
  BOARD_: 'Board coordinate out of range',
  MOVE_: 'Malformed move',
  NOTATION_: 'Notation could not be decoded',
  INTERNAL_: 'Internal engine error (bug)',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all engine domain errors.
 */
export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Domain that generated the error (e.g., 'MoveApplication', 'BoardDiagram') */
  readonly domain: string;

  /** Timestamp when error occurred */
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

  /** Serialize to a JSON-safe object for logging/debugging */
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

/**
 * JSON representation of an EngineError.
 */
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
 * Error for corrupted or inconsistent position state.
 *
 * Examples:
 * - Square array of the wrong length
 * - Negative hand count
 * - Serialized position that fails schema validation
 */
export class InvalidState extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'State'
  ) {
    super(code, message, context, domain);
    this.name = 'InvalidState';
    Object.setPrototypeOf(this, InvalidState.prototype);
  }
}

/**
 * Error for coordinates outside the 9x9 board.
 */
export class BoardConstraintViolation extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Board'
  ) {
    super(code, message, context, domain);
    this.name = 'BoardConstraintViolation';
    Object.setPrototypeOf(this, BoardConstraintViolation.prototype);
  }
}

/**
 * Recoverable decoding failure for board diagrams and move records.
 *
 * `expected` names what the parser wanted, `offset` is the character offset
 * into the input where decoding stopped, and `remainder` is the unconsumed
 * input from that offset on. The message is `"<expected>. ^<remainder>"`.
 */
export class NotationParseError extends EngineError {
  readonly expected: string;
  readonly offset: number;
  readonly remainder: string;

  constructor(
    code: EngineErrorCode,
    expected: string,
    input: string,
    offset: number,
    domain: string = 'Notation'
  ) {
    const remainder = input.slice(offset);
    super(code, `${expected}. ^${remainder}`, { expected, offset }, domain);
    this.name = 'NotationParseError';
    this.expected = expected;
    this.offset = offset;
    this.remainder = remainder;
    Object.setPrototypeOf(this, NotationParseError.prototype);
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

/**
 * Check if an error is an EngineError.
 */
export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function isInvalidState(error: unknown): error is InvalidState {
  return error instanceof InvalidState;
}

export function isBoardConstraintViolation(error: unknown): error is BoardConstraintViolation {
  return error instanceof BoardConstraintViolation;
}

export function isNotationParseError(error: unknown): error is NotationParseError {
  return error instanceof NotationParseError;
}

// =============================================================================
// UTILITIES
// =============================================================================

/**
 * Wrap an unknown error in an EngineError.
 *
 * Useful for catching and normalizing errors at domain boundaries.
 */
export function wrapEngineError(
  error: unknown,
  domain: string = 'Engine',
  context: Record<string, unknown> = {}
): EngineError {
  if (isEngineError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new EngineError(
    EngineErrorCode.INTERNAL_ASSERTION_FAILED,
    message,
    {
      ...context,
      originalStack: stack,
    },
    domain
  );
}

/**
 * Throw an INTERNAL_ASSERTION_FAILED EngineError when `condition` is false.
 *
 * Used for engine contracts whose violation means the caller handed the
 * engine something it did not produce, e.g. a Move generated for another
 * Position. Never use this for user input.
 */
export function assertInvariant(
  condition: boolean,
  message: string,
  context: Record<string, unknown> = {},
  domain: string = 'Engine'
): asserts condition {
  if (!condition) {
    throw new EngineError(EngineErrorCode.INTERNAL_ASSERTION_FAILED, message, context, domain);
  }
}
