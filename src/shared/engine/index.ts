// =============================================================================
// SHOGI RULES ENGINE - PUBLIC API
// =============================================================================
// Hosts (scripts, the Node exploration runner, tests of consumers) should only
// import from this file.
//
// Design principles:
// - NARROW: Only essential functions are exported
// - PURE: Positions are immutable; every operation returns new values
// - HOST-AGNOSTIC: No logging, timers or I/O below this barrel
// =============================================================================

// =============================================================================
// CORE TYPES (from src/shared/types/shogi.ts)
// =============================================================================

export type {
  Side,
  Square,
  File,
  Rank,
  PieceType,
  PromotedPieceFace,
  PieceFace,
  Piece,
  SquareContent,
  HandPool,
  TerminalReason,
  MoveType,
  NormalMove,
  DropMove,
  TerminalMove,
  Move,
} from '../types/shogi';
export { SIDES, PIECE_TYPES, PIECE_FACES } from '../types/shogi';

// =============================================================================
// BOARD GEOMETRY & PIECES
// =============================================================================

export type { Direction } from './coordinates';
export {
  BOARD_SIZE,
  SQUARE_COUNT,
  ALL_SQUARES,
  FILES,
  RANKS,
  oppositeSide,
  forwardSign,
  isValidSquare,
  squareOf,
  fileOf,
  rankOf,
  offsetSquare,
  promotionZone,
  isInPromotionZone,
  formatSquare,
} from './coordinates';

export type { PieceFaceRules } from './pieces';
export {
  PIECE_FACE_RULES,
  baseTypeOf,
  promotedFaceOf,
  canPromote,
  isPlacementProhibited,
} from './pieces';

// =============================================================================
// POSITION
// =============================================================================

export type { PositionInit, PieceLocationIndex } from './position';
export { Position, EMPTY_HAND } from './position';
export { createStartingPosition, createEmptyPosition } from './initialState';

// =============================================================================
// MOVES
// =============================================================================

export { normalMove, dropMove, terminalMove, movesEqual, moveKey } from './moves';
export { formatMove, formatMoveList } from './notation';

// Generation
export { reachableSquares, isDropAllowed, generateMoves, generateMovesFrom } from './movementLogic';

// Execution
export { applyMove, successorPositions, handSize } from './movementApplication';

// Check & checkmate
export {
  attackedSquares,
  attackersOf,
  kingCaptureMoves,
  generateMovesWithKingCapture,
  isInCheck,
  leavesKingEnPrise,
  generateKingSafeMoves,
  findCheckingMoves,
  isCheckmate,
} from './checkDetection';

// =============================================================================
// EXPLORATION
// =============================================================================

export type { ExplorationOptions, ExplorationResult } from './exploration';
export { PositionExplorer, explorePositions } from './exploration';

// =============================================================================
// NOTATION CODECS
// =============================================================================

export { decodeBoardDiagram, encodeBoardDiagram } from './codecs/boardDiagram';
export { decodeMoveToken, encodeMoveToken } from './codecs/moveRecord';
export type { GameRecord } from './codecs/gameRecord';
export { decodeGameRecord, encodeGameRecord, finalPosition } from './codecs/gameRecord';

// =============================================================================
// CONTRACTS
// =============================================================================

export * from './contracts';

// =============================================================================
// ERRORS
// =============================================================================

export type { EngineErrorJSON } from './errors';
export {
  EngineErrorCode,
  ERROR_CATEGORY_DESCRIPTIONS,
  EngineError,
  InvalidState,
  BoardConstraintViolation,
  NotationParseError,
  isEngineError,
  isInvalidState,
  isBoardConstraintViolation,
  isNotationParseError,
  wrapEngineError,
} from './errors';
