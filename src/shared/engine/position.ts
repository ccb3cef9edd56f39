import type {
  File,
  HandPool,
  Piece,
  PieceFace,
  PieceType,
  Side,
  Square,
  SquareContent,
} from '../types/shogi';
import { PIECE_TYPES, SIDES } from '../types/shogi';
import { ALL_SQUARES, SQUARE_COUNT, isValidSquare, squaresInFile } from './coordinates';
import { BoardConstraintViolation, EngineErrorCode, InvalidState } from './errors';

/**
 * Squares grouped by side and face. Only faces actually present appear.
 */
export type PieceLocationIndex = Readonly<
  Record<Side, Readonly<Partial<Record<PieceFace, readonly Square[]>>>>
>;

export interface PositionInit {
  /** 81 entries in square-index order. */
  squares: readonly SquareContent[];
  /** Hand counts per side; omitted types count as zero. */
  hands?: Partial<Record<Side, Partial<Record<PieceType, number>>>>;
  sideToMove: Side;
}

export const EMPTY_HAND: HandPool = Object.freeze({
  pawn: 0,
  lance: 0,
  knight: 0,
  silver: 0,
  gold: 0,
  bishop: 0,
  rook: 0,
  king: 0,
});

// Derived per instance on first use. Kept outside the class so Position
// instances carry only their value fields.
const locationIndexCache = new WeakMap<Position, PieceLocationIndex>();

function normalizeHand(side: Side, counts: Partial<Record<PieceType, number>> = {}): HandPool {
  const hand: Record<PieceType, number> = { ...EMPTY_HAND };
  for (const type of PIECE_TYPES) {
    const count = counts[type] ?? 0;
    if (!Number.isInteger(count) || count < 0) {
      throw new InvalidState(
        EngineErrorCode.STATE_INVALID_HAND_COUNT,
        `Hand count for ${side} ${type} must be a non-negative integer`,
        { side, type, count }
      );
    }
    hand[type] = count;
  }
  return Object.freeze(hand);
}

function freezePiece(content: SquareContent): SquareContent {
  return content === null ? null : Object.freeze({ side: content.side, face: content.face });
}

/**
 * Immutable shogi position: 81 squares, two hands and the side to move.
 *
 * Every derivation returns a new instance; nothing mutates an existing one.
 * Equality is by value via {@link Position.equals}.
 */
export class Position {
  readonly sideToMove: Side;
  private readonly board: readonly SquareContent[];
  private readonly hands: Readonly<Record<Side, HandPool>>;

  private constructor(
    board: readonly SquareContent[],
    hands: Readonly<Record<Side, HandPool>>,
    sideToMove: Side
  ) {
    this.board = board;
    this.hands = hands;
    this.sideToMove = sideToMove;
  }

  static create(init: PositionInit): Position {
    if (init.squares.length !== SQUARE_COUNT) {
      throw new InvalidState(
        EngineErrorCode.STATE_INVALID_SQUARE_COUNT,
        `A position needs exactly ${SQUARE_COUNT} squares`,
        { received: init.squares.length }
      );
    }
    const board = Object.freeze(init.squares.map(freezePiece));
    const hands = Object.freeze({
      sente: normalizeHand('sente', init.hands?.sente),
      gote: normalizeHand('gote', init.hands?.gote),
    });
    return new Position(board, hands, init.sideToMove);
  }

  /** Read-only view of the 81 squares in index order. */
  get squares(): readonly SquareContent[] {
    return this.board;
  }

  at(square: Square): SquareContent {
    if (!isValidSquare(square)) {
      throw new BoardConstraintViolation(
        EngineErrorCode.BOARD_INVALID_SQUARE,
        `Square index ${square} is off the board`,
        { square }
      );
    }
    return this.board[square] ?? null;
  }

  hand(side: Side): HandPool {
    return this.hands[side];
  }

  handCount(side: Side, type: PieceType): number {
    return this.hands[side][type];
  }

  /**
   * All squares whose content matches. Accepts either a predicate or a set
   * of side/face pairs (compared by value).
   */
  search(match: ((content: SquareContent, square: Square) => boolean) | readonly Piece[]): Square[] {
    const predicate =
      typeof match === 'function'
        ? match
        : (content: SquareContent) =>
            content !== null &&
            match.some((piece) => piece.side === content.side && piece.face === content.face);
    return ALL_SQUARES.filter((square) => predicate(this.board[square] ?? null, square));
  }

  fileContents(file: File): SquareContent[] {
    return squaresInFile(file).map((square) => this.board[square] ?? null);
  }

  /** Unpromoted pawns of `side` in `file`; backs the double-pawn rule. */
  pawnCount(side: Side, file: File): number {
    return this.fileContents(file).filter(
      (content) => content !== null && content.side === side && content.face === 'pawn'
    ).length;
  }

  pieceLocations(side: Side): Readonly<Partial<Record<PieceFace, readonly Square[]>>> {
    return this.locationIndex()[side];
  }

  /** Square of the side's king, or undefined once it has been captured. */
  kingSquare(side: Side): Square | undefined {
    return this.pieceLocations(side).king?.[0];
  }

  withSquare(square: Square, content: SquareContent): Position {
    const board = [...this.board];
    board[square] = content;
    return Position.create({ squares: board, hands: this.hands, sideToMove: this.sideToMove });
  }

  withHandCount(side: Side, type: PieceType, count: number): Position {
    const hands = {
      sente: { ...this.hands.sente },
      gote: { ...this.hands.gote },
    };
    hands[side][type] = count;
    return Position.create({ squares: this.board, hands, sideToMove: this.sideToMove });
  }

  withSideToMove(side: Side): Position {
    return new Position(this.board, this.hands, side);
  }

  equals(other: Position): boolean {
    if (this === other) return true;
    if (this.sideToMove !== other.sideToMove) return false;
    for (const side of SIDES) {
      for (const type of PIECE_TYPES) {
        if (this.hands[side][type] !== other.hands[side][type]) return false;
      }
    }
    return this.board.every((content, square) => {
      const theirs = other.board[square] ?? null;
      if (content === null || theirs === null) return content === theirs;
      return content.side === theirs.side && content.face === theirs.face;
    });
  }

  private locationIndex(): PieceLocationIndex {
    const cached = locationIndexCache.get(this);
    if (cached) return cached;

    const index: Record<Side, Partial<Record<PieceFace, Square[]>>> = { sente: {}, gote: {} };
    this.board.forEach((content, square) => {
      if (content === null) return;
      const bySide = index[content.side];
      const squares = bySide[content.face] ?? [];
      squares.push(square);
      bySide[content.face] = squares;
    });
    locationIndexCache.set(this, index);
    return index;
  }
}
