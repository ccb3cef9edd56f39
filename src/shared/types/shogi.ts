/**
 * The two players. 'sente' moves first and starts on ranks 7-9; 'gote'
 * moves second and starts on ranks 1-3.
 */
export type Side = 'sente' | 'gote';

export const SIDES: readonly Side[] = ['sente', 'gote'];

/**
 * Board square as a 0..80 index.
 *
 * index = (rank - 1) * 9 + (9 - file), so square 0 is file 9 / rank 1 (the
 * top-left cell of a board diagram) and square 80 is file 1 / rank 9.
 */
export type Square = number;

/** File number, 1..9. Files are numbered right-to-left from sente's view. */
export type File = number;

/** Rank number, 1..9. Rank 1 is gote's back rank. */
export type Rank = number;

/**
 * Piece identity as it lives in a hand. Promotion state is never part of a
 * PieceType: capturing a promoted piece yields its base type.
 */
export type PieceType = 'pawn' | 'lance' | 'knight' | 'silver' | 'gold' | 'bishop' | 'rook' | 'king';

export const PIECE_TYPES: readonly PieceType[] = [
  'pawn',
  'lance',
  'knight',
  'silver',
  'gold',
  'bishop',
  'rook',
  'king',
];

export type PromotedPieceFace =
  | 'promoted_pawn'
  | 'promoted_lance'
  | 'promoted_knight'
  | 'promoted_silver'
  | 'horse'
  | 'dragon';

/**
 * The face a piece shows on the board: one per PieceType plus the six
 * promoted faces. Gold and king never promote.
 */
export type PieceFace = PieceType | PromotedPieceFace;

export const PIECE_FACES: readonly PieceFace[] = [
  ...PIECE_TYPES,
  'promoted_pawn',
  'promoted_lance',
  'promoted_knight',
  'promoted_silver',
  'horse',
  'dragon',
];

export interface Piece {
  readonly side: Side;
  readonly face: PieceFace;
}

/** Contents of a single board square; null when empty. */
export type SquareContent = Piece | null;

/**
 * Captured pieces available to drop, keyed by PieceType. Every key is
 * always present; absent pieces have a count of zero.
 */
export type HandPool = Readonly<Record<PieceType, number>>;

/**
 * Why a game ended.
 *
 * - 'king_left_en_prise' is synthesized by the check detector when the side
 *   to move can capture the opposing king.
 * - 'illegal_move' comes from game records: the loser played an illegal move.
 */
export type TerminalReason =
  | 'resignation'
  | 'checkmate'
  | 'king_left_en_prise'
  | 'illegal_move'
  | 'repetition';

export type MoveType = 'move' | 'drop' | 'terminal';

/** A piece moving on the board, optionally promoting on arrival. */
export interface NormalMove {
  readonly type: 'move';
  readonly side: Side;
  readonly from: Square;
  readonly to: Square;
  /** Face of the piece on the origin square before the move. */
  readonly face: PieceFace;
  readonly promote: boolean;
}

/** A piece placed from the hand onto an empty square, always unpromoted. */
export interface DropMove {
  readonly type: 'drop';
  readonly side: Side;
  readonly to: Square;
  readonly piece: PieceType;
}

/** End of game. `winner` is null for a draw. */
export interface TerminalMove {
  readonly type: 'terminal';
  readonly reason: TerminalReason;
  readonly winner: Side | null;
}

export type Move = NormalMove | DropMove | TerminalMove;
