import type { File, Rank, Side, Square } from '../types/shogi';
import { BoardConstraintViolation, EngineErrorCode } from './errors';

/**
 * Board geometry for the 9x9 shogi board.
 *
 * Squares are plain 0..80 indices so they compare, hash and serialize as
 * values. Internally geometry works on zero-based column/row pairs where
 * column 0 is file 9 and row 0 is rank 1, matching how a board diagram is
 * read top-left to bottom-right.
 */

export const BOARD_SIZE = 9;
export const SQUARE_COUNT = BOARD_SIZE * BOARD_SIZE;

export const ALL_SQUARES: readonly Square[] = Array.from({ length: SQUARE_COUNT }, (_, i) => i);

/** Files in diagram order (9 down to 1). */
export const FILES: readonly File[] = [9, 8, 7, 6, 5, 4, 3, 2, 1];

/** Ranks in diagram order (1 up to 9). */
export const RANKS: readonly Rank[] = [1, 2, 3, 4, 5, 6, 7, 8, 9];

/**
 * A step in board-local coordinates, expressed in sente's orientation:
 * `dy = -1` is one rank forward for sente. Gote's steps are mirrored by
 * {@link forwardSign}.
 */
export interface Direction {
  readonly dx: number;
  readonly dy: number;
}

export function oppositeSide(side: Side): Side {
  return side === 'sente' ? 'gote' : 'sente';
}

/**
 * Multiplier applied to a direction's rank component so one canonical
 * table serves both sides.
 */
export function forwardSign(side: Side): 1 | -1 {
  return side === 'sente' ? 1 : -1;
}

export function isValidSquare(square: number): boolean {
  return Number.isInteger(square) && square >= 0 && square < SQUARE_COUNT;
}

export function isValidFileOrRank(value: number): boolean {
  return Number.isInteger(value) && value >= 1 && value <= BOARD_SIZE;
}

export function squareOf(file: File, rank: Rank): Square {
  if (!isValidFileOrRank(file) || !isValidFileOrRank(rank)) {
    throw new BoardConstraintViolation(
      EngineErrorCode.BOARD_INVALID_SQUARE,
      `No square at file ${file}, rank ${rank}`,
      { file, rank }
    );
  }
  return (rank - 1) * BOARD_SIZE + (BOARD_SIZE - file);
}

export function fileOf(square: Square): File {
  return BOARD_SIZE - (square % BOARD_SIZE);
}

export function rankOf(square: Square): Rank {
  return Math.floor(square / BOARD_SIZE) + 1;
}

/**
 * Apply a raw column/row offset. Returns undefined when the result would
 * leave the board, including wrap-around past a file edge.
 */
export function offsetSquare(square: Square, dx: number, dy: number): Square | undefined {
  const column = (square % BOARD_SIZE) + dx;
  const row = Math.floor(square / BOARD_SIZE) + dy;
  if (column < 0 || column >= BOARD_SIZE || row < 0 || row >= BOARD_SIZE) {
    return undefined;
  }
  return row * BOARD_SIZE + column;
}

/**
 * Ranks of the opponent's camp, where a side's promotable pieces may
 * promote: ranks 1-3 for sente, 7-9 for gote.
 */
export function promotionZone(side: Side): readonly Rank[] {
  return side === 'sente' ? [1, 2, 3] : [7, 8, 9];
}

export function isInPromotionZone(side: Side, rank: Rank): boolean {
  return side === 'sente' ? rank <= 3 : rank >= 7;
}

/**
 * Distance of a rank from the side's farthest rank, counted from 1. The
 * farthest rank (1 for sente, 9 for gote) is depth 1.
 */
export function rankDepth(side: Side, rank: Rank): number {
  return side === 'sente' ? rank : BOARD_SIZE + 1 - rank;
}

/** Compact file-then-rank digits, e.g. file 7 rank 6 -> "76". */
export function formatSquare(square: Square): string {
  return `${fileOf(square)}${rankOf(square)}`;
}

export function squaresInFile(file: File): Square[] {
  return RANKS.map((rank) => squareOf(file, rank));
}
