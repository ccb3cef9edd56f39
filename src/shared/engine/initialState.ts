import type { PieceFace, Side, SquareContent } from '../types/shogi';
import { BOARD_SIZE, SQUARE_COUNT, squareOf } from './coordinates';
import { Position } from './position';

/**
 * Back-rank layout from file 9 to file 1. Both sides use the same order;
 * the king sits on file 5.
 */
const BACK_RANK: readonly PieceFace[] = [
  'lance',
  'knight',
  'silver',
  'gold',
  'king',
  'gold',
  'silver',
  'knight',
  'lance',
];

/**
 * Creates the standard even-game starting position with empty hands and
 * sente to move.
 *
 * Sente: back rank on rank 9, bishop on 8-8, rook on 2-8, pawns on rank 7.
 * Gote mirrors it: back rank on rank 1, rook on 8-2, bishop on 2-2, pawns
 * on rank 3.
 */
export function createStartingPosition(): Position {
  const squares: SquareContent[] = new Array<SquareContent>(SQUARE_COUNT).fill(null);
  const place = (side: Side, face: PieceFace, file: number, rank: number) => {
    squares[squareOf(file, rank)] = { side, face };
  };

  BACK_RANK.forEach((face, column) => {
    const file = BOARD_SIZE - column;
    place('gote', face, file, 1);
    place('sente', face, file, 9);
    place('gote', 'pawn', file, 3);
    place('sente', 'pawn', file, 7);
  });
  place('gote', 'rook', 8, 2);
  place('gote', 'bishop', 2, 2);
  place('sente', 'bishop', 8, 8);
  place('sente', 'rook', 2, 8);

  return Position.create({ squares, sideToMove: 'sente' });
}

/** A board with no pieces and empty hands; handy for composing test positions. */
export function createEmptyPosition(sideToMove: Side = 'sente'): Position {
  return Position.create({
    squares: new Array<SquareContent>(SQUARE_COUNT).fill(null),
    sideToMove,
  });
}
