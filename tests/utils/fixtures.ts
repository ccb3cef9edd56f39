/**
 * Test Fixtures and Utilities
 * Common test data and helper functions for engine tests
 */

import * as fs from 'fs';
import * as path from 'path';
import type { File, PieceFace, PieceType, Rank, Side, SquareContent } from '../../src/shared/types/shogi';
import { SQUARE_COUNT, squareOf } from '../../src/shared/engine/coordinates';
import { Position } from '../../src/shared/engine/position';

/**
 * Square helper - file/rank to square index
 */
export function sq(file: File, rank: Rank): number {
  return squareOf(file, rank);
}

/** [file, rank, side, face] */
export type Placement = readonly [File, Rank, Side, PieceFace];

export interface PositionOptions {
  sideToMove?: Side;
  hands?: Partial<Record<Side, Partial<Record<PieceType, number>>>>;
}

/**
 * Creates a position holding only the given pieces
 */
export function positionWith(placements: readonly Placement[], options: PositionOptions = {}): Position {
  const squares: SquareContent[] = new Array<SquareContent>(SQUARE_COUNT).fill(null);
  for (const [file, rank, side, face] of placements) {
    squares[squareOf(file, rank)] = { side, face };
  }
  return Position.create({
    squares,
    hands: options.hands,
    sideToMove: options.sideToMove ?? 'sente',
  });
}

/**
 * Reads a file from tests/fixtures, dropping one trailing newline
 */
export function loadFixture(name: string): string {
  return fs.readFileSync(path.join(__dirname, '..', 'fixtures', name), 'utf8').replace(/\r?\n$/, '');
}
