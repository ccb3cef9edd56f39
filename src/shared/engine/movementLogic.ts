import type { Move, PieceType, Side, Square } from '../types/shogi';
import { PIECE_TYPES } from '../types/shogi';
import {
  ALL_SQUARES,
  type Direction,
  fileOf,
  forwardSign,
  isInPromotionZone,
  offsetSquare,
  rankOf,
} from './coordinates';
import { dropMove, normalMove } from './moves';
import { PIECE_FACE_RULES, baseFace, isPlacementProhibited } from './pieces';
import type { Position } from './position';

/**
 * Shared helpers for pseudo-legal move generation.
 *
 * Everything here is a pure function of a Position. Nothing checks king
 * safety; see checkDetection.ts for the king-capture signal and the
 * pruned move list built on top of {@link generateMoves}.
 */

function mirrored(dir: Direction, side: Side): Direction {
  return { dx: dir.dx, dy: dir.dy * forwardSign(side) };
}

/**
 * Destination squares for the piece on `from`.
 *
 * - Steps are applied once; slides repeat until the board edge or the
 *   first occupied square.
 * - An enemy-occupied square is included and ends a slide.
 * - An own-occupied square ends a slide and is included only when
 *   `includeOwnOccupied` is set (used for "defended square" maps).
 *
 * Returns [] for an empty origin.
 */
export function reachableSquares(
  position: Position,
  from: Square,
  includeOwnOccupied: boolean
): Square[] {
  const piece = position.at(from);
  if (!piece) {
    return [];
  }

  const rules = PIECE_FACE_RULES[piece.face];
  const results: Square[] = [];

  for (const step of rules.steps) {
    const dir = mirrored(step, piece.side);
    const to = offsetSquare(from, dir.dx, dir.dy);
    if (to === undefined) continue;
    const occupant = position.at(to);
    if (occupant && occupant.side === piece.side && !includeOwnOccupied) continue;
    results.push(to);
  }

  for (const slide of rules.slides) {
    const dir = mirrored(slide, piece.side);
    let to = offsetSquare(from, dir.dx, dir.dy);
    // Walk outward along this ray until we leave the board or hit a piece.
    while (to !== undefined) {
      const occupant = position.at(to);
      if (occupant) {
        if (occupant.side !== piece.side || includeOwnOccupied) {
          results.push(to);
        }
        break;
      }
      results.push(to);
      to = offsetSquare(to, dir.dx, dir.dy);
    }
  }

  return results;
}

/**
 * True when `type` may be dropped by `side` on the empty square `to`:
 * the placement-prohibition table allows the rank, and a pawn drop does
 * not create a second unpromoted pawn in the file.
 */
export function isDropAllowed(position: Position, side: Side, type: PieceType, to: Square): boolean {
  if (isPlacementProhibited(side, baseFace(type), rankOf(to))) {
    return false;
  }
  if (type === 'pawn' && position.pawnCount(side, fileOf(to)) > 0) {
    return false;
  }
  return true;
}

function dropsOnto(position: Position, to: Square): Move[] {
  const side = position.sideToMove;
  return PIECE_TYPES.filter(
    (type) => position.handCount(side, type) > 0 && isDropAllowed(position, side, type, to)
  ).map((type) => dropMove(side, to, type));
}

function movesFrom(position: Position, from: Square): Move[] {
  const side = position.sideToMove;
  const piece = position.at(from);
  if (!piece || piece.side !== side) {
    return [];
  }

  const rules = PIECE_FACE_RULES[piece.face];
  const fromInZone = isInPromotionZone(side, rankOf(from));
  const moves: Move[] = [];

  for (const to of reachableSquares(position, from, false)) {
    const rank = rankOf(to);
    if (rules.canPromote && (fromInZone || isInPromotionZone(side, rank))) {
      moves.push(normalMove(side, from, to, piece.face, true));
    }
    // A face that could never move again from this rank is only generated
    // promoted; this is how forced promotion is expressed.
    if (!isPlacementProhibited(side, piece.face, rank)) {
      moves.push(normalMove(side, from, to, piece.face, false));
    }
  }

  return moves;
}

/**
 * All pseudo-legal moves and drops for the side to move, in square-index
 * order. Never throws; an empty list means the side has no moves.
 *
 * The opposing king is an ordinary capture target here. King safety is
 * evaluated by the check detector.
 */
export function generateMoves(position: Position): Move[] {
  const moves: Move[] = [];
  for (const square of ALL_SQUARES) {
    const content = position.at(square);
    if (content === null) {
      moves.push(...dropsOnto(position, square));
    } else {
      moves.push(...movesFrom(position, square));
    }
  }
  return moves;
}

/**
 * Generated moves restricted to the given origin squares (drops count as
 * originating from their destination). Mirrors generateMoves' order.
 */
export function generateMovesFrom(position: Position, squares: readonly Square[]): Move[] {
  const moves: Move[] = [];
  for (const square of squares) {
    const content = position.at(square);
    moves.push(...(content === null ? dropsOnto(position, square) : movesFrom(position, square)));
  }
  return moves;
}
