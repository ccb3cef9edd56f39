import type { Move, Side, Square } from '../types/shogi';
import { oppositeSide } from './coordinates';
import { applyMove } from './movementApplication';
import { generateMoves, reachableSquares } from './movementLogic';
import { terminalMove } from './moves';
import type { Position } from './position';

/**
 * Check and checkmate detection built on the move generator.
 *
 * The checkmate test only considers king mobility: it never tries to
 * capture the checking piece or interpose a piece or drop between the
 * checker and the king. It therefore reports checkmate in some positions
 * where a capture or block would escape. This is a known gap in rule
 * coverage.
 */

/**
 * Union of destination squares over every piece of `side`.
 *
 * With `includeOwnOccupied`, squares held by `side`'s own pieces that one
 * of its pieces could otherwise reach are included too: they are defended,
 * so an enemy king may not step there.
 */
export function attackedSquares(
  position: Position,
  side: Side,
  includeOwnOccupied: boolean
): Set<Square> {
  const attacked = new Set<Square>();
  const origins = position.search((content) => content !== null && content.side === side);
  for (const from of origins) {
    for (const to of reachableSquares(position, from, includeOwnOccupied)) {
      attacked.add(to);
    }
  }
  return attacked;
}

/** Squares holding a piece of `side` that can reach `target`. */
export function attackersOf(position: Position, side: Side, target: Square): Square[] {
  return position
    .search((content) => content !== null && content.side === side)
    .filter((from) => reachableSquares(position, from, false).includes(target));
}

/**
 * The king-capture signal for `side`: a single
 * `Terminal('king_left_en_prise', side)` when some piece of `side` can
 * reach the opposing king's square, otherwise []. Empty when the opposing
 * king is not on the board.
 */
export function kingCaptureMoves(position: Position, side: Side): Move[] {
  const enemyKing = position.kingSquare(oppositeSide(side));
  if (enemyKing === undefined) {
    return [];
  }
  if (attackersOf(position, side, enemyKing).length === 0) {
    return [];
  }
  return [terminalMove('king_left_en_prise', side)];
}

/**
 * generateMoves with the king-capture signal for the side to move appended.
 * Evaluating a position the opponent just produced this way flags a move
 * that left the opponent's king capturable.
 */
export function generateMovesWithKingCapture(position: Position): Move[] {
  return [...generateMoves(position), ...kingCaptureMoves(position, position.sideToMove)];
}

/** True when `side`'s king is attacked by the opposing side. */
export function isInCheck(position: Position, side: Side): boolean {
  return kingCaptureMoves(position, oppositeSide(side)).length > 0;
}

/**
 * True when playing `move` would let the opponent capture the mover's king
 * on the following turn.
 */
export function leavesKingEnPrise(position: Position, move: Move): boolean {
  const next = applyMove(position, move);
  if (!next) {
    return false;
  }
  return kingCaptureMoves(next, next.sideToMove).length > 0;
}

/**
 * Generated moves with every move that leaves the mover's own king
 * capturable removed.
 */
export function generateKingSafeMoves(position: Position): Move[] {
  return generateMoves(position).filter((move) => !leavesKingEnPrise(position, move));
}

/**
 * Moves for the side to move after which that side could capture the
 * opposing king, i.e. moves that give check.
 */
export function findCheckingMoves(position: Position): Move[] {
  const mover = position.sideToMove;
  return generateMoves(position).filter((move) => {
    const next = applyMove(position, move);
    return next !== null && kingCaptureMoves(next, mover).length > 0;
  });
}

/**
 * King-mobility checkmate test for the side to move.
 *
 * Checkmate holds when every square the king could step to (excluding
 * squares held by its own pieces) is reachable by the opponent, counting
 * squares the opponent defends with its own pieces. Returns false when the
 * side to move has no king on the board.
 *
 * Capturing the checker and interposing are not considered.
 */
export function isCheckmate(position: Position): boolean {
  const side = position.sideToMove;
  const king = position.kingSquare(side);
  if (king === undefined) {
    return false;
  }
  const kingMoves = new Set(reachableSquares(position, king, false));
  const unsafe = attackedSquares(position, oppositeSide(side), true);
  for (const square of kingMoves) {
    if (!unsafe.has(square)) {
      return false;
    }
  }
  return true;
}
