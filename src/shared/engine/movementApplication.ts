import type { DropMove, Move, NormalMove, PieceType, Side, SquareContent } from '../types/shogi';
import { PIECE_TYPES } from '../types/shogi';
import { formatSquare, oppositeSide } from './coordinates';
import { assertInvariant } from './errors';
import { PIECE_FACE_RULES, baseFace, baseTypeOf, promotedFaceOf } from './pieces';
import { Position } from './position';
import { debugLog, flagEnabled } from '../utils/envFlags';
import { formatMove } from './notation';
import { generateMoves } from './movementLogic';

/**
 * Pure move application.
 *
 * `applyMove` never mutates its input; it copies the squares and hands,
 * applies the move and returns a fresh Position with the side to move
 * flipped. Preconditions are engine contracts: a Move that was not
 * generated for this Position is a defect and throws an
 * INTERNAL_ASSERTION_FAILED EngineError.
 */

type MutableHands = Record<Side, Record<PieceType, number>>;

function copyHands(position: Position): MutableHands {
  return {
    sente: { ...position.hand('sente') },
    gote: { ...position.hand('gote') },
  };
}

function applyNormalMove(position: Position, move: NormalMove): Position {
  const squares: SquareContent[] = [...position.squares];
  const hands = copyHands(position);
  const origin = squares[move.from] ?? null;

  assertInvariant(move.side === position.sideToMove, 'Move side is not the side to move', {
    move: formatMove(move),
    sideToMove: position.sideToMove,
  }, 'MoveApplication');
  assertInvariant(
    origin !== null && origin.side === move.side && baseTypeOf(origin.face) === baseTypeOf(move.face),
    'Origin square does not hold the moving piece',
    { move: formatMove(move), origin },
    'MoveApplication'
  );
  assertInvariant(
    !move.promote || PIECE_FACE_RULES[move.face].canPromote,
    'Promotion requested for a face that cannot promote',
    { move: formatMove(move) },
    'MoveApplication'
  );

  const captured = squares[move.to] ?? null;
  if (captured !== null) {
    assertInvariant(captured.side !== move.side, 'Destination holds a piece of the moving side', {
      move: formatMove(move),
      to: formatSquare(move.to),
    }, 'MoveApplication');
    // Promotion state is dropped on capture.
    hands[move.side][baseTypeOf(captured.face)] += 1;
  }

  squares[move.from] = null;
  squares[move.to] = {
    side: move.side,
    face: move.promote ? promotedFaceOf(move.face) : move.face,
  };

  return Position.create({ squares, hands, sideToMove: oppositeSide(position.sideToMove) });
}

function applyDrop(position: Position, move: DropMove): Position {
  const squares: SquareContent[] = [...position.squares];
  const hands = copyHands(position);

  assertInvariant(move.side === position.sideToMove, 'Drop side is not the side to move', {
    move: formatMove(move),
    sideToMove: position.sideToMove,
  }, 'MoveApplication');
  assertInvariant(hands[move.side][move.piece] > 0, 'Dropped piece is not in hand', {
    move: formatMove(move),
    handCount: hands[move.side][move.piece],
  }, 'MoveApplication');
  assertInvariant(squares[move.to] === null, 'Drop destination is occupied', {
    move: formatMove(move),
  }, 'MoveApplication');

  hands[move.side][move.piece] -= 1;
  squares[move.to] = { side: move.side, face: baseFace(move.piece) };

  return Position.create({ squares, hands, sideToMove: oppositeSide(position.sideToMove) });
}

/**
 * Apply a move and return the successor Position, or null for a terminal
 * move (the game is over and has no successor).
 */
export function applyMove(position: Position, move: Move): Position | null {
  switch (move.type) {
    case 'move':
      return applyNormalMove(position, move);
    case 'drop':
      return applyDrop(position, move);
    case 'terminal':
      debugLog(flagEnabled('SHOGI_ENGINE_DEBUG'), '[applyMove] game over', formatMove(move));
      return null;
  }
}

/**
 * Every successor Position reachable in one generated move.
 */
export function successorPositions(position: Position): Position[] {
  const successors: Position[] = [];
  for (const move of generateMoves(position)) {
    const next = applyMove(position, move);
    if (next) successors.push(next);
  }
  return successors;
}

/** Total pieces held in a hand; convenience for logging and tests. */
export function handSize(position: Position, side: Side): number {
  return PIECE_TYPES.reduce((sum, type) => sum + position.handCount(side, type), 0);
}
