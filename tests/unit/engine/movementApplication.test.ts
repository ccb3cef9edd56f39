import {
  EngineError,
  EngineErrorCode,
  applyMove,
  createStartingPosition,
  dropMove,
  generateMoves,
  handSize,
  normalMove,
  successorPositions,
  terminalMove,
} from '../../../src/shared/engine';
import type { Move } from '../../../src/shared/engine';
import type { Position } from '../../../src/shared/engine';
import { positionWith, sq } from '../../utils/fixtures';

function play(position: Position, move: Move): Position {
  const next = applyMove(position, move);
  if (next === null) {
    throw new Error('expected a successor position');
  }
  return next;
}

function expectDefect(action: () => unknown, message: string): void {
  try {
    action();
  } catch (error) {
    expect(error).toBeInstanceOf(EngineError);
    if (error instanceof EngineError) {
      expect(error.code).toBe(EngineErrorCode.INTERNAL_ASSERTION_FAILED);
      expect(error.message).toBe(message);
      expect(error.domain).toBe('MoveApplication');
    }
    return;
  }
  throw new Error(`expected "${message}" to be thrown`);
}

describe('applyMove', () => {
  it('moves a piece and flips the side to move without touching the input', () => {
    const start = createStartingPosition();
    const next = play(start, normalMove('sente', sq(7, 7), sq(7, 6), 'pawn', false));

    expect(next.at(sq(7, 6))).toEqual({ side: 'sente', face: 'pawn' });
    expect(next.at(sq(7, 7))).toBeNull();
    expect(next.sideToMove).toBe('gote');
    expect(start.at(sq(7, 7))).toEqual({ side: 'sente', face: 'pawn' });
    expect(start.sideToMove).toBe('sente');
  });

  it('returns null for a terminal move', () => {
    expect(applyMove(createStartingPosition(), terminalMove('resignation', 'gote'))).toBeNull();
  });

  it('puts a captured promoted piece into the hand as its base type', () => {
    const position = positionWith([
      [5, 5, 'sente', 'rook'],
      [5, 3, 'gote', 'promoted_pawn'],
      [5, 1, 'gote', 'king'],
    ]);
    const afterCapture = play(position, normalMove('sente', sq(5, 5), sq(5, 3), 'rook', false));

    expect(afterCapture.handCount('sente', 'pawn')).toBe(1);
    expect(afterCapture.at(sq(5, 3))).toEqual({ side: 'sente', face: 'rook' });

    const afterKing = play(afterCapture, normalMove('gote', sq(5, 1), sq(4, 1), 'king', false));
    const afterDrop = play(afterKing, dropMove('sente', sq(5, 5), 'pawn'));

    expect(afterDrop.handCount('sente', 'pawn')).toBe(0);
    expect(afterDrop.at(sq(5, 5))).toEqual({ side: 'sente', face: 'pawn' });
    expect(afterDrop.sideToMove).toBe('gote');
  });

  it('turns a captured dragon into a rook in hand', () => {
    const position = positionWith([
      [2, 2, 'gote', 'silver'],
      [1, 1, 'sente', 'dragon'],
    ], { sideToMove: 'gote' });
    const next = play(position, normalMove('gote', sq(2, 2), sq(1, 1), 'silver', false));
    expect(next.hand('gote').rook).toBe(1);
    expect(handSize(next, 'gote')).toBe(1);
  });

  it('flips the face on promotion', () => {
    const position = positionWith([[8, 4, 'sente', 'bishop']]);
    const next = play(position, normalMove('sente', sq(8, 4), sq(6, 2), 'bishop', true));
    expect(next.at(sq(6, 2))).toEqual({ side: 'sente', face: 'horse' });
  });

  it('promotes a silver to promoted silver', () => {
    const position = positionWith([[5, 4, 'sente', 'silver']]);
    const next = play(position, normalMove('sente', sq(5, 4), sq(5, 3), 'silver', true));
    expect(next.at(sq(5, 3))).toEqual({ side: 'sente', face: 'promoted_silver' });
  });

  describe('contract violations', () => {
    const start = createStartingPosition();

    it('rejects a move for the side not to move', () => {
      expectDefect(
        () => applyMove(start, normalMove('gote', sq(7, 3), sq(7, 4), 'pawn', false)),
        'Move side is not the side to move'
      );
    });

    it('rejects an empty origin', () => {
      expectDefect(
        () => applyMove(start, normalMove('sente', sq(5, 5), sq(5, 4), 'pawn', false)),
        'Origin square does not hold the moving piece'
      );
    });

    it('rejects capturing an own piece', () => {
      expectDefect(
        () => applyMove(start, normalMove('sente', sq(5, 9), sq(4, 9), 'king', false)),
        'Destination holds a piece of the moving side'
      );
    });

    it('rejects promoting a gold', () => {
      expectDefect(
        () => applyMove(start, normalMove('sente', sq(6, 9), sq(6, 8), 'gold', true)),
        'Promotion requested for a face that cannot promote'
      );
    });

    it('rejects dropping a piece that is not in hand', () => {
      expectDefect(() => applyMove(start, dropMove('sente', sq(5, 5), 'gold')), 'Dropped piece is not in hand');
    });

    it('rejects dropping onto an occupied square', () => {
      const withHand = start.withHandCount('sente', 'gold', 1);
      expectDefect(() => applyMove(withHand, dropMove('sente', sq(5, 7), 'gold')), 'Drop destination is occupied');
    });
  });
});

describe('successorPositions', () => {
  it('yields one position per generated move', () => {
    const start = createStartingPosition();
    const successors = successorPositions(start);
    expect(successors).toHaveLength(generateMoves(start).length);
    expect(successors.every((next) => next.sideToMove === 'gote')).toBe(true);
  });
});
