import {
  EngineError,
  EngineErrorCode,
  NotationParseError,
  applyMove,
  createStartingPosition,
  decodeMoveToken,
  dropMove,
  encodeMoveToken,
  normalMove,
  terminalMove,
} from '../../../../src/shared/engine';
import type { Position } from '../../../../src/shared/engine';
import { positionWith, sq } from '../../../utils/fixtures';

function decodeError(token: string, position: Position): NotationParseError {
  try {
    decodeMoveToken(token, position);
  } catch (error) {
    if (error instanceof NotationParseError) return error;
    throw error;
  }
  throw new Error(`expected ${token} to be rejected`);
}

describe('decodeMoveToken', () => {
  const start = createStartingPosition();

  it('decodes a plain move', () => {
    expect(decodeMoveToken('+7776FU', start)).toEqual(normalMove('sente', sq(7, 7), sq(7, 6), 'pawn', false));
  });

  it('infers promotion from the piece code', () => {
    const position = positionWith([[2, 2, 'gote', 'bishop']], { sideToMove: 'gote' });
    expect(decodeMoveToken('-2288UM', position)).toEqual(normalMove('gote', sq(2, 2), sq(8, 8), 'bishop', true));
    expect(decodeMoveToken('-2288KA', position)).toEqual(normalMove('gote', sq(2, 2), sq(8, 8), 'bishop', false));
  });

  it('keeps the face of an already promoted piece', () => {
    const position = positionWith([[5, 5, 'sente', 'horse']]);
    expect(decodeMoveToken('+5544UM', position)).toEqual(normalMove('sente', sq(5, 5), sq(4, 4), 'horse', false));
  });

  it('decodes a drop from the hand', () => {
    const position = positionWith([], { hands: { sente: { bishop: 1 } } });
    expect(decodeMoveToken('+0055KA', position)).toEqual(dropMove('sente', sq(5, 5), 'bishop'));
  });

  it('ignores surrounding whitespace', () => {
    expect(decodeMoveToken('  +2726FU ', start)).toEqual(normalMove('sente', sq(2, 7), sq(2, 6), 'pawn', false));
  });

  it('assigns terminal winners relative to the side to move', () => {
    expect(decodeMoveToken('%TORYO', start)).toEqual(terminalMove('resignation', 'gote'));
    expect(decodeMoveToken('%TSUMI', start)).toEqual(terminalMove('checkmate', 'gote'));
    expect(decodeMoveToken('%SENNICHITE', start)).toEqual(terminalMove('repetition', null));
  });

  it('gives an illegal move to the opponent of the offender', () => {
    expect(decodeMoveToken('%ILLEGAL_MOVE', start)).toEqual(terminalMove('illegal_move', 'gote'));
    expect(decodeMoveToken('%ILLEGAL_MOVE', start.withSideToMove('gote'))).toEqual(
      terminalMove('illegal_move', 'sente')
    );
    expect(decodeMoveToken('%+ILLEGAL_ACTION', start)).toEqual(terminalMove('illegal_move', 'gote'));
    expect(decodeMoveToken('%-ILLEGAL_ACTION', start)).toEqual(terminalMove('illegal_move', 'sente'));
  });

  describe('errors', () => {
    it.each([
      ['*7776FU', 'expected + or -', 0],
      ['+7776XX', 'expected piece code', 5],
      ['+7076FU', 'expected 1-9', 2],
      ['+77a6FU', 'expected digit', 3],
      ['+777', 'expected digit', 4],
      ['+7776FUX', 'expected end of move token', 7],
    ])('rejects the malformed token %s', (token, expected, offset) => {
      const error = decodeError(token, start);
      expect(error.expected).toBe(expected);
      expect(error.offset).toBe(offset);
      expect(error.code).toBe(EngineErrorCode.NOTATION_UNEXPECTED_TOKEN);
    });

    it.each([
      ['-3334FU', 'expected + (side to move)', 0],
      ['+5554FU', 'expected own piece on origin square', 1],
      ['+3334FU', 'expected own piece on origin square', 1],
      ['+7776KI', 'expected piece code for pawn', 5],
      ['+0055KA', 'expected KA in hand', 5],
      ['+0055TO', 'expected unpromoted piece code for a drop', 5],
    ])('rejects %s in the starting position', (token, expected, offset) => {
      const error = decodeError(token, start);
      expect(error.expected).toBe(expected);
      expect(error.offset).toBe(offset);
      expect(error.code).toBe(EngineErrorCode.NOTATION_INCONSISTENT_MOVE);
    });

    it('rejects a drop onto an occupied square', () => {
      const error = decodeError('+0057KA', start.withHandCount('sente', 'bishop', 1));
      expect(error.message).toBe('expected empty drop square. ^57KA');
    });

    it('rejects a demotion code for a promoted piece', () => {
      const position = positionWith([[5, 5, 'sente', 'horse']]);
      expect(decodeError('+5544KA', position).expected).toBe('expected piece code for horse');
    });

    it('rejects an unknown terminal keyword', () => {
      const error = decodeError('%CHUDAN', start);
      expect(error.code).toBe(EngineErrorCode.MOVE_UNKNOWN_TYPE);
      expect(error.remainder).toBe('%CHUDAN');
    });
  });
});

describe('encodeMoveToken', () => {
  it('writes the face after the move', () => {
    expect(encodeMoveToken(normalMove('gote', sq(2, 2), sq(8, 8), 'bishop', true))).toBe('-2288UM');
    expect(encodeMoveToken(normalMove('sente', sq(7, 7), sq(7, 6), 'pawn', false))).toBe('+7776FU');
  });

  it('writes drops with a 00 origin', () => {
    expect(encodeMoveToken(dropMove('sente', sq(5, 5), 'bishop'))).toBe('+0055KA');
  });

  it('writes terminal keywords', () => {
    expect(encodeMoveToken(terminalMove('resignation', 'gote'))).toBe('%TORYO');
    expect(encodeMoveToken(terminalMove('checkmate', 'sente'))).toBe('%TSUMI');
    expect(encodeMoveToken(terminalMove('repetition', null))).toBe('%SENNICHITE');
  });

  it('writes illegal-move results naming the loser', () => {
    expect(encodeMoveToken(terminalMove('king_left_en_prise', 'sente'))).toBe('%-ILLEGAL_ACTION');
    expect(encodeMoveToken(terminalMove('illegal_move', 'gote'))).toBe('%+ILLEGAL_ACTION');
  });

  it('refuses an illegal-move result without a winner', () => {
    expect(() => encodeMoveToken(terminalMove('king_left_en_prise', null))).toThrow(EngineError);
  });

  it('keeps the winner of a king capture through encode and decode', () => {
    const start = createStartingPosition();
    const decoded = decodeMoveToken(encodeMoveToken(terminalMove('king_left_en_prise', 'gote')), start);
    expect(decoded).toEqual(terminalMove('illegal_move', 'gote'));
  });

  it('decodes its own output after the move is played', () => {
    const start = createStartingPosition();
    const move = normalMove('sente', sq(2, 7), sq(2, 6), 'pawn', false);
    expect(decodeMoveToken(encodeMoveToken(move), start)).toEqual(move);
    const next = applyMove(start, move);
    expect(next?.sideToMove).toBe('gote');
  });
});
