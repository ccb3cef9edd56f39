import type { Move, PieceFace, TerminalMove } from '../../types/shogi';
import { PIECE_FACES, SIDES } from '../../types/shogi';
import { fileOf, oppositeSide, rankOf, squareOf } from '../coordinates';
import { EngineErrorCode, NotationParseError, assertInvariant } from '../errors';
import { dropMove, normalMove, terminalMove } from '../moves';
import { PIECE_FACE_RULES, baseTypeOf, promotedFaceOf } from '../pieces';
import type { Position } from '../position';
import { CSA_FACE_CODES, CSA_SIDE_MARKERS, invert } from './symbols';

/**
 * CSA-style move token codec.
 *
 * A move token is a side marker, four digits and a piece code:
 *
 *   +7776FU   sente pawn 7-7 to 7-6
 *   -2288UM   gote bishop 2-2 takes on 8-8 and promotes
 *   +0055KA   sente drops a bishop on 5-5
 *
 * Origin `00` marks a drop. The piece code is the face *after* the move, so
 * promotion is inferred by comparing it with the face on the origin square.
 *
 * Terminal tokens:
 *   %TORYO             resignation; the side to move resigns
 *   %TSUMI             checkmate; the side to move is mated
 *   %SENNICHITE        repetition; no winner
 *   %ILLEGAL_MOVE      the side to move played an illegal move and loses
 *   %+ILLEGAL_ACTION   sente acted illegally and loses (%-ILLEGAL_ACTION for gote)
 *
 * Illegal-move results, including the engine's own king_left_en_prise
 * signal, are written as %+ILLEGAL_ACTION or %-ILLEGAL_ACTION since those
 * name the loser without needing the position.
 */

const FACE_BY_CODE = invert(PIECE_FACES, CSA_FACE_CODES);
const SIDE_BY_MARKER = invert(SIDES, CSA_SIDE_MARKERS);

const TORYO = '%TORYO';
const TSUMI = '%TSUMI';
const SENNICHITE = '%SENNICHITE';
const ILLEGAL_MOVE = '%ILLEGAL_MOVE';
const ILLEGAL_ACTION = 'ILLEGAL_ACTION';

const DOMAIN = 'MoveRecord';

function parseError(expected: string, input: string, offset: number): NotationParseError {
  return new NotationParseError(EngineErrorCode.NOTATION_UNEXPECTED_TOKEN, expected, input, offset, DOMAIN);
}

function inconsistent(expected: string, input: string, offset: number): NotationParseError {
  return new NotationParseError(EngineErrorCode.NOTATION_INCONSISTENT_MOVE, expected, input, offset, DOMAIN);
}

function decodeTerminal(token: string, position: Position): Move {
  const sideToMove = position.sideToMove;
  switch (token) {
    case TORYO:
      return terminalMove('resignation', oppositeSide(sideToMove));
    case TSUMI:
      return terminalMove('checkmate', oppositeSide(sideToMove));
    case SENNICHITE:
      return terminalMove('repetition', null);
    case ILLEGAL_MOVE:
      return terminalMove('illegal_move', oppositeSide(sideToMove));
  }
  const offender = SIDE_BY_MARKER.get(token.charAt(1));
  if (offender !== undefined && token.slice(2) === ILLEGAL_ACTION) {
    return terminalMove('illegal_move', oppositeSide(offender));
  }
  throw new NotationParseError(
    EngineErrorCode.MOVE_UNKNOWN_TYPE,
    'expected %TORYO, %TSUMI, %SENNICHITE, %ILLEGAL_MOVE or %+ILLEGAL_ACTION',
    token,
    0,
    DOMAIN
  );
}

function encodeTerminal(move: TerminalMove): string {
  switch (move.reason) {
    case 'resignation':
      return TORYO;
    case 'checkmate':
      return TSUMI;
    case 'repetition':
      return SENNICHITE;
    case 'illegal_move':
    case 'king_left_en_prise': {
      const winner = move.winner;
      assertInvariant(winner !== null, `${move.reason} needs a winner to be recorded`, { move }, DOMAIN);
      return `%${CSA_SIDE_MARKERS[oppositeSide(winner)]}${ILLEGAL_ACTION}`;
    }
  }
}

function digitAt(token: string, offset: number): number {
  const ch = token.charAt(offset);
  if (ch === '' || ch < '0' || ch > '9') {
    throw parseError('expected digit', token, offset);
  }
  return Number(ch);
}

function coordinate(token: string, offset: number, value: number): number {
  if (value < 1 || value > 9) {
    throw parseError('expected 1-9', token, offset);
  }
  return value;
}

/**
 * Decode one move token against the position it is played in. Throws
 * NotationParseError for malformed tokens and for tokens that do not fit
 * the position (wrong side, empty origin, piece mismatch, empty hand).
 */
export function decodeMoveToken(input: string, position: Position): Move {
  const token = input.trim();
  if (token.startsWith('%')) {
    return decodeTerminal(token, position);
  }

  const side = SIDE_BY_MARKER.get(token.charAt(0));
  if (side === undefined) {
    throw parseError('expected + or -', token, 0);
  }
  if (side !== position.sideToMove) {
    throw inconsistent(`expected ${CSA_SIDE_MARKERS[position.sideToMove]} (side to move)`, token, 0);
  }

  const fromFile = digitAt(token, 1);
  const fromRank = digitAt(token, 2);
  const toFile = coordinate(token, 3, digitAt(token, 3));
  const toRank = coordinate(token, 4, digitAt(token, 4));

  const code = token.slice(5, 7);
  const face: PieceFace | undefined = FACE_BY_CODE.get(code);
  if (face === undefined) {
    throw parseError('expected piece code', token, 5);
  }
  if (token.length > 7) {
    throw parseError('expected end of move token', token, 7);
  }

  const to = squareOf(toFile, toRank);

  if (fromFile === 0 && fromRank === 0) {
    if (PIECE_FACE_RULES[face].isPromoted) {
      throw inconsistent('expected unpromoted piece code for a drop', token, 5);
    }
    const piece = baseTypeOf(face);
    if (position.handCount(side, piece) <= 0) {
      throw inconsistent(`expected ${code} in hand`, token, 5);
    }
    if (position.at(to) !== null) {
      throw inconsistent('expected empty drop square', token, 3);
    }
    return dropMove(side, to, piece);
  }

  const from = squareOf(coordinate(token, 1, fromFile), coordinate(token, 2, fromRank));
  const origin = position.at(from);
  if (origin === null || origin.side !== side) {
    throw inconsistent('expected own piece on origin square', token, 1);
  }
  if (baseTypeOf(origin.face) !== baseTypeOf(face)) {
    throw inconsistent(`expected piece code for ${origin.face}`, token, 5);
  }
  const promote = origin.face !== face;
  if (promote && promotedFaceOf(origin.face) !== face) {
    throw inconsistent(`expected piece code for ${origin.face}`, token, 5);
  }
  return normalMove(side, from, to, origin.face, promote);
}

/** Encode a move as a CSA token. */
export function encodeMoveToken(move: Move): string {
  switch (move.type) {
    case 'move': {
      const face = move.promote ? promotedFaceOf(move.face) : move.face;
      return `${CSA_SIDE_MARKERS[move.side]}${fileOf(move.from)}${rankOf(move.from)}${fileOf(
        move.to
      )}${rankOf(move.to)}${CSA_FACE_CODES[face]}`;
    }
    case 'drop':
      return `${CSA_SIDE_MARKERS[move.side]}00${fileOf(move.to)}${rankOf(move.to)}${
        CSA_FACE_CODES[move.piece]
      }`;
    case 'terminal':
      return encodeTerminal(move);
  }
}
