import type { Move } from '../types/shogi';
import { formatSquare } from './coordinates';

/**
 * Shared move-notation helpers.
 *
 * A lightweight, human-readable notation for debugging, logging and test
 * output. It is not a record format; see `codecs/moveRecord.ts` for the
 * CSA-style token codec.
 */

/**
 * Format a Move into a one-line debug string.
 *
 * Examples:
 *   sente: 77→76 pawn
 *   gote: 22→88 bishop +
 *   sente: *55 pawn
 *   terminal: checkmate (winner gote)
 */
export function formatMove(move: Move): string {
  switch (move.type) {
    case 'move': {
      const promotion = move.promote ? ' +' : '';
      return `${move.side}: ${formatSquare(move.from)}→${formatSquare(move.to)} ${move.face}${promotion}`;
    }
    case 'drop':
      return `${move.side}: *${formatSquare(move.to)} ${move.piece}`;
    case 'terminal':
      return `terminal: ${move.reason} (${move.winner ? `winner ${move.winner}` : 'no winner'})`;
  }
}

/**
 * Very small helper to render a list of moves as numbered notation lines.
 * Primarily used by tests, logs, and debug tools.
 */
export function formatMoveList(moves: readonly Move[]): string[] {
  return moves.map((m, idx) => `${idx + 1}. ${formatMove(m)}`);
}
