import type {
  DropMove,
  Move,
  NormalMove,
  PieceFace,
  PieceType,
  Side,
  Square,
  TerminalMove,
  TerminalReason,
} from '../types/shogi';

/**
 * Move constructors and structural equality.
 *
 * Moves are a closed union discriminated by `type`. Equality and hashing
 * only look at the fields of the matching variant.
 */

export function normalMove(
  side: Side,
  from: Square,
  to: Square,
  face: PieceFace,
  promote: boolean
): NormalMove {
  return { type: 'move', side, from, to, face, promote };
}

export function dropMove(side: Side, to: Square, piece: PieceType): DropMove {
  return { type: 'drop', side, to, piece };
}

export function terminalMove(reason: TerminalReason, winner: Side | null): TerminalMove {
  return { type: 'terminal', reason, winner };
}

export function movesEqual(a: Move, b: Move): boolean {
  switch (a.type) {
    case 'move':
      return (
        b.type === 'move' &&
        a.side === b.side &&
        a.from === b.from &&
        a.to === b.to &&
        a.face === b.face &&
        a.promote === b.promote
      );
    case 'drop':
      return b.type === 'drop' && a.side === b.side && a.to === b.to && a.piece === b.piece;
    case 'terminal':
      return b.type === 'terminal' && a.reason === b.reason && a.winner === b.winner;
  }
}

/**
 * Stable string key for a move, suitable for Set/Map membership. Two moves
 * have the same key exactly when {@link movesEqual} holds.
 */
export function moveKey(move: Move): string {
  switch (move.type) {
    case 'move':
      return `move:${move.side}:${move.from}:${move.to}:${move.face}:${move.promote ? 1 : 0}`;
    case 'drop':
      return `drop:${move.side}:${move.to}:${move.piece}`;
    case 'terminal':
      return `terminal:${move.reason}:${move.winner ?? '-'}`;
  }
}
