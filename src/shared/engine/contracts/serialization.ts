/**
 * JSON serialization of positions for files, scripts and other processes.
 */

import type { PieceType, Side, SquareContent } from '../../types/shogi';
import { PIECE_TYPES } from '../../types/shogi';
import { EngineErrorCode, InvalidState } from '../errors';
import { Position } from '../position';
import type { SerializedPosition } from './validators';
import { validateSerializedPosition } from './validators';

function serializeSquare(content: SquareContent): string | null {
  return content === null ? null : `${content.side}:${content.face}`;
}

/** Hands omit zero counts. */
function serializeHand(position: Position, side: Side): Partial<Record<PieceType, number>> {
  const hand: Partial<Record<PieceType, number>> = {};
  for (const type of PIECE_TYPES) {
    const count = position.handCount(side, type);
    if (count > 0) hand[type] = count;
  }
  return hand;
}

export function serializePosition(position: Position): SerializedPosition {
  return {
    squares: position.squares.map(serializeSquare),
    hands: {
      sente: serializeHand(position, 'sente'),
      gote: serializeHand(position, 'gote'),
    },
    sideToMove: position.sideToMove,
  };
}

/**
 * Validate and rebuild a position. Throws InvalidState with the formatted
 * zod issues when the data does not match the serialized shape.
 */
export function deserializePosition(data: unknown): Position {
  const result = validateSerializedPosition(data);
  if (!result.success) {
    throw new InvalidState(
      EngineErrorCode.STATE_INVALID_SERIALIZED_POSITION,
      `Invalid serialized position: ${result.error}`,
      { issues: result.error }
    );
  }
  return Position.create(result.data);
}

export function positionToJson(position: Position): string {
  return JSON.stringify(serializePosition(position));
}

export function positionFromJson(json: string): Position {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    throw new InvalidState(
      EngineErrorCode.STATE_INVALID_SERIALIZED_POSITION,
      'Serialized position is not valid JSON',
      { cause: error instanceof Error ? error.message : String(error) }
    );
  }
  return deserializePosition(data);
}
