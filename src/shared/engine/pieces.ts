import type { PieceFace, PieceType, PromotedPieceFace, Rank, Side } from '../types/shogi';
import { PIECE_FACES } from '../types/shogi';
import { type Direction, rankDepth } from './coordinates';

/**
 * Static movement and promotion rules for every piece face.
 *
 * Behaviour is data, not dispatch: each face maps to a fixed record of
 * single-step offsets, unbounded slide directions and promotion data. The
 * table is typed as `Record<PieceFace, ...>`, so adding a face without rules
 * fails to compile.
 *
 * Directions are written in sente's orientation (dy = -1 is forward) and
 * mirrored for gote at use sites via `forwardSign`.
 */
export interface PieceFaceRules {
  /** Base type the face belongs to; what goes into a hand on capture. */
  readonly base: PieceType;
  /** Offsets applied exactly once. */
  readonly steps: readonly Direction[];
  /** Directions applied repeatedly until blocked or off the board. */
  readonly slides: readonly Direction[];
  /** True when a piece showing this face may promote. */
  readonly canPromote: boolean;
  /** Face shown after promotion; present exactly when canPromote. */
  readonly promoted?: PromotedPieceFace;
  /** True for the six promoted faces. */
  readonly isPromoted: boolean;
}

const d = (dx: number, dy: number): Direction => ({ dx, dy });

const GOLD_STEPS: readonly Direction[] = [d(-1, -1), d(0, -1), d(1, -1), d(-1, 0), d(1, 0), d(0, 1)];
const SILVER_STEPS: readonly Direction[] = [d(-1, -1), d(0, -1), d(1, -1), d(-1, 1), d(1, 1)];
const KING_STEPS: readonly Direction[] = [
  d(-1, -1),
  d(0, -1),
  d(1, -1),
  d(1, 0),
  d(-1, 0),
  d(-1, 1),
  d(0, 1),
  d(1, 1),
];
const ORTHOGONAL: readonly Direction[] = [d(0, -1), d(-1, 0), d(1, 0), d(0, 1)];
const DIAGONAL: readonly Direction[] = [d(-1, -1), d(1, -1), d(-1, 1), d(1, 1)];

function unpromoted(
  base: PieceType,
  steps: readonly Direction[],
  slides: readonly Direction[],
  promoted?: PromotedPieceFace
): PieceFaceRules {
  return promoted
    ? { base, steps, slides, canPromote: true, promoted, isPromoted: false }
    : { base, steps, slides, canPromote: false, isPromoted: false };
}

function promotedFace(
  base: PieceType,
  steps: readonly Direction[],
  slides: readonly Direction[]
): PieceFaceRules {
  return { base, steps, slides, canPromote: false, isPromoted: true };
}

export const PIECE_FACE_RULES: Readonly<Record<PieceFace, PieceFaceRules>> = {
  pawn: unpromoted('pawn', [d(0, -1)], [], 'promoted_pawn'),
  lance: unpromoted('lance', [], [d(0, -1)], 'promoted_lance'),
  knight: unpromoted('knight', [d(-1, -2), d(1, -2)], [], 'promoted_knight'),
  silver: unpromoted('silver', SILVER_STEPS, [], 'promoted_silver'),
  gold: unpromoted('gold', GOLD_STEPS, []),
  bishop: unpromoted('bishop', [], DIAGONAL, 'horse'),
  rook: unpromoted('rook', [], ORTHOGONAL, 'dragon'),
  king: unpromoted('king', KING_STEPS, []),
  promoted_pawn: promotedFace('pawn', GOLD_STEPS, []),
  promoted_lance: promotedFace('lance', GOLD_STEPS, []),
  promoted_knight: promotedFace('knight', GOLD_STEPS, []),
  promoted_silver: promotedFace('silver', GOLD_STEPS, []),
  horse: promotedFace('bishop', ORTHOGONAL, DIAGONAL),
  dragon: promotedFace('rook', DIAGONAL, ORTHOGONAL),
};

/**
 * Face a PieceType shows when placed unpromoted. Base faces share the
 * PieceType's name.
 */
export function baseFace(type: PieceType): PieceFace {
  return type;
}

export function baseTypeOf(face: PieceFace): PieceType {
  return PIECE_FACE_RULES[face].base;
}

/**
 * Face after promotion. Returns the face unchanged for faces that cannot
 * promote (gold, king, and already promoted faces).
 */
export function promotedFaceOf(face: PieceFace): PieceFace {
  return PIECE_FACE_RULES[face].promoted ?? face;
}

export function canPromote(face: PieceFace): boolean {
  return PIECE_FACE_RULES[face].canPromote;
}

/** All faces a PieceType can show, base face first. */
export function facesOfType(type: PieceType): PieceFace[] {
  return PIECE_FACES.filter((face) => PIECE_FACE_RULES[face].base === type);
}

/**
 * True when a piece showing `face` could never move again from `rank`:
 * pawn and lance on the side's farthest rank, knight on its two farthest
 * ranks. Every other face is unrestricted.
 *
 * Serves two rules: a drop onto such a rank is illegal, and a move onto
 * such a rank is only generated with promotion.
 */
export function isPlacementProhibited(side: Side, face: PieceFace, rank: Rank): boolean {
  switch (face) {
    case 'pawn':
    case 'lance':
      return rankDepth(side, rank) <= 1;
    case 'knight':
      return rankDepth(side, rank) <= 2;
    default:
      return false;
  }
}
