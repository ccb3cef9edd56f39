import type { PieceFace, PieceType, Side } from '../../types/shogi';

/**
 * Symbol vocabularies shared by the board-diagram and move-record codecs.
 */

export const FACE_SYMBOLS: Readonly<Record<PieceFace, string>> = {
  pawn: '歩',
  lance: '香',
  knight: '桂',
  silver: '銀',
  gold: '金',
  bishop: '角',
  rook: '飛',
  king: '玉',
  promoted_pawn: 'と',
  promoted_lance: '杏',
  promoted_knight: '圭',
  promoted_silver: '全',
  horse: '馬',
  dragon: '竜',
};

export const SIDE_MARKERS: Readonly<Record<Side, string>> = {
  sente: '▲',
  gote: '▽',
};

export const SIDE_NAMES: Readonly<Record<Side, string>> = {
  sente: '先手',
  gote: '後手',
};

export const HAND_LABEL = '持駒:';
export const EMPTY_HAND_MARKER = 'なし';
export const TURN_LABEL = '手番:';
export const EMPTY_CELL = '・';
/** Empty cells are padded with an ideographic space to the width of a piece cell. */
export const EMPTY_CELL_ENCODED = '　・';

/** Hand entries are written from the most to the least valuable piece. */
export const HAND_ORDER: readonly PieceType[] = [
  'king',
  'rook',
  'bishop',
  'gold',
  'silver',
  'knight',
  'lance',
  'pawn',
];

/** CSA two-letter piece codes. */
export const CSA_FACE_CODES: Readonly<Record<PieceFace, string>> = {
  pawn: 'FU',
  lance: 'KY',
  knight: 'KE',
  silver: 'GI',
  gold: 'KI',
  bishop: 'KA',
  rook: 'HI',
  king: 'OU',
  promoted_pawn: 'TO',
  promoted_lance: 'NY',
  promoted_knight: 'NK',
  promoted_silver: 'NG',
  horse: 'UM',
  dragon: 'RY',
};

export const CSA_SIDE_MARKERS: Readonly<Record<Side, string>> = {
  sente: '+',
  gote: '-',
};

/** Reverse lookup helper for the symbol tables above. */
export function invert<K extends string>(
  keys: readonly K[],
  table: Readonly<Record<K, string>>
): ReadonlyMap<string, K> {
  return new Map(keys.map((key) => [table[key], key] as const));
}
