import type { PieceType, Side, SquareContent } from '../../types/shogi';
import { PIECE_FACES, SIDES } from '../../types/shogi';
import { FILES, RANKS, squareOf } from '../coordinates';
import { PIECE_FACE_RULES } from '../pieces';
import { EMPTY_HAND, Position } from '../position';
import {
  EMPTY_CELL_ENCODED,
  EMPTY_HAND_MARKER,
  FACE_SYMBOLS,
  HAND_LABEL,
  HAND_ORDER,
  SIDE_MARKERS,
  SIDE_NAMES,
  TURN_LABEL,
  invert,
} from './symbols';
import { TokenStream, tokenize } from './tokenizer';

/**
 * Board-diagram codec.
 *
 * ```
 * 持駒: なし
 * |▽香|▽桂|▽銀|▽金|▽玉|▽金|▽銀|▽桂|▽香|
 * |　・|▽飛|　・|　・|　・|　・|　・|▽角|　・|
 * ... seven more rows ...
 * 持駒: 角歩2
 * 手番: 先手
 * ```
 *
 * The first hand line is gote's, the second sente's. Rows run rank 1 to
 * rank 9 and each row lists files 9 to 1.
 */

const FACE_BY_SYMBOL = invert(PIECE_FACES, FACE_SYMBOLS);
const SIDE_BY_MARKER = invert(SIDES, SIDE_MARKERS);
const SIDE_BY_NAME = invert(SIDES, SIDE_NAMES);

type HandCounts = Record<PieceType, number>;

// hand := HAND_LABEL ( NONE | ( PIECE COUNT? )+ )
function parseHand(stream: TokenStream): HandCounts {
  const counts: HandCounts = { ...EMPTY_HAND };
  stream.expect('hand_label', `expected ${HAND_LABEL}`);
  if (stream.accept('none')) {
    return counts;
  }

  let entries = 0;
  for (let token = stream.peek(); token.kind === 'piece'; token = stream.peek()) {
    const face = FACE_BY_SYMBOL.get(token.text);
    if (face === undefined || PIECE_FACE_RULES[face].isPromoted) {
      throw stream.error('expected an unpromoted hand piece');
    }
    stream.accept('piece');
    const countToken = stream.accept('count');
    counts[PIECE_FACE_RULES[face].base] += countToken ? Number(countToken.text) : 1;
    entries += 1;
  }
  if (entries === 0) {
    throw stream.error(`expected ${EMPTY_HAND_MARKER} or hand pieces`);
  }
  return counts;
}

// cell := EMPTY | SIDE_MARKER PIECE
function parseCell(stream: TokenStream): SquareContent {
  if (stream.accept('empty')) {
    return null;
  }
  const marker = stream.accept('side_marker');
  if (!marker) {
    throw stream.error('expected square symbol');
  }
  const side = SIDE_BY_MARKER.get(marker.text);
  const pieceToken = stream.expect('piece', 'expected piece symbol');
  const face = FACE_BY_SYMBOL.get(pieceToken.text);
  if (side === undefined || face === undefined) {
    throw stream.error('expected square symbol', marker);
  }
  return { side, face };
}

// row := ( PIPE cell ){9} PIPE
function parseRow(stream: TokenStream): SquareContent[] {
  const cells: SquareContent[] = [];
  for (let i = 0; i < FILES.length; i += 1) {
    stream.expect('pipe', 'expected |');
    cells.push(parseCell(stream));
  }
  stream.expect('pipe', 'expected |');
  return cells;
}

// turn := TURN_LABEL SIDE_NAME
function parseTurn(stream: TokenStream): Side {
  stream.expect('turn_label', `expected ${TURN_LABEL}`);
  const name = stream.expect('side_name', `expected '${SIDE_NAMES.sente}|${SIDE_NAMES.gote}'`);
  const side = SIDE_BY_NAME.get(name.text);
  if (side === undefined) {
    throw stream.error(`expected '${SIDE_NAMES.sente}|${SIDE_NAMES.gote}'`, name);
  }
  return side;
}

/**
 * Decode a board diagram. Throws NotationParseError naming what was
 * expected and carrying the unconsumed remainder of the input.
 */
export function decodeBoardDiagram(text: string): Position {
  const stream = new TokenStream(text, tokenize(text), 'BoardDiagram');

  while (stream.accept('newline')) {
    // leading blank lines
  }
  const goteHand = parseHand(stream);
  stream.expectLineBreak();

  const squares: SquareContent[] = [];
  for (let i = 0; i < RANKS.length; i += 1) {
    squares.push(...parseRow(stream));
    stream.expectLineBreak();
  }

  const senteHand = parseHand(stream);
  stream.expectLineBreak();
  const sideToMove = parseTurn(stream);

  while (stream.accept('newline')) {
    // trailing blank lines
  }
  stream.expect('eof', 'expected end of diagram');

  return Position.create({ squares, hands: { sente: senteHand, gote: goteHand }, sideToMove });
}

function encodeHand(position: Position, side: Side): string {
  const entries = HAND_ORDER.filter((type) => position.handCount(side, type) > 0).map((type) => {
    const count = position.handCount(side, type);
    return `${FACE_SYMBOLS[type]}${count > 1 ? count : ''}`;
  });
  return `${HAND_LABEL} ${entries.length > 0 ? entries.join('') : EMPTY_HAND_MARKER}`;
}

function encodeCell(content: SquareContent): string {
  return content === null ? EMPTY_CELL_ENCODED : `${SIDE_MARKERS[content.side]}${FACE_SYMBOLS[content.face]}`;
}

/**
 * Encode a position as a board diagram. Lines are separated by `\n`;
 * `decodeBoardDiagram(encodeBoardDiagram(p))` equals `p`.
 */
export function encodeBoardDiagram(position: Position): string {
  const rows = RANKS.map(
    (rank) => `|${FILES.map((file) => encodeCell(position.at(squareOf(file, rank)))).join('|')}|`
  );
  return [
    encodeHand(position, 'gote'),
    ...rows,
    encodeHand(position, 'sente'),
    `${TURN_LABEL} ${SIDE_NAMES[position.sideToMove]}`,
  ].join('\n');
}
