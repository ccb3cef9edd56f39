import type { Move, Side, TerminalMove } from '../../types/shogi';
import { SIDES } from '../../types/shogi';
import { EngineErrorCode, NotationParseError, isNotationParseError } from '../errors';
import { createStartingPosition } from '../initialState';
import { applyMove } from '../movementApplication';
import { generateMoves } from '../movementLogic';
import { movesEqual } from '../moves';
import type { Position } from '../position';
import { decodeMoveToken, encodeMoveToken } from './moveRecord';
import { CSA_SIDE_MARKERS, invert } from './symbols';

/**
 * CSA game-record reader and writer for even games.
 *
 * Recognised lines:
 *   'text          comment
 *   V2.2           format version
 *   N+name, N-name player names
 *   $KEY:VALUE     attribute
 *   PI             even-game starting position
 *   + or -         side to move first
 *   +7776FU ...    moves; several may share a line separated by commas
 *   T12            time spent on the previous move (ignored)
 *   %TORYO ...     terminal token
 *
 * Every move is checked against the generated moves of the position it is
 * played in; handicap setups (PI with piece removals, P1..P9 boards) are
 * not supported.
 */

export interface GameRecord {
  version?: string;
  names: Partial<Record<Side, string>>;
  attributes: Record<string, string>;
  /** Moves in play order, terminal token excluded. */
  moves: Move[];
  /** `positions[0]` is the initial position; `positions[i + 1]` follows `moves[i]`. */
  positions: Position[];
  result?: TerminalMove;
}

const DOMAIN = 'GameRecord';
const SIDE_BY_MARKER = invert(SIDES, CSA_SIDE_MARKERS);

interface Line {
  text: string;
  offset: number;
}

function splitLines(input: string): Line[] {
  const lines: Line[] = [];
  const pattern = /[^\r\n]*(\r\n|\r|\n|$)/g;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(input)) !== null && match[0] !== '') {
    const raw = match[0];
    const body = raw.replace(/[\r\n]+$/, '');
    lines.push({ text: body, offset: match.index });
  }
  return lines;
}

/** Re-anchor an error raised on a single token to the whole record. */
function relocate(error: NotationParseError, input: string, offset: number): NotationParseError {
  return new NotationParseError(error.code, error.expected, input, offset + error.offset, DOMAIN);
}

class RecordReader {
  private readonly record: GameRecord = { names: {}, attributes: {}, moves: [], positions: [] };
  private current: Position | undefined;
  private sideSet = false;

  constructor(private readonly input: string) {}

  read(): GameRecord {
    for (const line of splitLines(this.input)) {
      this.readLine(line);
    }
    if (!this.current) {
      throw this.error('expected PI', this.input.length);
    }
    return this.record;
  }

  private error(
    expected: string,
    offset: number,
    code: EngineErrorCode = EngineErrorCode.NOTATION_UNEXPECTED_TOKEN
  ): NotationParseError {
    return new NotationParseError(code, expected, this.input, offset, DOMAIN);
  }

  private readLine({ text, offset }: Line): void {
    const trimmed = text.trim();
    const start = offset + text.indexOf(trimmed);
    if (trimmed === '' || trimmed.startsWith("'")) return;

    if (trimmed.startsWith('V')) {
      this.record.version = trimmed.slice(1);
    } else if (trimmed.startsWith('N+') || trimmed.startsWith('N-')) {
      const side = SIDE_BY_MARKER.get(trimmed.charAt(1));
      if (side) this.record.names[side] = trimmed.slice(2);
    } else if (trimmed.startsWith('$')) {
      const separator = trimmed.indexOf(':');
      if (separator < 0) throw this.error('expected $KEY:VALUE', start);
      this.record.attributes[trimmed.slice(1, separator)] = trimmed.slice(separator + 1);
    } else if (trimmed.startsWith('PI')) {
      if (trimmed !== 'PI') throw this.error('expected PI without handicap pieces', start + 2);
      this.start(createStartingPosition(), start);
    } else if (trimmed === '+' || trimmed === '-') {
      this.setFirstSide(trimmed, start);
    } else {
      let tokenOffset = start;
      for (const part of trimmed.split(',')) {
        const token = part.trim();
        this.readToken(token, tokenOffset + part.indexOf(token));
        tokenOffset += part.length + 1;
      }
    }
  }

  private start(position: Position, offset: number): void {
    if (this.current) throw this.error('expected a single PI line', offset);
    this.current = position;
    this.record.positions.push(position);
  }

  private setFirstSide(marker: string, offset: number): void {
    const side = SIDE_BY_MARKER.get(marker);
    if (!this.current || side === undefined) throw this.error('expected PI before side to move', offset);
    if (this.sideSet || this.record.moves.length > 0) {
      throw this.error('expected side to move before the first move', offset);
    }
    this.sideSet = true;
    this.current = this.current.withSideToMove(side);
    this.record.positions[0] = this.current;
  }

  private readToken(token: string, offset: number): void {
    if (token === '') return;
    if (/^T\d+$/.test(token)) return;

    const position = this.current;
    if (!position) throw this.error('expected PI before moves', offset);
    if (this.record.result) throw this.error('expected end of record', offset);

    let move: Move;
    try {
      move = decodeMoveToken(token, position);
    } catch (error) {
      if (isNotationParseError(error)) throw relocate(error, this.input, offset);
      throw error;
    }

    if (move.type === 'terminal') {
      this.record.result = move;
      return;
    }
    if (!generateMoves(position).some((candidate) => movesEqual(candidate, move))) {
      throw this.error('expected a legal move', offset, EngineErrorCode.RULES_MOVE_NOT_GENERATED);
    }
    const next = applyMove(position, move);
    if (!next) throw this.error('expected a non-terminal move', offset);
    this.record.moves.push(move);
    this.record.positions.push(next);
    this.current = next;
  }
}

/**
 * Read and replay a CSA record. Throws NotationParseError on malformed
 * lines, moves that do not fit the position, or a missing PI line.
 */
export function decodeGameRecord(text: string): GameRecord {
  return new RecordReader(text).read();
}

/** Final position of a decoded record. */
export function finalPosition(record: GameRecord): Position | undefined {
  return record.positions[record.positions.length - 1];
}

function firstSideOf(record: { moves: readonly Move[]; positions?: readonly Position[] }): Side {
  const initial = record.positions?.[0];
  if (initial) return initial.sideToMove;
  const first = record.moves[0];
  return first && first.type !== 'terminal' ? first.side : 'sente';
}

/**
 * Write a record starting from the even-game position. The first side to
 * move is taken from `positions[0]` when present.
 */
export function encodeGameRecord(
  record: Pick<GameRecord, 'version' | 'names' | 'attributes' | 'moves' | 'result'> & {
    positions?: readonly Position[];
  }
): string {
  const lines: string[] = [];
  if (record.version !== undefined) lines.push(`V${record.version}`);
  for (const side of SIDES) {
    const name = record.names[side];
    if (name !== undefined) lines.push(`N${CSA_SIDE_MARKERS[side]}${name}`);
  }
  for (const [key, value] of Object.entries(record.attributes)) {
    lines.push(`$${key}:${value}`);
  }
  lines.push('PI');
  lines.push(CSA_SIDE_MARKERS[firstSideOf(record)]);
  for (const move of record.moves) {
    lines.push(encodeMoveToken(move));
  }
  if (record.result) lines.push(encodeMoveToken(record.result));
  return `${lines.join('\n')}\n`;
}
