import { EngineErrorCode, NotationParseError } from '../errors';
import {
  EMPTY_CELL,
  EMPTY_HAND_MARKER,
  FACE_SYMBOLS,
  HAND_LABEL,
  SIDE_MARKERS,
  SIDE_NAMES,
  TURN_LABEL,
} from './symbols';

/**
 * Tokenizer for the board-diagram format.
 *
 * Spaces, tabs and ideographic spaces (U+3000) separate tokens and are
 * otherwise ignored. `\r\n`, `\r` and `\n` each produce one newline token.
 */

export type TokenKind =
  | 'hand_label'
  | 'none'
  | 'turn_label'
  | 'side_name'
  | 'side_marker'
  | 'empty'
  | 'piece'
  | 'count'
  | 'pipe'
  | 'newline'
  | 'eof';

export interface Token {
  readonly kind: TokenKind;
  readonly text: string;
  /** Character offset of the token's first character in the input. */
  readonly offset: number;
}

const WHITESPACE = new Set([' ', '\t', '　']);

// Multi-character keywords are tried before single characters.
const KEYWORDS: ReadonlyArray<readonly [string, TokenKind]> = [
  [HAND_LABEL, 'hand_label'],
  [TURN_LABEL, 'turn_label'],
  [EMPTY_HAND_MARKER, 'none'],
  ...Object.values(SIDE_NAMES).map((name) => [name, 'side_name'] as const),
];

const SINGLE_CHARACTERS: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
  ['|', 'pipe'],
  [EMPTY_CELL, 'empty'],
  ...Object.values(SIDE_MARKERS).map((marker) => [marker, 'side_marker'] as const),
  ...Object.values(FACE_SYMBOLS).map((symbol) => [symbol, 'piece'] as const),
]);

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

export function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let offset = 0;

  while (offset < input.length) {
    const ch = input.charAt(offset);

    if (WHITESPACE.has(ch)) {
      offset += 1;
      continue;
    }

    if (ch === '\r' || ch === '\n') {
      const length = ch === '\r' && input.charAt(offset + 1) === '\n' ? 2 : 1;
      tokens.push({ kind: 'newline', text: input.slice(offset, offset + length), offset });
      offset += length;
      continue;
    }

    if (isDigit(ch)) {
      let end = offset + 1;
      while (end < input.length && isDigit(input.charAt(end))) end += 1;
      tokens.push({ kind: 'count', text: input.slice(offset, end), offset });
      offset = end;
      continue;
    }

    const keyword = KEYWORDS.find(([text]) => input.startsWith(text, offset));
    if (keyword) {
      const [text, kind] = keyword;
      tokens.push({ kind, text, offset });
      offset += text.length;
      continue;
    }

    const single = SINGLE_CHARACTERS.get(ch);
    if (single) {
      tokens.push({ kind: single, text: ch, offset });
      offset += 1;
      continue;
    }

    throw new NotationParseError(
      EngineErrorCode.NOTATION_UNKNOWN_CHARACTER,
      `unexpected character '${ch}'`,
      input,
      offset,
      'BoardDiagram'
    );
  }

  tokens.push({ kind: 'eof', text: '', offset: input.length });
  return tokens;
}

/**
 * Cursor over a token list for recursive-descent parsing. Errors carry the
 * unconsumed input from the offending token on.
 */
export class TokenStream {
  private index = 0;

  constructor(
    private readonly input: string,
    private readonly tokens: readonly Token[],
    private readonly domain: string
  ) {}

  peek(): Token {
    return this.tokens[Math.min(this.index, this.tokens.length - 1)] ?? {
      kind: 'eof',
      text: '',
      offset: this.input.length,
    };
  }

  /** Consume and return the next token if it has the given kind. */
  accept(kind: TokenKind): Token | undefined {
    const token = this.peek();
    if (token.kind !== kind) return undefined;
    this.index += 1;
    return token;
  }

  expect(kind: TokenKind, expected: string): Token {
    const token = this.accept(kind);
    if (!token) {
      throw this.error(expected);
    }
    return token;
  }

  /** Consume one or more newline tokens. */
  expectLineBreak(): void {
    this.expect('newline', 'expected line break');
    while (this.accept('newline')) {
      // blank lines are allowed between sections
    }
  }

  error(expected: string, token: Token = this.peek()): NotationParseError {
    return new NotationParseError(
      EngineErrorCode.NOTATION_UNEXPECTED_TOKEN,
      expected,
      this.input,
      token.offset,
      this.domain
    );
  }
}
