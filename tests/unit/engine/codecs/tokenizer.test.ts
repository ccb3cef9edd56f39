import { EngineErrorCode, NotationParseError } from '../../../../src/shared/engine';
import { TokenStream, tokenize } from '../../../../src/shared/engine/codecs/tokenizer';

describe('tokenize', () => {
  it('splits a hand line into keyword and piece tokens', () => {
    expect(tokenize('持駒: 角歩12')).toEqual([
      { kind: 'hand_label', text: '持駒:', offset: 0 },
      { kind: 'piece', text: '角', offset: 4 },
      { kind: 'piece', text: '歩', offset: 5 },
      { kind: 'count', text: '12', offset: 6 },
      { kind: 'eof', text: '', offset: 8 },
    ]);
  });

  it('treats ideographic spaces as separators', () => {
    expect(tokenize('|　・|▲玉|').map((token) => token.kind)).toEqual([
      'pipe',
      'empty',
      'pipe',
      'side_marker',
      'piece',
      'pipe',
      'eof',
    ]);
  });

  it('emits one newline token per line ending style', () => {
    const tokens = tokenize('なし\r\n手番:\r先手\n');
    expect(tokens.filter((token) => token.kind === 'newline').map((token) => token.text)).toEqual([
      '\r\n',
      '\r',
      '\n',
    ]);
    expect(tokens.find((token) => token.kind === 'side_name')).toEqual({
      kind: 'side_name',
      text: '先手',
      offset: 8,
    });
  });

  it('rejects characters outside the alphabet', () => {
    expect(() => tokenize('持駒: Q')).toThrow("unexpected character 'Q'. ^Q");
    try {
      tokenize('|x');
    } catch (error) {
      expect(error).toBeInstanceOf(NotationParseError);
      if (error instanceof NotationParseError) {
        expect(error.code).toBe(EngineErrorCode.NOTATION_UNKNOWN_CHARACTER);
        expect(error.offset).toBe(1);
        expect(error.domain).toBe('BoardDiagram');
      }
    }
  });
});

describe('TokenStream', () => {
  const input = '| ・\n\n|';
  const stream = () => new TokenStream(input, tokenize(input), 'Test');

  it('accepts only the requested kind', () => {
    const s = stream();
    expect(s.accept('empty')).toBeUndefined();
    expect(s.accept('pipe')).toEqual({ kind: 'pipe', text: '|', offset: 0 });
    expect(s.peek().kind).toBe('empty');
  });

  it('collapses consecutive line breaks', () => {
    const s = stream();
    s.expect('pipe', 'expected |');
    s.expect('empty', 'expected ・');
    s.expectLineBreak();
    expect(s.peek()).toEqual({ kind: 'pipe', text: '|', offset: 5 });
  });

  it('reports the remainder from the offending token', () => {
    const s = stream();
    s.accept('pipe');
    expect(() => s.expect('pipe', 'expected |')).toThrow('expected |. ^・\n\n|');
  });

  it('keeps returning eof at the end', () => {
    const s = new TokenStream('', tokenize(''), 'Test');
    expect(s.peek()).toEqual({ kind: 'eof', text: '', offset: 0 });
    s.accept('eof');
    expect(s.peek().kind).toBe('eof');
  });
});
