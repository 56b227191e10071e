/**
 * Tangle Lexer Tests
 * Token stream shape, literals, operators, newlines and lexer errors
 */

import { describe, expect, it } from 'vitest';
import { LexerError, TOKEN_TYPES, tokenize, type Token } from '../../src/index.js';

/** Token types without the trailing EOF */
function types(source: string): string[] {
  return tokenize(source)
    .slice(0, -1)
    .map((t) => t.type);
}

function values(source: string): string[] {
  return tokenize(source)
    .slice(0, -1)
    .map((t) => t.value);
}

function first(source: string): Token {
  const [token] = tokenize(source);
  if (token === undefined) throw new Error('no tokens');
  return token;
}

describe('Tangle Lexer', () => {
  describe('basics', () => {
    it('ends every stream with EOF', () => {
      const tokens = tokenize('');
      expect(tokens).toHaveLength(1);
      expect(tokens[0]?.type).toBe(TOKEN_TYPES.EOF);
    });

    it('tracks line and column of each token', () => {
      const tokens = tokenize('x = 1\n  y');
      const y = tokens.find((t) => t.value === 'y');
      expect(y?.span.start).toEqual({ line: 2, column: 3, offset: 8 });
      expect(tokens[2]?.span.end).toEqual({ line: 1, column: 6, offset: 5 });
    });

    it('skips comments to the end of the line', () => {
      expect(types('x # the rest is ignored\ny')).toEqual([
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.NEWLINE,
        TOKEN_TYPES.IDENTIFIER,
      ]);
    });

    it('joins lines ending in a backslash', () => {
      expect(types('a + \\\nb')).toEqual([
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.PLUS,
        TOKEN_TYPES.IDENTIFIER,
      ]);
    });
  });

  describe('newlines', () => {
    it('drops newlines inside parentheses and brackets', () => {
      expect(types('f(\n1,\n2\n)')).toEqual([
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.LPAREN,
        TOKEN_TYPES.NUMBER,
        TOKEN_TYPES.COMMA,
        TOKEN_TYPES.NUMBER,
        TOKEN_TYPES.RPAREN,
      ]);
      expect(types('[\n1\n]')).toEqual([
        TOKEN_TYPES.LBRACKET,
        TOKEN_TYPES.NUMBER,
        TOKEN_TYPES.RBRACKET,
      ]);
    });

    it('keeps newlines inside braces', () => {
      expect(types('{\nx\n}')).toEqual([
        TOKEN_TYPES.LBRACE,
        TOKEN_TYPES.NEWLINE,
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.NEWLINE,
        TOKEN_TYPES.RBRACE,
      ]);
    });

    it('keeps newlines in a block nested inside parentheses', () => {
      expect(types('f(() => {\nx\n})')).toContain(TOKEN_TYPES.NEWLINE);
    });
  });

  describe('strings', () => {
    it('reads both quote styles', () => {
      expect(first('"hello"')).toMatchObject({ type: TOKEN_TYPES.STRING, value: 'hello' });
      expect(first("'it'")).toMatchObject({ type: TOKEN_TYPES.STRING, value: 'it' });
    });

    it('processes escape sequences', () => {
      expect(first('"a\\tb\\n\\"c\\\\"').value).toBe('a\tb\n"c\\');
      expect(first("'don\\'t'").value).toBe("don't");
    });

    it('rejects unknown escapes', () => {
      expect(() => tokenize('"bad \\q"')).toThrow('Invalid escape sequence: \\q');
    });

    it('rejects an unterminated string', () => {
      expect(() => tokenize('"open')).toThrow('Unterminated string literal at 1:1');
    });

    it('does not let a string span lines', () => {
      try {
        tokenize('x = "first\nsecond"');
        expect.fail('expected a lexer error');
      } catch (error) {
        expect(error).toBeInstanceOf(LexerError);
        if (error instanceof LexerError) {
          expect(error.code).toBe('LEXER_UNTERMINATED_STRING');
          expect(error.location).toEqual({ line: 1, column: 5, offset: 4 });
        }
      }
    });
  });

  describe('numbers', () => {
    it('reads integers, decimals and exponents', () => {
      expect(values('42 3.25 1e3 2.5E-2')).toEqual(['42', '3.25', '1e3', '2.5E-2']);
    });

    it('drops underscore separators', () => {
      expect(first('1_000_000').value).toBe('1000000');
    });

    it('leaves a method call on an integer as separate tokens', () => {
      expect(types('5.abs()')).toEqual([
        TOKEN_TYPES.NUMBER,
        TOKEN_TYPES.DOT,
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.LPAREN,
        TOKEN_TYPES.RPAREN,
      ]);
    });

    it('rejects a number running into a letter', () => {
      expect(() => tokenize('12a')).toThrow('Invalid number literal: 12a');
    });
  });

  describe('identifiers and keywords', () => {
    it('recognizes keywords', () => {
      expect(types('fn if else while for in return graph rule match')).toEqual([
        TOKEN_TYPES.FN,
        TOKEN_TYPES.IF,
        TOKEN_TYPES.ELSE,
        TOKEN_TYPES.WHILE,
        TOKEN_TYPES.FOR,
        TOKEN_TYPES.IN,
        TOKEN_TYPES.RETURN,
        TOKEN_TYPES.GRAPH,
        TOKEN_TYPES.RULE,
        TOKEN_TYPES.MATCH,
      ]);
    });

    it('maps word and symbol forms of logic operators to the same tokens', () => {
      expect(types('a and b && c or d || e')).toEqual([
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.AND,
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.AND,
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.OR,
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.OR,
        TOKEN_TYPES.IDENTIFIER,
      ]);
    });

    it('reads identifiers with underscores and digits', () => {
      expect(first('_node_2').type).toBe(TOKEN_TYPES.IDENTIFIER);
      expect(first('_node_2').value).toBe('_node_2');
    });
  });

  describe('symbols', () => {
    it('reads a symbol where a value can start', () => {
      expect(first(':dag')).toMatchObject({ type: TOKEN_TYPES.SYMBOL, value: 'dag' });
      expect(types('f(:a, :b)')).toEqual([
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.LPAREN,
        TOKEN_TYPES.SYMBOL,
        TOKEN_TYPES.COMMA,
        TOKEN_TYPES.SYMBOL,
        TOKEN_TYPES.RPAREN,
      ]);
    });

    it('keeps the colon of a map entry as punctuation', () => {
      expect(types('{a:b}')).toEqual([
        TOKEN_TYPES.LBRACE,
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.COLON,
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.RBRACE,
      ]);
    });

    it('reads a symbol value after a key colon and a space', () => {
      expect(types('{type: :undirected}')).toEqual([
        TOKEN_TYPES.LBRACE,
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.COLON,
        TOKEN_TYPES.SYMBOL,
        TOKEN_TYPES.RBRACE,
      ]);
    });
  });

  describe('operators', () => {
    it('prefers the longest operator', () => {
      expect(types('a ** b // c <= d => e ... f')).toEqual([
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.STAR_STAR,
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.SLASH_SLASH,
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.LE,
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.FAT_ARROW,
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.ELLIPSIS,
        TOKEN_TYPES.IDENTIFIER,
      ]);
    });

    it('reads regex match operators', () => {
      expect(types('s =~ p !~ q')).toEqual([
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.MATCH_OP,
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.NO_MATCH_OP,
        TOKEN_TYPES.IDENTIFIER,
      ]);
    });

    it('reads element-wise operators with the base operator as value', () => {
      const tokens = tokenize('a .+ b .// c .== d').filter(
        (t) => t.type === TOKEN_TYPES.DOT_OP
      );
      expect(tokens.map((t) => t.value)).toEqual(['+', '//', '==']);
    });

    it('reads bitwise operators', () => {
      expect(types('a & b | c ^ ~d << 1 >> 2')).toEqual([
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.AMPERSAND,
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.PIPE_BAR,
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.CARET,
        TOKEN_TYPES.TILDE,
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.SHL,
        TOKEN_TYPES.NUMBER,
        TOKEN_TYPES.SHR,
        TOKEN_TYPES.NUMBER,
      ]);
    });

    it('rejects unknown characters', () => {
      expect(() => tokenize('x = 1 @ 2')).toThrow('Unexpected character: @ at 1:7');
    });
  });

  describe('frontmatter', () => {
    it('reads the YAML block at the start of the source', () => {
      const tokens = tokenize('---\nmodule: geometry\nalias: geo\n---\nx = 1');
      expect(tokens[0]).toMatchObject({
        type: TOKEN_TYPES.FRONTMATTER,
        value: 'module: geometry\nalias: geo',
      });
      expect(tokens[1]?.type).toBe(TOKEN_TYPES.IDENTIFIER);
      expect(tokens[1]?.span.start.line).toBe(5);
    });

    it('requires a closing delimiter', () => {
      expect(() => tokenize('---\nmodule: geometry\n')).toThrow(
        'Unterminated frontmatter: missing closing ---'
      );
    });

    it('only recognizes frontmatter on the first line', () => {
      expect(() => tokenize('x = 1\n---\n')).not.toThrow();
      expect(types('x = 1\n---\n')).not.toContain(TOKEN_TYPES.FRONTMATTER);
    });
  });
});
