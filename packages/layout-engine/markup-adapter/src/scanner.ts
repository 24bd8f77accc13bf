import { MarkupSyntaxError, type SourcePosition } from '@folio/contracts';

export type TokenKind = 'leftParen' | 'rightParen' | 'leftBrace' | 'rightBrace' | 'string' | 'symbol' | 'end';

export type Token = {
  kind: TokenKind;
  /** Symbol text, or the decoded contents of a string. */
  lexeme: string;
  position: SourcePosition;
};

const DELIMITERS = new Set(['(', ')', '{', '}', '"', ';']);

const isWhitespace = (char: string): boolean => char === ' ' || char === '\t' || char === '\n' || char === '\r';

/**
 * Tokenizer for page markup. Comments (`;` to end of line) and whitespace are
 * skipped; strings are decoded with the `\"` and `\\` escapes.
 */
export class Scanner {
  private readonly source: string;
  private index = 0;
  private line = 1;
  private column = 1;
  private lookahead: Token | undefined;

  constructor(source: string) {
    this.source = source;
  }

  peek(): Token {
    if (!this.lookahead) {
      this.lookahead = this.scan();
    }
    return this.lookahead;
  }

  next(): Token {
    const token = this.peek();
    this.lookahead = undefined;
    return token;
  }

  private position(): SourcePosition {
    return { line: this.line, column: this.column };
  }

  private advance(): string {
    const char = this.source[this.index];
    this.index += 1;
    if (char === '\n') {
      this.line += 1;
      this.column = 1;
    } else {
      this.column += 1;
    }
    return char;
  }

  private skipTrivia(): void {
    while (this.index < this.source.length) {
      const char = this.source[this.index];
      if (isWhitespace(char)) {
        this.advance();
      } else if (char === ';') {
        while (this.index < this.source.length && this.source[this.index] !== '\n') {
          this.advance();
        }
      } else {
        return;
      }
    }
  }

  private scan(): Token {
    this.skipTrivia();
    const position = this.position();
    if (this.index >= this.source.length) {
      return { kind: 'end', lexeme: '', position };
    }

    const char = this.advance();
    switch (char) {
      case '(':
        return { kind: 'leftParen', lexeme: char, position };
      case ')':
        return { kind: 'rightParen', lexeme: char, position };
      case '{':
        return { kind: 'leftBrace', lexeme: char, position };
      case '}':
        return { kind: 'rightBrace', lexeme: char, position };
      case '"':
        return { kind: 'string', lexeme: this.scanString(position), position };
      default:
        return { kind: 'symbol', lexeme: char + this.scanSymbolRest(), position };
    }
  }

  private scanSymbolRest(): string {
    const start = this.index;
    while (this.index < this.source.length) {
      const char = this.source[this.index];
      if (isWhitespace(char) || DELIMITERS.has(char)) break;
      this.advance();
    }
    return this.source.slice(start, this.index);
  }

  private scanString(start: SourcePosition): string {
    let value = '';
    while (this.index < this.source.length) {
      const char = this.advance();
      if (char === '"') return value;
      if (char !== '\\') {
        value += char;
        continue;
      }

      const escapePosition = { line: this.line, column: this.column - 1 };
      if (this.index >= this.source.length) break;
      const code = this.advance();
      if (code !== '"' && code !== '\\') {
        throw new MarkupSyntaxError('INVALID_ESCAPE', `unknown escape code \\${code}`, escapePosition);
      }
      value += code;
    }
    throw new MarkupSyntaxError('UNTERMINATED_STRING', 'unterminated string', start);
  }
}
