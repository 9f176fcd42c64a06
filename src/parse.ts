import { UnexpectedTokenError } from './errors';
import { debugLogger, LogComponent } from './debug-logger';

/**
 * Token types for the lexer.
 */
export enum TokenKind {
  // Literals
  IDENTIFIER = 'IDENTIFIER',

  // Operators – precedence (highest ➜ lowest): NOT > AND > OR > XOR > IMPLIES > IFF
  NOT = 'NOT', // ~ (prefix, right-associative)
  AND = 'AND', // &
  OR = 'OR', // |
  XOR = 'XOR', // ^
  IMPLIES = 'IMPLIES', // ->
  IFF = 'IFF', // <->

  // Punctuation
  LPAREN = 'LPAREN', // (
  RPAREN = 'RPAREN', // )

  // Special
  EOF = 'EOF',
}

export interface Token {
  kind: TokenKind;
  value: string;
  /** Offset into the formula with all whitespace removed. */
  pos: number;
}

const SINGLE_CHAR_TOKENS: Readonly<Record<string, TokenKind>> = {
  '(': TokenKind.LPAREN,
  ')': TokenKind.RPAREN,
  '&': TokenKind.AND,
  '|': TokenKind.OR,
  '~': TokenKind.NOT,
  '^': TokenKind.XOR,
};

const IDENTIFIER_CHAR = /[\p{L}\p{N}_]/u;

/**
 * Returns true if `name` could be produced as a single identifier token.
 */
export function isIdentifier(name: string): boolean {
  return /^[\p{L}\p{N}_]+$/u.test(name);
}

/**
 * Splits a formula into tokens. Whitespace is removed up front and any
 * character that cannot start a token is skipped without complaint.
 */
export class Lexer {
  private readonly input: string;
  private pos = 0;

  constructor(input: string) {
    this.input = input.replace(/\s+/g, '');
  }

  private startsWith(op: string): boolean {
    return this.input.startsWith(op, this.pos);
  }

  // whole code point at `pos`, so astral letters are not split into surrogates
  private currentChar(): string {
    const cp = this.input.codePointAt(this.pos);
    return cp === undefined ? '' : String.fromCodePoint(cp);
  }

  private readIdentifier(): string {
    const start = this.pos;
    let ch = this.currentChar();
    while (ch && IDENTIFIER_CHAR.test(ch)) {
      this.pos += ch.length;
      ch = this.currentChar();
    }
    return this.input.slice(start, this.pos);
  }

  public nextToken(): Token {
    while (this.pos < this.input.length) {
      const start = this.pos;
      const ch = this.currentChar();

      const single = SINGLE_CHAR_TOKENS[ch];
      if (single !== undefined) {
        this.pos++;
        return { kind: single, value: ch, pos: start };
      }

      if (this.startsWith('->')) {
        this.pos += 2;
        return { kind: TokenKind.IMPLIES, value: '->', pos: start };
      }

      if (this.startsWith('<->')) {
        this.pos += 3;
        return { kind: TokenKind.IFF, value: '<->', pos: start };
      }

      if (IDENTIFIER_CHAR.test(ch)) {
        return {
          kind: TokenKind.IDENTIFIER,
          value: this.readIdentifier(),
          pos: start,
        };
      }

      debugLogger.trace(
        LogComponent.PARSER,
        `Skipping unrecognised character '${ch}' at ${start}`
      );
      this.pos += ch.length;
    }
    return { kind: TokenKind.EOF, value: '', pos: this.pos };
  }

  /**
   * Reads every remaining token, including the trailing EOF.
   */
  public tokenize(): Token[] {
    const tokens: Token[] = [];
    let t: Token;
    do {
      t = this.nextToken();
      tokens.push(t);
    } while (t.kind !== TokenKind.EOF);
    return tokens;
  }
}

/**
 * Operations the parser folds each recognised construct through. The BDD
 * manager is the canonical implementation, so a parse yields a diagram
 * reference directly without building a syntax tree.
 */
export interface FormulaBuilder<R> {
  variable(name: string): R;
  not(a: R): R;
  and(a: R, b: R): R;
  or(a: R, b: R): R;
  xor(a: R, b: R): R;
  implies(a: R, b: R): R;
  iff(a: R, b: R): R;
}

type BinaryOp = 'and' | 'or' | 'xor' | 'implies' | 'iff';

export class Parser<R> {
  private current = 0;
  private readonly tokens: Token[];

  constructor(
    lexer: Lexer,
    private readonly builder: FormulaBuilder<R>
  ) {
    this.tokens = lexer.tokenize();
  }

  private peek(): Token {
    return (
      this.tokens[this.current] ?? {
        kind: TokenKind.EOF,
        value: '',
        pos: this.tokens.at(-1)?.pos ?? 0,
      }
    );
  }

  private advance(): Token {
    const tok = this.peek();
    if (tok.kind !== TokenKind.EOF) this.current++;
    return tok;
  }

  private match(...k: TokenKind[]): boolean {
    return k.includes(this.peek().kind);
  }

  private expect(kind: TokenKind, expected: string): Token {
    if (!this.match(kind)) throw new UnexpectedTokenError(this.peek(), expected);
    return this.advance();
  }

  public parseFormula(): R {
    const f = this.parseIff();
    if (!this.match(TokenKind.EOF))
      throw new UnexpectedTokenError(this.peek(), 'end of formula');
    return f;
  }

  /**
   * Parses one left-associative precedence level, folding each operand into
   * the running result as soon as it is read.
   */
  private parseLevel(kind: TokenKind, op: BinaryOp, next: () => R): R {
    let left = next();
    while (this.match(kind)) {
      this.advance();
      const right = next();
      left = this.builder[op](left, right);
      debugLogger.trace(LogComponent.PARSER, `Folded ${op} into ${String(left)}`);
    }
    return left;
  }

  private parseIff(): R {
    return this.parseLevel(TokenKind.IFF, 'iff', () => this.parseImplies());
  }

  private parseImplies(): R {
    return this.parseLevel(TokenKind.IMPLIES, 'implies', () => this.parseXor());
  }

  private parseXor(): R {
    return this.parseLevel(TokenKind.XOR, 'xor', () => this.parseOr());
  }

  private parseOr(): R {
    return this.parseLevel(TokenKind.OR, 'or', () => this.parseAnd());
  }

  private parseAnd(): R {
    return this.parseLevel(TokenKind.AND, 'and', () => this.parseNegation());
  }

  private parseNegation(): R {
    if (this.match(TokenKind.NOT)) {
      this.advance();
      return this.builder.not(this.parseNegation()); // right-associative
    }
    return this.parsePrimary();
  }

  private parsePrimary(): R {
    if (this.match(TokenKind.LPAREN)) {
      this.advance();
      const f = this.parseIff();
      this.expect(TokenKind.RPAREN, "')'");
      return f;
    }
    if (this.match(TokenKind.IDENTIFIER)) {
      return this.builder.variable(this.advance().value);
    }
    throw new UnexpectedTokenError(this.peek(), "variable or '('");
  }
}

/**
 * Parses a formula, folding it through the given builder.
 */
export function parseFormula<R>(input: string, builder: FormulaBuilder<R>): R {
  debugLogger.debug(LogComponent.PARSER, `Parsing '${input}'`);
  return new Parser(new Lexer(input), builder).parseFormula();
}

/**
 * Returns the distinct identifiers of a formula in order of first
 * appearance.
 */
export function formulaVariables(input: string): string[] {
  const seen = new Set<string>();
  for (const t of new Lexer(input).tokenize()) {
    if (t.kind === TokenKind.IDENTIFIER) seen.add(t.value);
  }
  return [...seen];
}
