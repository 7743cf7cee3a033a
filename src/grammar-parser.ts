/**
 * Grammar parser — reads the textual grammar notation into declarations.
 *
 * A tokenizer + recursive descent parser, one logical line at a time.
 *
 * Grammar:
 *   grammar     = { line }
 *   line        = header | alias | production | comment | blank
 *   header      = ["tagged"] ("data" | "newtype") NAME
 *   alias       = "type" NAME "=" type
 *   production  = INDENT NAME { atom }                              (positional)
 *               | INDENT NAME "{" field { "," field } "}"           (record)
 *   field       = NAME "::" type
 *   type        = "Map" atom atom | "Maybe" atom | atom
 *   atom        = NAME | "[" type "]" | "(" type { "," type } ")"
 *   comment     = "--" to end of line
 *
 * Productions are indented and belong to the closest header above them.
 * `(T)` is grouping, `(T1, T2)` a tuple. Brackets and parentheses nest
 * to any depth, so `[[Block]]` and `[([Inline], [[Block]])]` are single
 * field types.
 */

import { GrammarSyntaxError } from './errors.js';
import { type Field, type TypeDescriptor, isPrimitiveName } from './descriptors.js';

// ---- Tokenizer ----

export enum TokenType {
  NAME = 'NAME',
  LBRACKET = 'LBRACKET',
  RBRACKET = 'RBRACKET',
  LPAREN = 'LPAREN',
  RPAREN = 'RPAREN',
  LBRACE = 'LBRACE',
  RBRACE = 'RBRACE',
  COMMA = 'COMMA',
  DCOLON = 'DCOLON',
  EQ = 'EQ',
  EOF = 'EOF',
}

export interface Token {
  type: TokenType;
  value: string;
  line: number;
  column: number;
}

const SINGLES: Record<string, TokenType> = {
  '[': TokenType.LBRACKET,
  ']': TokenType.RBRACKET,
  '(': TokenType.LPAREN,
  ')': TokenType.RPAREN,
  '{': TokenType.LBRACE,
  '}': TokenType.RBRACE,
  ',': TokenType.COMMA,
  '=': TokenType.EQ,
};

function isNameStart(c: string): boolean {
  return (c >= 'a' && c <= 'z') || (c >= 'A' && c <= 'Z') || c === '_';
}

function isNameChar(c: string): boolean {
  return isNameStart(c) || (c >= '0' && c <= '9') || c === "'";
}

/** Tokenize one line of grammar text. Columns are 1-based. */
export function tokenize(input: string, line = 1): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < input.length) {
    const c = input[i];

    if (c === ' ' || c === '\t' || c === '\r') {
      i++;
      continue;
    }

    if (c === ':' && input[i + 1] === ':') {
      tokens.push({ type: TokenType.DCOLON, value: '::', line, column: i + 1 });
      i += 2;
      continue;
    }

    if (c in SINGLES) {
      tokens.push({ type: SINGLES[c], value: c, line, column: i + 1 });
      i++;
      continue;
    }

    if (isNameStart(c)) {
      let j = i + 1;
      while (j < input.length && isNameChar(input[j])) j++;
      tokens.push({ type: TokenType.NAME, value: input.slice(i, j), line, column: i + 1 });
      i = j;
      continue;
    }

    throw new GrammarSyntaxError(`Unexpected character '${c}'`, line, i + 1);
  }

  tokens.push({ type: TokenType.EOF, value: '', line, column: input.length + 1 });
  return tokens;
}

// ---- Declarations ----

export interface Production {
  name: string;
  fields: Field[];
  shape: 'record' | 'positional';
  line: number;
}

export interface DataDecl {
  kind: 'data';
  name: string;
  newtype: boolean;
  tagged: boolean;
  productions: Production[];
  line: number;
}

export interface AliasDecl {
  kind: 'alias';
  name: string;
  target: TypeDescriptor;
  line: number;
}

export type GrammarDecl = DataDecl | AliasDecl;

// ---- Parser ----

const CLOSERS: Partial<Record<TokenType, string>> = {
  [TokenType.RBRACKET]: ']',
  [TokenType.RPAREN]: ')',
  [TokenType.RBRACE]: '}',
};

class Parser {
  private tokens: Token[];
  private pos = 0;

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  private peek(): Token {
    return this.tokens[this.pos];
  }

  private advance(): Token {
    const t = this.tokens[this.pos];
    if (t.type !== TokenType.EOF) this.pos++;
    return t;
  }

  private fail(message: string, t: Token = this.peek()): never {
    throw new GrammarSyntaxError(message, t.line, t.column);
  }

  private expect(type: TokenType, opener?: Token): Token {
    const t = this.peek();
    if (t.type === type) return this.advance();
    if (t.type === TokenType.EOF && opener) {
      this.fail(`Unclosed '${opener.value}'`, opener);
    }
    this.fail(`Expected ${CLOSERS[type] ?? type} but got ${describeToken(t)}`);
  }

  private expectName(what: string): Token {
    const t = this.peek();
    if (t.type !== TokenType.NAME) this.fail(`Expected ${what} but got ${describeToken(t)}`);
    return this.advance();
  }

  private expectEnd(): void {
    const t = this.peek();
    if (t.type === TokenType.EOF) return;
    if (t.type in CLOSERS) this.fail(`Unexpected '${t.value}' without matching opener`);
    this.fail(`Unexpected ${describeToken(t)}`);
  }

  private atAtomStart(): boolean {
    const t = this.peek().type;
    return t === TokenType.NAME || t === TokenType.LBRACKET || t === TokenType.LPAREN;
  }

  /** type = "Map" atom atom | "Maybe" atom | atom */
  parseType(): TypeDescriptor {
    const t = this.peek();
    if (t.type === TokenType.NAME && t.value === 'Map') {
      this.advance();
      const key = this.parseAtom();
      const value = this.parseAtom();
      return { kind: 'map', key, value };
    }
    if (t.type === TokenType.NAME && t.value === 'Maybe') {
      this.advance();
      return { kind: 'option', item: this.parseAtom() };
    }
    const atom = this.parseAtom();
    if (atom.kind === 'ref' && this.atAtomStart()) {
      this.fail(`Type '${atom.name}' takes no arguments`);
    }
    return atom;
  }

  parseWholeType(): TypeDescriptor {
    const type = this.parseType();
    this.expectEnd();
    return type;
  }

  /** atom = NAME | "[" type "]" | "(" type { "," type } ")" */
  parseAtom(): TypeDescriptor {
    const t = this.peek();

    if (t.type === TokenType.LBRACKET) {
      this.advance();
      const item = this.parseType();
      this.expect(TokenType.RBRACKET, t);
      return { kind: 'list', item };
    }

    if (t.type === TokenType.LPAREN) {
      this.advance();
      const items = [this.parseType()];
      while (this.peek().type === TokenType.COMMA) {
        this.advance();
        items.push(this.parseType());
      }
      this.expect(TokenType.RPAREN, t);
      return items.length === 1 ? items[0] : { kind: 'tuple', items };
    }

    if (t.type === TokenType.NAME) {
      if (t.value === 'Map' || t.value === 'Maybe') {
        this.fail(`'${t.value}' needs its arguments in parentheses here`);
      }
      this.advance();
      return isPrimitiveName(t.value) ? { kind: 'primitive', name: t.value } : { kind: 'ref', name: t.value };
    }

    if (t.type in CLOSERS) this.fail(`Unexpected '${t.value}' without matching opener`);
    this.fail(`Expected a type but got ${describeToken(t)}`);
  }

  /** production = NAME { atom } | NAME "{" field { "," field } "}" */
  parseProduction(): Production {
    const first = this.peek();
    if (first.type !== TokenType.NAME) {
      this.fail(first.type === TokenType.EOF
        ? 'Empty production'
        : `Production must start with a constructor name, got ${describeToken(first)}`);
    }
    const name = this.advance().value;

    if (this.peek().type === TokenType.LBRACE) {
      const open = this.advance();
      const fields: Field[] = [this.parseRecordField()];
      while (this.peek().type === TokenType.COMMA) {
        this.advance();
        fields.push(this.parseRecordField());
      }
      this.expect(TokenType.RBRACE, open);
      this.expectEnd();
      return { name, fields, shape: 'record', line: first.line };
    }

    const fields: Field[] = [];
    while (this.atAtomStart()) {
      fields.push({ name: null, type: this.parseAtom() });
    }
    this.expectEnd();
    return { name, fields, shape: 'positional', line: first.line };
  }

  private parseRecordField(): Field {
    const name = this.expectName('a field name').value;
    this.expect(TokenType.DCOLON);
    return { name, type: this.parseType() };
  }

  /** header = ["tagged"] ("data" | "newtype") NAME */
  parseHeader(): Omit<DataDecl, 'productions'> {
    const first = this.peek();
    let tagged = false;
    if (first.value === 'tagged') {
      this.advance();
      tagged = true;
    }
    const keyword = this.expectName("'data' or 'newtype'");
    if (keyword.value !== 'data' && keyword.value !== 'newtype') {
      this.fail(`Expected 'data' or 'newtype' but got '${keyword.value}'`, keyword);
    }
    const name = this.expectName('a type name').value;
    this.expectEnd();
    return { kind: 'data', name, newtype: keyword.value === 'newtype', tagged, line: first.line };
  }

  /** alias = "type" NAME "=" type */
  parseAlias(): AliasDecl {
    const keyword = this.expectName("'type'");
    const name = this.expectName('a type name').value;
    this.expect(TokenType.EQ);
    const target = this.parseType();
    this.expectEnd();
    return { kind: 'alias', name, target, line: keyword.line };
  }
}

function describeToken(t: Token): string {
  return t.type === TokenType.EOF ? 'end of line' : `'${t.value}'`;
}

// ---- Entry points ----

export interface SourceLine {
  text: string;
  line: number;
  indented: boolean;
}

/** Non-blank lines with comments removed, numbered from `firstLine`. */
export function sourceLines(text: string, firstLine = 1): SourceLine[] {
  const lines: SourceLine[] = [];
  text.split('\n').forEach((raw, i) => {
    const comment = raw.indexOf('--');
    const body = (comment >= 0 ? raw.slice(0, comment) : raw).replace(/\s+$/, '');
    if (body.trim() === '') return;
    lines.push({ text: body, line: firstLine + i, indented: /^\s/.test(body) });
  });
  return lines;
}

/** Parse one production line: `Header Int Attr [Inline]`. */
export function parseProduction(text: string, line = 1): Production {
  return new Parser(tokenize(text, line)).parseProduction();
}

/** Parse a standalone type expression: `[(Text, Text)]`. */
export function parseTypeExpr(text: string, line = 1): TypeDescriptor {
  return new Parser(tokenize(text, line)).parseWholeType();
}

/** Parse a whole grammar file into declarations, in source order. */
export function parseGrammar(text: string): GrammarDecl[] {
  const decls: GrammarDecl[] = [];
  let current: DataDecl | null = null;

  for (const src of sourceLines(text)) {
    const parser = new Parser(tokenize(src.text, src.line));
    if (src.indented) {
      if (!current) {
        throw new GrammarSyntaxError('Production outside of a data declaration', src.line, 1);
      }
      current.productions.push(parser.parseProduction());
      continue;
    }

    closeData(current);
    const keyword = src.text.trim().split(/\s+/, 1)[0];
    if (keyword === 'type') {
      current = null;
      decls.push(parser.parseAlias());
    } else {
      current = { ...parser.parseHeader(), productions: [] };
      decls.push(current);
    }
  }
  closeData(current);
  return decls;
}

function closeData(decl: DataDecl | null): void {
  if (decl && decl.productions.length === 0) {
    throw new GrammarSyntaxError(`Type '${decl.name}' declares no constructors`, decl.line, 1);
  }
}
