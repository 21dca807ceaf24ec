import { ParseError } from '../errors.js';
import { classifyIdentifier } from './identifiers.js';
import type { IdentifierClass, IdentifierRole } from './identifiers.js';

export interface LicenseNode {
  kind: 'license';
  id: string;
  orLater: boolean;
}

export interface AndNode {
  kind: 'and';
  left: LicenseExpression;
  right: LicenseExpression;
}

export interface OrNode {
  kind: 'or';
  left: LicenseExpression;
  right: LicenseExpression;
}

export interface WithNode {
  kind: 'with';
  license: LicenseExpression;
  exception: string;
}

export type LicenseExpression = LicenseNode | AndNode | OrNode | WithNode;

export interface ExpressionSymbol {
  id: string;
  role: IdentifierRole;
}

export interface ClassifiedSymbol extends ExpressionSymbol {
  class: IdentifierClass;
}

/** Deepest parenthesis nesting accepted by the parser. */
export const MAX_NESTING_DEPTH = 64;

type TokenType = 'lparen' | 'rparen' | 'and' | 'or' | 'with' | 'id';

interface Token {
  type: TokenType;
  value: string;
  position: number;
}

const OPERATORS: Record<string, TokenType> = {
  AND: 'and',
  and: 'and',
  OR: 'or',
  or: 'or',
  WITH: 'with',
  with: 'with',
};

const IDENTIFIER = /[A-Za-z0-9.:-]+\+?/y;

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < text.length) {
    const char = text[i];

    if (/\s/.test(char)) {
      i++;
      continue;
    }

    if (char === '(' || char === ')') {
      tokens.push({ type: char === '(' ? 'lparen' : 'rparen', value: char, position: i });
      i++;
      continue;
    }

    IDENTIFIER.lastIndex = i;
    const match = IDENTIFIER.exec(text);
    if (!match) {
      throw new ParseError(`Unexpected character '${char}'`, text, char, i);
    }

    const value = match[0];
    tokens.push({ type: OPERATORS[value] ?? 'id', value, position: i });
    i += value.length;
  }

  return tokens;
}

class ExpressionParser {
  private index = 0;

  constructor(private readonly text: string, private readonly tokens: Token[]) {}

  parse(): LicenseExpression {
    if (this.tokens.length === 0) {
      throw new ParseError('Empty license expression', this.text, '', 0);
    }

    const expression = this.parseOr(0);
    const trailing = this.peek();
    if (trailing) {
      throw this.unexpected(trailing);
    }
    return expression;
  }

  private parseOr(depth: number): LicenseExpression {
    let left = this.parseAnd(depth);
    while (this.peek()?.type === 'or') {
      this.index++;
      left = { kind: 'or', left, right: this.parseAnd(depth) };
    }
    return left;
  }

  private parseAnd(depth: number): LicenseExpression {
    let left = this.parseWith(depth);
    while (this.peek()?.type === 'and') {
      this.index++;
      left = { kind: 'and', left, right: this.parseWith(depth) };
    }
    return left;
  }

  private parseWith(depth: number): LicenseExpression {
    const license = this.parseAtom(depth);
    if (this.peek()?.type !== 'with') {
      return license;
    }

    const withToken = this.next();
    const exception = this.peek();
    if (!exception || exception.type !== 'id') {
      throw exception
        ? this.unexpected(exception)
        : new ParseError(`Missing exception after '${withToken.value}'`, this.text, withToken.value, withToken.position);
    }
    if (exception.value.endsWith('+')) {
      throw new ParseError(`Exception '${exception.value}' cannot take '+'`, this.text, exception.value, exception.position);
    }
    this.index++;
    return { kind: 'with', license, exception: exception.value };
  }

  private parseAtom(depth: number): LicenseExpression {
    const token = this.peek();
    if (!token) {
      const last = this.tokens[this.tokens.length - 1];
      throw new ParseError('Unexpected end of license expression', this.text, last.value, last.position);
    }

    if (token.type === 'id') {
      this.index++;
      const orLater = token.value.endsWith('+');
      const id = orLater ? token.value.slice(0, -1) : token.value;
      if (id.length === 0) {
        throw this.unexpected(token);
      }
      return { kind: 'license', id, orLater };
    }

    if (token.type === 'lparen') {
      if (depth + 1 > MAX_NESTING_DEPTH) {
        throw new ParseError(
          `License expression nests deeper than ${MAX_NESTING_DEPTH} levels`,
          this.text,
          token.value,
          token.position,
        );
      }
      this.index++;
      const inner = this.parseOr(depth + 1);
      const closing = this.peek();
      if (!closing || closing.type !== 'rparen') {
        throw new ParseError('Unclosed parenthesis', this.text, token.value, token.position);
      }
      this.index++;
      return inner;
    }

    throw this.unexpected(token);
  }

  private peek(): Token | undefined {
    return this.tokens[this.index];
  }

  private next(): Token {
    const token = this.tokens[this.index];
    this.index++;
    return token;
  }

  private unexpected(token: Token): ParseError {
    return new ParseError(`Unexpected '${token.value}'`, this.text, token.value, token.position);
  }
}

export function parseExpression(text: string): LicenseExpression {
  return new ExpressionParser(text, tokenize(text)).parse();
}

/**
 * Renders a canonical form of the expression. Parentheses are emitted only
 * where needed for the text to parse back into the same tree.
 */
export function renderExpression(expression: LicenseExpression): string {
  switch (expression.kind) {
    case 'license':
      return expression.orLater ? `${expression.id}+` : expression.id;
    case 'with': {
      const license = expression.license.kind === 'license'
        ? renderExpression(expression.license)
        : `(${renderExpression(expression.license)})`;
      return `${license} WITH ${expression.exception}`;
    }
    case 'and': {
      const left = expression.left.kind === 'or'
        ? `(${renderExpression(expression.left)})`
        : renderExpression(expression.left);
      const right = expression.right.kind === 'or' || expression.right.kind === 'and'
        ? `(${renderExpression(expression.right)})`
        : renderExpression(expression.right);
      return `${left} AND ${right}`;
    }
    case 'or': {
      const right = expression.right.kind === 'or'
        ? `(${renderExpression(expression.right)})`
        : renderExpression(expression.right);
      return `${renderExpression(expression.left)} OR ${right}`;
    }
  }
}

export function expressionsEqual(a: LicenseExpression, b: LicenseExpression): boolean {
  const stack: Array<[LicenseExpression, LicenseExpression]> = [[a, b]];

  while (stack.length > 0) {
    const pair = stack.pop();
    if (!pair) break;
    const [x, y] = pair;

    if (x.kind === 'license' && y.kind === 'license') {
      if (x.id !== y.id || x.orLater !== y.orLater) return false;
    } else if (x.kind === 'with' && y.kind === 'with') {
      if (x.exception !== y.exception) return false;
      stack.push([x.license, y.license]);
    } else if ((x.kind === 'and' && y.kind === 'and') || (x.kind === 'or' && y.kind === 'or')) {
      stack.push([x.left, y.left], [x.right, y.right]);
    } else {
      return false;
    }
  }

  return true;
}

/**
 * License and exception ids used by the expression, left to right, without
 * duplicates. A trailing `+` is not part of the id.
 */
export function expressionSymbols(expression: LicenseExpression): ExpressionSymbol[] {
  const symbols: ExpressionSymbol[] = [];
  const seen = new Set<string>();
  const stack: Array<LicenseExpression | ExpressionSymbol> = [expression];

  while (stack.length > 0) {
    const item = stack.pop();
    if (!item) break;

    if ('role' in item) {
      const key = `${item.role}:${item.id}`;
      if (!seen.has(key)) {
        seen.add(key);
        symbols.push(item);
      }
      continue;
    }

    switch (item.kind) {
      case 'license':
        stack.push({ id: item.id, role: 'license' });
        break;
      case 'with':
        stack.push({ id: item.exception, role: 'exception' }, item.license);
        break;
      case 'and':
      case 'or':
        stack.push(item.right, item.left);
        break;
    }
  }

  return symbols;
}

export function validateExpression(expression: LicenseExpression): ClassifiedSymbol[] {
  return expressionSymbols(expression).map(symbol => ({
    ...symbol,
    class: classifyIdentifier(symbol.id, symbol.role),
  }));
}

export function containsExpression(list: readonly LicenseExpression[], expression: LicenseExpression): boolean {
  return list.some(item => expressionsEqual(item, expression));
}
