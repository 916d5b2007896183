import { InvalidVisibilityError } from './errors';
import type { Authorizations } from './types';

/**
 * Parsed visibility expression
 */
export type VisibilityNode =
  | { kind: 'label'; label: string }
  | { kind: 'and'; children: VisibilityNode[] }
  | { kind: 'or'; children: VisibilityNode[] };

const LABEL_CHAR = /[A-Za-z0-9_\-.:/]/;

class Parser {
  private pos = 0;

  constructor(private readonly expression: string) {}

  parse(): VisibilityNode {
    const node = this.parseGroup();
    if (this.pos < this.expression.length) {
      this.fail(`unexpected '${this.expression[this.pos]}' at ${this.pos}`);
    }
    return node;
  }

  private parseGroup(): VisibilityNode {
    const children: VisibilityNode[] = [this.parseTerm()];
    let operator: '&' | '|' | undefined;

    while (this.pos < this.expression.length) {
      const ch = this.expression[this.pos];
      if (ch !== '&' && ch !== '|') {
        break;
      }
      if (operator && operator !== ch) {
        this.fail(`cannot mix '&' and '|' without parentheses at ${this.pos}`);
      }
      operator = ch;
      this.pos++;
      children.push(this.parseTerm());
    }

    if (!operator) {
      return children[0];
    }
    return { kind: operator === '&' ? 'and' : 'or', children };
  }

  private parseTerm(): VisibilityNode {
    if (this.expression[this.pos] === '(') {
      this.pos++;
      const node = this.parseGroup();
      if (this.expression[this.pos] !== ')') {
        this.fail(`missing ')' at ${this.pos}`);
      }
      this.pos++;
      return node;
    }

    const start = this.pos;
    while (this.pos < this.expression.length && LABEL_CHAR.test(this.expression[this.pos])) {
      this.pos++;
    }
    if (start === this.pos) {
      this.fail(`expected a label at ${this.pos}`);
    }
    return { kind: 'label', label: this.expression.slice(start, this.pos) };
  }

  private fail(reason: string): never {
    throw new InvalidVisibilityError(this.expression, reason);
  }
}

/**
 * Parse a visibility expression such as `foo`, `foo&bar` or `(a|b)&c`.
 * Returns undefined for the empty expression, which everyone can see.
 */
export function parseVisibility(expression: string): VisibilityNode | undefined {
  if (expression === '') {
    return undefined;
  }
  return new Parser(expression).parse();
}

function evaluate(node: VisibilityNode, auths: Authorizations): boolean {
  switch (node.kind) {
    case 'label':
      return auths.contains(node.label);
    case 'and':
      return node.children.every((child) => evaluate(child, auths));
    case 'or':
      return node.children.some((child) => evaluate(child, auths));
  }
}

export function isVisible(expression: string, auths: Authorizations): boolean {
  const node = parseVisibility(expression);
  return node === undefined || evaluate(node, auths);
}
