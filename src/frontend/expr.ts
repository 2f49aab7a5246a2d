import type { ExprBinaryOp, ExprNode } from './ast.js';

type ExprToken =
  | { kind: 'num'; text: string }
  | { kind: 'ident'; text: string }
  | { kind: 'op'; text: string }
  | { kind: 'lparen' }
  | { kind: 'rparen' };

const IDENT_RE = /^[A-Za-z_][A-Za-z0-9_]*/;
const NUMBER_RE = /^(\$[0-9A-Fa-f]+|%[01]+|[0-9]+)/;

/**
 * Parse a numeric literal: decimal, `$hex` or `%binary`.
 */
export function parseNumberLiteral(text: string): number | undefined {
  const t = text.trim();
  if (/^\$[0-9A-Fa-f]+$/.test(t)) {
    return Number.parseInt(t.slice(1), 16);
  }
  if (/^%[01]+$/.test(t)) {
    return Number.parseInt(t.slice(1), 2);
  }
  if (/^[0-9]+$/.test(t)) {
    return Number.parseInt(t, 10);
  }
  return undefined;
}

function tokenizeExpr(text: string): ExprToken[] | undefined {
  const out: ExprToken[] = [];
  let i = 0;
  const s = text.trim();
  while (i < s.length) {
    const ch = s.charAt(i);
    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    if (ch === '(') {
      out.push({ kind: 'lparen' });
      i++;
      continue;
    }
    if (ch === ')') {
      out.push({ kind: 'rparen' });
      i++;
      continue;
    }
    const num = NUMBER_RE.exec(s.slice(i));
    if (num) {
      out.push({ kind: 'num', text: num[0] });
      i += num[0].length;
      continue;
    }
    if ('+-*/'.includes(ch)) {
      out.push({ kind: 'op', text: ch });
      i++;
      continue;
    }
    const ident = IDENT_RE.exec(s.slice(i));
    if (ident) {
      out.push({ kind: 'ident', text: ident[0] });
      i += ident[0].length;
      continue;
    }
    return undefined;
  }
  return out;
}

function isBinaryOp(op: string): op is ExprBinaryOp {
  return op === '+' || op === '-' || op === '*' || op === '/';
}

function precedence(op: ExprBinaryOp): number {
  return op === '*' || op === '/' ? 2 : 1;
}

/**
 * Parse an integer expression (`+ - * /`, parentheses, unary sign, literals and names).
 *
 * Returns `undefined` when the text is not a complete, well-formed expression.
 */
export function parseExpr(text: string): ExprNode | undefined {
  const tokenized = tokenizeExpr(text);
  if (!tokenized || tokenized.length === 0) return undefined;

  const tokens = tokenized;
  let idx = 0;

  function parseBinary(minPrec: number): ExprNode | undefined {
    let left = parsePrimary();
    if (!left) return undefined;
    while (true) {
      const t = tokens[idx];
      if (!t || t.kind !== 'op' || !isBinaryOp(t.text)) break;
      const op = t.text;
      const prec = precedence(op);
      if (prec < minPrec) break;
      idx++;
      const right = parseBinary(prec + 1);
      if (!right) return undefined;
      left = { kind: 'ExprBinary', op, left, right };
    }
    return left;
  }

  function parsePrimary(): ExprNode | undefined {
    const t = tokens[idx];
    if (!t) return undefined;
    if (t.kind === 'num') {
      idx++;
      const value = parseNumberLiteral(t.text);
      if (value === undefined) return undefined;
      return { kind: 'ExprLiteral', value };
    }
    if (t.kind === 'ident') {
      idx++;
      return { kind: 'ExprName', name: t.text };
    }
    if (t.kind === 'op' && (t.text === '+' || t.text === '-')) {
      const op = t.text;
      idx++;
      const inner = parsePrimary();
      if (!inner) return undefined;
      return { kind: 'ExprUnary', op, expr: inner };
    }
    if (t.kind === 'lparen') {
      idx++;
      const inner = parseBinary(1);
      if (!inner) return undefined;
      if (tokens[idx]?.kind !== 'rparen') return undefined;
      idx++;
      return inner;
    }
    return undefined;
  }

  const root = parseBinary(1);
  if (!root || idx !== tokens.length) return undefined;
  return root;
}
