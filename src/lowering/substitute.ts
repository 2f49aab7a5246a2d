const IDENT_START_RE = /[A-Za-z_]/;
const IDENT_RE = /^[A-Za-z_][A-Za-z0-9_]*/;
const HEX_RE = /^\$[0-9A-Fa-f]+/;
const BIN_RE = /^%[01]+/;
const DECIMAL_RE = /^[0-9][0-9A-Za-z_]*/;

function lastSignificant(out: string): string {
  const trimmed = out.trimEnd();
  return trimmed.charAt(trimmed.length - 1);
}

/**
 * Replace every bare identifier in operand text that names a variable in `scope` with the variable's
 * current value as a decimal literal.
 *
 * Numeric literals, quoted strings and identifiers directly after `.` (size suffixes such as `.w`,
 * local labels such as `.loop`) are copied unchanged. A negative value that follows an arithmetic
 * operator is parenthesized so `x-step` with `step = -8` becomes `x-(-8)`.
 */
export function substituteVariables(operands: string, scope: ReadonlyMap<string, number>): string {
  if (scope.size === 0) return operands;
  let out = '';
  let i = 0;
  while (i < operands.length) {
    const ch = operands.charAt(i);
    if (ch === "'" || ch === '"') {
      const close = operands.indexOf(ch, i + 1);
      const end = close < 0 ? operands.length : close + 1;
      out += operands.slice(i, end);
      i = end;
      continue;
    }
    const rest = operands.slice(i);
    const literal = HEX_RE.exec(rest) ?? BIN_RE.exec(rest) ?? DECIMAL_RE.exec(rest);
    if (literal) {
      out += literal[0];
      i += literal[0].length;
      continue;
    }
    if (IDENT_START_RE.test(ch)) {
      const ident = IDENT_RE.exec(rest)?.[0] ?? ch;
      const value = out.endsWith('.') ? undefined : scope.get(ident);
      if (value === undefined) {
        out += ident;
      } else if (value < 0 && '+-*/'.includes(lastSignificant(out)) && out.trim().length > 0) {
        out += `(${value})`;
      } else {
        out += String(value);
      }
      i += ident.length;
      continue;
    }
    out += ch;
    i++;
  }
  return out;
}
