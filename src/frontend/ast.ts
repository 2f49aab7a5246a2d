/**
 * Frontend contracts for line-oriented 68000 source.
 *
 * This module defines types only; parsing lives in `parser.ts` and `expr.ts`.
 */

/**
 * Integer expression used by `REPT` counts and `SET` assignments.
 */
export type ExprNode =
  | { kind: 'ExprLiteral'; value: number }
  | { kind: 'ExprName'; name: string }
  | { kind: 'ExprUnary'; op: '+' | '-'; expr: ExprNode }
  | { kind: 'ExprBinary'; op: ExprBinaryOp; left: ExprNode; right: ExprNode };

export type ExprBinaryOp = '+' | '-' | '*' | '/';

/**
 * Section heading a line belongs to (the last boxed or banner comment heading seen above it).
 */
export interface SectionOrigin {
  /** 1-based heading ordinal within the file. */
  index: number;
  title: string;
}

/**
 * Directive recognized on a source line.
 */
export type Directive =
  | { kind: 'Rept'; count: ExprNode; countText: string }
  | { kind: 'Endr' }
  | { kind: 'Set'; name: string; expr: ExprNode }
  | { kind: 'Section'; title: string }
  | { kind: 'HeadingRule' }
  | { kind: 'Equate'; name: string };

/**
 * Mnemonic plus raw operand text (`operands` is empty for operand-less instructions).
 */
export interface InstructionBody {
  mnemonic: string;
  operands: string;
}

/**
 * One physical input line, as produced by the line parser. Never mutated afterwards.
 */
export interface SourceLine {
  file: string;
  /** 1-based line number. */
  line: number;
  raw: string;
  label?: string;
  directive?: Directive;
  instruction?: InstructionBody;
  /** Trailing comment without the leading `;` (or `*`), trimmed. */
  comment?: string;
  /** Cycle count taken from the first parenthesized group of the comment. */
  override?: number;
  origin?: SectionOrigin;
}
