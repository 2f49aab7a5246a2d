import type { Directive, InstructionBody, SectionOrigin, SourceLine } from './ast.js';
import { parseExpr } from './expr.js';
import type { SourceFile } from './source.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';

/**
 * Per-file parser state: the heading counter and comment-box tracking.
 *
 * `box` is `open` right after a rule line (`;-----`), `titled` once the box has its heading text.
 * `boxRule` is the line number of the rule that opened the current box.
 */
export interface ParserState {
  sectionCount: number;
  origin?: SectionOrigin;
  box: 'none' | 'open' | 'titled';
  boxRule?: number;
}

export function initialParserState(): ParserState {
  return { sectionCount: 0, box: 'none' };
}

const IDENT_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;
const LABEL_RE = /^\.?[A-Za-z_][A-Za-z0-9_.]*$/;
const MNEMONIC_RE = /^[A-Za-z]+(\.[A-Za-z])?$/;
const RULE_RE = /^[-=*#~_]{3,}$/;
const BANNER_RE = /^[-=*#~]{3,}\s*(\S.*?)\s*[-=*#~]{3,}$/;

function diag(
  diagnostics: Diagnostic[],
  file: string,
  line: number,
  message: string,
): void {
  diagnostics.push({ id: DiagnosticIds.MalformedLine, severity: 'error', message, file, line });
}

/**
 * Split a line into code and comment text. `;` inside quotes does not start a comment;
 * `*` in column 0 makes the whole line a comment.
 */
export function splitComment(raw: string): { code: string; comment?: string } {
  if (raw.startsWith('*')) {
    return { code: '', comment: raw.slice(1).trim() };
  }
  let quote: string | undefined;
  for (let i = 0; i < raw.length; i++) {
    const ch = raw.charAt(i);
    if (quote) {
      if (ch === quote) quote = undefined;
      continue;
    }
    if (ch === "'" || ch === '"') {
      quote = ch;
      continue;
    }
    if (ch === ';') {
      return { code: raw.slice(0, i), comment: raw.slice(i + 1).trim() };
    }
  }
  return { code: raw };
}

/**
 * Extract an explicit cycle override: the leading integer of the comment's first parenthesized group.
 *
 * `(20)`, `( 4)` and `(12 cycles)` are overrides; `(abc)` or `(12abc)` are plain comment text.
 */
export function parseOverride(comment: string | undefined): number | undefined {
  if (comment === undefined) return undefined;
  const group = /\(([^()]*)\)/.exec(comment);
  if (!group) return undefined;
  const lead = /^\s*([0-9]+)(?=\s|$)/.exec(group[1] ?? '');
  if (!lead) return undefined;
  return Number.parseInt(lead[1] ?? '', 10);
}

type Heading = { kind: 'title'; title: string } | { kind: 'rule' };

function heading(comment: string, lineNo: number, state: ParserState): Heading | undefined {
  const text = comment.trim();
  if (RULE_RE.test(text)) {
    if (state.box === 'titled') {
      state.box = 'none';
      return { kind: 'rule' };
    }
    state.box = 'open';
    state.boxRule = lineNo;
    return undefined;
  }
  const banner = BANNER_RE.exec(text);
  if (banner) {
    state.box = 'none';
    return { kind: 'title', title: banner[1] ?? '' };
  }
  if (state.box === 'open' && text.length > 0) {
    state.box = 'titled';
    return { kind: 'title', title: text };
  }
  return undefined;
}

function splitFirstToken(text: string): { token: string; rest: string } | undefined {
  const m = /^\s*(\S+)\s*(.*)$/.exec(text);
  if (!m) return undefined;
  return { token: m[1] ?? '', rest: (m[2] ?? '').trim() };
}

function parseInstruction(text: string): InstructionBody | undefined {
  const head = splitFirstToken(text);
  if (!head) return undefined;
  return { mnemonic: head.token, operands: head.rest };
}

/**
 * Parse a `REPT`/`ENDR`/`SET`/`EQU` directive whose keyword is `keyword` and whose arguments are `args`.
 *
 * Returns `null` when the keyword is not a directive, `undefined` after reporting a malformed directive.
 */
function parseDirective(
  keyword: string,
  name: string | undefined,
  args: string,
  at: { file: string; line: number },
  diagnostics: Diagnostic[],
): Directive | null | undefined {
  switch (keyword.toLowerCase()) {
    case 'rept': {
      if (args.length === 0) {
        diag(diagnostics, at.file, at.line, 'REPT expects a count expression');
        return undefined;
      }
      const count = parseExpr(args);
      if (!count) {
        diag(diagnostics, at.file, at.line, `REPT count is not an integer expression: ${args}`);
        return undefined;
      }
      return { kind: 'Rept', count, countText: args };
    }
    case 'endr':
      if (args.length > 0) {
        diag(diagnostics, at.file, at.line, `ENDR takes no arguments (got "${args}")`);
        return undefined;
      }
      return { kind: 'Endr' };
    case 'set': {
      if (name === undefined || !IDENT_RE.test(name)) {
        diag(diagnostics, at.file, at.line, `SET requires a variable name (got "${name ?? ''}")`);
        return undefined;
      }
      const expr = parseExpr(args);
      if (!expr) {
        diag(
          diagnostics,
          at.file,
          at.line,
          `SET expression for "${name}" is not an integer expression: ${args}`,
        );
        return undefined;
      }
      return { kind: 'Set', name, expr };
    }
    case 'equ':
      if (name === undefined) {
        diag(diagnostics, at.file, at.line, 'EQU requires a symbol name');
        return undefined;
      }
      return { kind: 'Equate', name };
    default:
      return null;
  }
}

/**
 * Parse one physical line into a {@link SourceLine}.
 *
 * Returns `undefined` (after appending a `MalformedLine` diagnostic) when a directive is recognized
 * but its arguments are invalid. Updates `state` when the line is part of a section heading.
 */
export function parseLine(
  file: string,
  lineNo: number,
  raw: string,
  state: ParserState,
  diagnostics: Diagnostic[],
): SourceLine | undefined {
  const { code, comment } = splitComment(raw);
  const at = { file, line: lineNo };
  const base = (): SourceLine => ({
    file,
    line: lineNo,
    raw,
    ...(comment !== undefined && comment.length > 0 ? { comment } : {}),
    ...(state.origin ? { origin: state.origin } : {}),
  });

  if (code.trim().length === 0) {
    if (comment === undefined) {
      state.box = 'none';
      return base();
    }
    const found = heading(comment, lineNo, state);
    if (found === undefined) return base();
    if (found.kind === 'rule') return { ...base(), directive: { kind: 'HeadingRule' } };
    state.sectionCount++;
    state.origin = { index: state.sectionCount, title: found.title };
    return { ...base(), directive: { kind: 'Section', title: found.title } };
  }

  state.box = 'none';
  const override = parseOverride(comment);
  const withOverride = (line: SourceLine): SourceLine =>
    override === undefined ? line : { ...line, override };

  const first = splitFirstToken(code);
  if (!first) return base();

  // REPT/ENDR are recognized in any column.
  const leading = parseDirective(first.token, undefined, first.rest, at, diagnostics);
  if (leading === undefined) return undefined;
  if (leading !== null && (leading.kind === 'Rept' || leading.kind === 'Endr')) {
    return { ...base(), directive: leading };
  }

  const atColumnZero = !/^\s/.test(code);
  const endsWithColon = first.token.endsWith(':');
  const name = endsWithColon ? first.token.slice(0, -1) : first.token;
  const second = splitFirstToken(first.rest);

  // `name SET expr` / `name EQU expr`, with or without the colon and in any column.
  if (second) {
    const keyword = second.token.toLowerCase();
    if (keyword === 'set' || keyword === 'equ') {
      const directive = parseDirective(keyword, name, second.rest, at, diagnostics);
      if (directive === undefined) return undefined;
      if (directive !== null) return { ...base(), directive };
    }
  }

  // Unindented `move.w d0,d1`: the text after the first token cannot start an instruction.
  const unindentedInstruction =
    !endsWithColon && second !== undefined && !MNEMONIC_RE.test(second.token);

  if ((atColumnZero || endsWithColon) && LABEL_RE.test(name) && !unindentedInstruction) {
    const labelled: SourceLine = { ...base(), label: name };
    if (first.rest.length === 0) return labelled;
    const nested = splitFirstToken(first.rest);
    if (nested) {
      const directive = parseDirective(nested.token, undefined, nested.rest, at, diagnostics);
      if (directive === undefined) return undefined;
      if (directive !== null && (directive.kind === 'Rept' || directive.kind === 'Endr')) {
        return { ...labelled, directive };
      }
    }
    const instruction = parseInstruction(first.rest);
    return withOverride(instruction ? { ...labelled, instruction } : labelled);
  }

  const instruction = parseInstruction(code);
  return withOverride(instruction ? { ...base(), instruction } : base());
}

/**
 * Parse every line of a source file, stopping at the first malformed line.
 */
export function parseSource(file: SourceFile, diagnostics: Diagnostic[]): SourceLine[] | undefined {
  const state = initialParserState();
  const out: SourceLine[] = [];
  for (let i = 0; i < file.lines.length; i++) {
    const parsed = parseLine(file.path, i + 1, file.lines[i] ?? '', state, diagnostics);
    if (!parsed) return undefined;
    // A boxed title makes the rule above it part of the heading.
    if (parsed.directive?.kind === 'Section' && state.box === 'titled' && state.boxRule !== undefined) {
      const opening = out[state.boxRule - 1];
      if (opening) out[state.boxRule - 1] = { ...opening, directive: { kind: 'HeadingRule' } };
    }
    out.push(parsed);
  }
  return out;
}
