import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { ExprNode, SourceLine } from '../frontend/ast.js';
import type { EvalSite, VariableScope } from '../semantics/env.js';
import { evalExpr, snapshotScope } from '../semantics/env.js';
import { substituteVariables } from './substitute.js';
import type { ExpandedLine } from './types.js';

/**
 * Captured repeat structure: plain lines, and `REPT` blocks holding their raw body.
 */
type BlockItem =
  | { kind: 'line'; line: SourceLine }
  | { kind: 'rept'; line: SourceLine; count: ExprNode; countText: string; body: BlockItem[] };

/**
 * An active repeat activation. `scope` belongs to this frame alone.
 */
interface ReptFrame {
  line: number;
  countText: string;
  count: number;
  pass: number;
  scope: VariableScope;
}

function describeFrame(frame: ReptFrame): string {
  return `REPT ${frame.countText} @ line ${frame.line} (pass ${frame.pass}/${frame.count})`;
}

function unbalanced(
  diagnostics: Diagnostic[],
  line: SourceLine,
  message: string,
  reptPath: string[],
): void {
  diagnostics.push({
    id: DiagnosticIds.UnbalancedRept,
    severity: 'error',
    message,
    file: line.file,
    line: line.line,
    ...(reptPath.length > 0 ? { reptPath } : {}),
  });
}

/**
 * The label of a `REPT`/`ENDR` line as a plain line, so it is emitted once at that position.
 */
function labelOf(line: SourceLine): BlockItem | undefined {
  if (line.label === undefined) return undefined;
  const { directive: _directive, ...rest } = line;
  return { kind: 'line', line: rest };
}

/**
 * Match `REPT`/`ENDR` pairs into a block tree.
 */
function captureBlocks(lines: SourceLine[], diagnostics: Diagnostic[]): BlockItem[] | undefined {
  const root: BlockItem[] = [];
  const open: Array<{ line: SourceLine; count: ExprNode; countText: string; body: BlockItem[] }> =
    [];
  const current = (): BlockItem[] => open[open.length - 1]?.body ?? root;
  const openPath = (): string[] =>
    open.map((o) => `REPT ${o.countText} @ line ${o.line.line}`);

  for (const line of lines) {
    const d = line.directive;
    const label = labelOf(line);
    if (d?.kind === 'Rept') {
      if (label) current().push(label);
      open.push({ line, count: d.count, countText: d.countText, body: [] });
      continue;
    }
    if (d?.kind === 'Endr') {
      const block = open.pop();
      if (!block) {
        unbalanced(diagnostics, line, 'ENDR without matching REPT.', []);
        return undefined;
      }
      current().push({ kind: 'rept', ...block });
      if (label) current().push(label);
      continue;
    }
    current().push({ kind: 'line', line });
  }

  const unclosed = open[open.length - 1];
  if (unclosed) {
    unbalanced(
      diagnostics,
      unclosed.line,
      `REPT at line ${unclosed.line.line} is never closed by ENDR.`,
      openPath(),
    );
    return undefined;
  }
  return root;
}

function siteOf(line: SourceLine, frames: ReptFrame[]): EvalSite {
  return { file: line.file, line: line.line, reptPath: frames.map(describeFrame) };
}

function emitLine(line: SourceLine, scope: VariableScope, frames: ReptFrame[]): ExpandedLine | undefined {
  const base = {
    file: line.file,
    line: line.line,
    ...(line.label !== undefined ? { label: line.label } : {}),
    ...(line.comment !== undefined ? { comment: line.comment } : {}),
    ...(line.origin ? { origin: line.origin } : {}),
    reptPath: frames.map(describeFrame),
  };
  if (line.directive?.kind === 'Equate') {
    return { ...base, kind: 'passthrough', text: line.raw.trim() };
  }
  if (line.instruction) {
    return {
      ...base,
      kind: 'instruction',
      instruction: {
        mnemonic: line.instruction.mnemonic,
        operands: substituteVariables(line.instruction.operands, scope),
      },
      ...(line.override !== undefined ? { override: line.override } : {}),
    };
  }
  if (line.label !== undefined) return { ...base, kind: 'label' };
  if (line.comment !== undefined) return { ...base, kind: 'comment' };
  return undefined;
}

function replay(
  items: BlockItem[],
  frames: ReptFrame[],
  scope: VariableScope,
  out: ExpandedLine[],
  diagnostics: Diagnostic[],
): boolean {
  for (const item of items) {
    if (item.kind === 'rept') {
      const count = evalExpr(item.count, scope, siteOf(item.line, frames), diagnostics);
      if (count === undefined) return false;
      if (count < 0) {
        diagnostics.push({
          id: DiagnosticIds.MalformedLine,
          severity: 'error',
          message: `REPT count must not be negative (got ${count}).`,
          file: item.line.file,
          line: item.line.line,
          ...(frames.length > 0 ? { reptPath: frames.map(describeFrame) } : {}),
        });
        return false;
      }
      const frame: ReptFrame = {
        line: item.line.line,
        countText: item.countText,
        count,
        pass: 0,
        scope: snapshotScope(scope),
      };
      const nested = [...frames, frame];
      for (let pass = 1; pass <= count; pass++) {
        frame.pass = pass;
        if (!replay(item.body, nested, frame.scope, out, diagnostics)) return false;
      }
      continue;
    }

    const line = item.line;
    const d = line.directive;
    if (d?.kind === 'Set') {
      const value = evalExpr(d.expr, scope, siteOf(line, frames), diagnostics);
      if (value === undefined) return false;
      scope.set(d.name, value);
      continue;
    }
    if (d?.kind === 'Section' || d?.kind === 'HeadingRule') continue;

    const emitted = emitLine(line, scope, frames);
    if (emitted) out.push(emitted);
  }
  return true;
}

/**
 * Unroll `REPT` blocks and apply `SET` variables, producing the flat, directive-free line stream.
 *
 * Top-level `SET`s live in a root scope. Entering a `REPT` evaluates its count in the enclosing scope
 * and gives the new frame a snapshot of that scope; `SET`s in the body update the frame's copy and
 * persist across its passes but never reach the enclosing frame. Blank lines, directive lines and
 * section heading lines (titles and the rules boxing them) are dropped.
 */
export function expandLines(
  lines: SourceLine[],
  diagnostics: Diagnostic[],
): ExpandedLine[] | undefined {
  const blocks = captureBlocks(lines, diagnostics);
  if (!blocks) return undefined;
  const out: ExpandedLine[] = [];
  const root: VariableScope = new Map<string, number>();
  if (!replay(blocks, [], root, out, diagnostics)) return undefined;
  return out;
}
