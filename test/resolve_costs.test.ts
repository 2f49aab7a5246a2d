import { describe, expect, it } from 'vitest';

import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import { parseSource } from '../src/frontend/parser.js';
import { makeSourceFile } from '../src/frontend/source.js';
import { expandLines } from '../src/lowering/expand.js';
import type { ResolveOptions } from '../src/lowering/resolve.js';
import { parseOverrideTable, resolveCosts } from '../src/lowering/resolve.js';
import type { CostedLine } from '../src/lowering/types.js';
import type { CostTable } from '../src/m68k/costTable.js';
import { loadDefaultCostTable, parseCostTable } from '../src/m68k/costTable.js';

function defaultTable(): CostTable {
  const diagnostics: Diagnostic[] = [];
  const table = loadDefaultCostTable(diagnostics);
  expect(diagnostics).toEqual([]);
  if (!table) throw new Error('default cost table did not load');
  return table;
}

const table = defaultTable();

function resolveText(
  lines: string[],
  options: ResolveOptions = {},
): { out: CostedLine[] | undefined; diagnostics: Diagnostic[] } {
  const diagnostics: Diagnostic[] = [];
  const parsed = parseSource(makeSourceFile('t.s', lines.join('\n')), diagnostics);
  const expanded = parsed ? expandLines(parsed, diagnostics) : undefined;
  const out = expanded ? resolveCosts(expanded, table, options, diagnostics) : undefined;
  return { out, diagnostics };
}

function costOf(line: string, options: ResolveOptions = {}): Pick<CostedLine, 'cycles' | 'costSource' | 'description'> | undefined {
  const { out } = resolveText([line], options);
  const first = out?.[0];
  return first ? { cycles: first.cycles, costSource: first.costSource, description: first.description } : undefined;
}

describe('cost table', () => {
  it('loads the bundled 68000 table with a 4-cycle nop', () => {
    expect(table.nopCycles).toBe(4);
    expect(table.rules.get('movem.l reglist,-(an)')).toEqual({
      kind: 'registerList',
      base: 8,
      perRegister: 8,
    });
    expect(table.rules.get('bne.b xxx.l')).toEqual({ kind: 'branch', taken: 10, notTaken: 8 });
  });

  it('rejects tables without a nop or with unknown rule shapes', () => {
    const diagnostics: Diagnostic[] = [];
    expect(parseCostTable({ 'move.w dn,dn': 4 }, 'x.json', diagnostics)).toBeUndefined();
    expect(parseCostTable({ nop: 4, 'x.w dn': { base: 1 } }, 'x.json', diagnostics)).toBeUndefined();
    expect(diagnostics.map((d) => d.message)).toEqual([
      'Cost table must define a non-zero static "nop" cost.',
      'Cost table entry "x.w dn" is not a valid cost rule.',
    ]);
    expect(diagnostics.every((d) => d.id === DiagnosticIds.ConfigError)).toBe(true);
  });
});

describe('cycle resolver', () => {
  it('costs register lists from the mask', () => {
    expect(costOf('\tmovem.l\td0-d7/a1-a3,-(sp)')).toEqual({
      cycles: 96,
      costSource: 'registerList',
      description: 'movem.l reglist,-(an) [8+11x8]',
    });
  });

  it('rounds table costs up to the granularity', () => {
    expect(costOf('\tadda.l\t(a0)+,a1')).toEqual({
      cycles: 16,
      costSource: 'static',
      description: 'adda.l (an)+,an [14->16]',
    });
    expect(costOf('\tadda.l\t(a0)+,a1', { roundTo: 1 })).toEqual({
      cycles: 14,
      costSource: 'static',
      description: 'adda.l (an)+,an',
    });
    expect(costOf('\tmove.w\td7,$ffff8260.w')).toEqual({
      cycles: 12,
      costSource: 'static',
      description: 'move.w dn,xxx.w',
    });
  });

  it('costs shifts by their literal count', () => {
    expect(costOf('\tlsl.l\t#1,d0')).toEqual({
      cycles: 12,
      costSource: 'shiftCount',
      description: 'lsl.l #xxx,dn [8+1x2->12]',
    });
    expect(costOf('\tlsl.w\t#4,d0')?.cycles).toBe(16);
  });

  it('costs dcb.w nop blocks as n nops', () => {
    expect(costOf('\tdcb.w\t5,$4e71')).toEqual({
      cycles: 20,
      costSource: 'nopBlock',
      description: 'dcb.w n,$4e71 [5x4]',
    });
  });

  it('substitutes variables before costing', () => {
    const { out } = resolveText(['n set 3', '\tdcb.w\tn,$4e71', '\tlsl.w\t#n,d1']);
    expect(out?.map((l) => l.cycles)).toEqual([12, 12]);
  });

  it('uses inline overrides verbatim', () => {
    expect(costOf('\tmove.w\td0,d1\t; (7)')).toEqual({
      cycles: 7,
      costSource: 'override',
      description: 'move.w dn,dn (override)',
    });
    expect(costOf('\tmuls\td0,d1\t; (70) worst case')).toEqual({
      cycles: 70,
      costSource: 'override',
      description: '(override)',
    });
    expect(costOf('\tbne.s\tloop\t; (10)')?.cycles).toBe(10);
  });

  it('applies external overrides by text or by shape', () => {
    const diagnostics: Diagnostic[] = [];
    const overrides = parseOverrideTable(
      { 'MULS  D0, D1': 54, 'divu.w dn,dn': 140 },
      'o.json',
      diagnostics,
    );
    expect(diagnostics).toEqual([]);
    if (!overrides) throw new Error('override table did not parse');
    const { out } = resolveText(
      ['\tmuls\td0,d1', '\tdivu\td2,d3', '\tdivu\td2,d3\t; (100)'],
      { overrides },
    );
    expect(out?.map((l) => [l.cycles, l.costSource, l.description])).toEqual([
      [54, 'external-override', '(override)'],
      [140, 'external-override', '(override)'],
      [100, 'override', '(override)'],
    ]);
  });

  it('rejects malformed override tables', () => {
    const diagnostics: Diagnostic[] = [];
    expect(parseOverrideTable([1, 2], 'o.json', diagnostics)).toBeUndefined();
    expect(parseOverrideTable({ nop: -1 }, 'o.json', diagnostics)).toBeUndefined();
    expect(diagnostics.map((d) => d.id)).toEqual([DiagnosticIds.ConfigError, DiagnosticIds.ConfigError]);
  });

  it('requires an override for conditional branches', () => {
    const { out, diagnostics } = resolveText(['\tbne.s\tloop']);
    expect(out).toBeUndefined();
    expect(diagnostics).toEqual([
      {
        id: DiagnosticIds.UnknownInstructionCost,
        severity: 'error',
        message:
          '"bne.b xxx.l" takes 10 cycles when taken and 8 when not; add an explicit cycle override such as "; (12)".',
        file: 't.s',
        line: 1,
      },
    ]);
  });

  it('reports unknown shapes with the repeat path', () => {
    const { diagnostics } = resolveText(['\trept 2', '\tmuls\td0,d1', '\tendr']);
    expect(diagnostics).toEqual([
      {
        id: DiagnosticIds.UnknownInstructionCost,
        severity: 'error',
        message: 'No cycle cost known for "muls d0,d1" (shape "muls.w dn,dn").',
        file: 't.s',
        line: 2,
        reptPath: ['REPT 2 @ line 1 (pass 1/2)'],
      },
    ]);
  });

  it('rejects shift counts outside 1..8 and malformed register lists', () => {
    expect(resolveText(['\tlsl.w\t#9,d0']).diagnostics[0]?.id).toBe(
      DiagnosticIds.UnknownInstructionCost,
    );
    expect(resolveText(['\tmovem.l\td7-d0,-(sp)']).diagnostics[0]?.id).toBe(
      DiagnosticIds.UnknownInstructionCost,
    );
  });

  it('gives non-instruction lines zero cost', () => {
    const { out } = resolveText(['; note', 'here:', 'W\tequ\t3']);
    expect(out?.map((l) => [l.kind, l.cycles, l.costSource])).toEqual([
      ['comment', 0, 'none'],
      ['label', 0, 'none'],
      ['passthrough', 0, 'none'],
    ]);
  });
});
