import { describe, expect, it } from 'vitest';

import { DiagnosticIds } from '../src/diagnostics/types.js';
import { overrideTemplate, scheduleText } from './helpers/fixtures.js';

const small = overrideTemplate(12, 12, 12);

describe('scanline scheduler', () => {
  it('leaves 454 cycles from 58 reserved and pads nothing on exact fits', () => {
    const { program, diagnostics } = scheduleText('\tnop\t; (454)\n\tnop\t; (454)\n');
    expect(diagnostics).toEqual([]);
    const schedule = program?.schedule;
    expect(schedule?.openingCycles).toBe(40);
    expect(schedule?.closingCycles).toBe(18);
    expect(schedule?.budget).toBe(454);
    expect(schedule?.scanlines.map((s) => [s.cycles, s.paddingCycles])).toEqual([
      [512, 0],
      [512, 0],
    ]);
    expect(schedule?.scanlines[0]?.entries.map((e) => [e.kind, e.offset])).toEqual([
      ['template', 0],
      ['template', 20],
      ['code', 40],
      ['template', 494],
    ]);
  });

  it('closes a scanline when the next line would cross the right border', () => {
    const { program, diagnostics } = scheduleText('\tnop\t; (400)\n\tnop\t; (100)\n', {
      template: small,
    });
    expect(diagnostics).toEqual([]);
    const scanlines = program?.schedule.scanlines ?? [];
    expect(scanlines.map((s) => [s.index, s.scheduledCycles, s.paddingCycles, s.cycles])).toEqual([
      [1, 400, 76, 512],
      [2, 100, 376, 512],
    ]);
    expect(scanlines[0]?.entries.at(-1)).toEqual({
      kind: 'padding',
      units: 19,
      unitCycles: 4,
      offset: 436,
    });
  });

  it('keeps zero-cost lines in the open scanline', () => {
    const { program } = scheduleText('\tnop\t; (476)\n; tail note\n\tnop\n', { template: small });
    const scanlines = program?.schedule.scanlines ?? [];
    expect(scanlines).toHaveLength(2);
    expect(
      scanlines[0]?.entries.filter((e) => e.kind === 'code').map((e) => e.line.kind),
    ).toEqual(['instruction', 'comment']);
    expect(scanlines[0]?.paddingCycles).toBe(0);
  });

  it('yields no scanlines for an empty stream', () => {
    const { program, diagnostics } = scheduleText('', { template: small });
    expect(diagnostics).toEqual([]);
    expect(program?.schedule.scanlines).toEqual([]);
  });

  it('rejects a line larger than the budget', () => {
    const { program, diagnostics } = scheduleText('\tnop\n\tnop\t; (480)\n', { template: small });
    expect(program).toBeUndefined();
    expect(diagnostics).toEqual([
      {
        id: DiagnosticIds.InstructionExceedsBudget,
        severity: 'error',
        message: 'Line costs 480 cycles but a scanline only has 476 cycles available.',
        file: 'input.s',
        line: 2,
      },
    ]);
  });

  it('rejects a template that leaves no budget', () => {
    const { diagnostics } = scheduleText('\tnop\n', { width: 58 });
    expect(diagnostics).toEqual([
      {
        id: DiagnosticIds.TemplateExceedsBudget,
        severity: 'error',
        message:
          'Template reserves 58 cycles (opening 40, closing 18), leaving no room in a 58-cycle scanline.',
        file: 'template.s',
      },
    ]);
  });

  it('rejects a gap that whole nops cannot fill', () => {
    const { diagnostics } = scheduleText('\tnop\n');
    expect(diagnostics).toEqual([
      {
        id: DiagnosticIds.UnfillableGap,
        severity: 'error',
        message: 'Scanline 1 leaves 450 cycles, which is not a multiple of the 4-cycle nop.',
        file: 'input.s',
        line: 1,
      },
    ]);
  });

  it('rejects invalid widths as configuration errors', () => {
    const { diagnostics } = scheduleText('\tnop\n', { width: 0 });
    expect(diagnostics.map((d) => d.id)).toEqual([DiagnosticIds.ConfigError]);
  });
});
