import { describe, expect, it } from 'vitest';
import fc from 'fast-check';

import type { Diagnostic } from '../src/diagnostics/types.js';
import { scheduleScanlines } from '../src/lowering/schedule.js';
import type { ScanlineEntry } from '../src/lowering/types.js';
import { instructionLine, templateSet } from './helpers/fixtures.js';

const WIDTH = 512;

function entryCycles(entry: ScanlineEntry): number {
  return entry.kind === 'padding' ? entry.units * entry.unitCycles : entry.line.cycles;
}

const costs = fc.array(
  fc.integer({ min: 0, max: 119 }).map((n) => n * 4),
  { maxLength: 60 },
);

describe('scheduler properties', () => {
  it('fills every scanline exactly and never splits or reorders lines', () => {
    const templates = templateSet(12, 12, 12);
    fc.assert(
      fc.property(costs, (cycles) => {
        const lines = cycles.map((c, i) => instructionLine(c, i + 1));
        const diagnostics: Diagnostic[] = [];
        const result = scheduleScanlines(lines, templates, { width: WIDTH, nopCycles: 4 }, diagnostics);
        expect(diagnostics).toEqual([]);
        const scanlines = result?.scanlines ?? [];

        const placed = scanlines.flatMap((s) =>
          s.entries.flatMap((e) => (e.kind === 'code' ? [e.line] : [])),
        );
        expect(placed).toEqual(lines);

        for (const s of scanlines) {
          expect(s.cycles).toBe(WIDTH);
          expect(s.entries.reduce((sum, e) => sum + entryCycles(e), 0)).toBe(WIDTH);
          expect(s.entries[0]?.offset).toBe(0);
          let previous = 0;
          for (const e of s.entries) {
            expect(e.offset).toBeGreaterThanOrEqual(previous);
            previous = e.offset;
            if (e.kind === 'code') expect(e.offset + e.line.cycles).toBeLessThanOrEqual(WIDTH - 12);
          }
        }
      }),
    );
  });

  it('is idempotent', () => {
    const templates = templateSet(20, 18, 20);
    const fitting = fc.array(fc.integer({ min: 0, max: 113 }).map((n) => n * 4), { maxLength: 60 });
    fc.assert(
      fc.property(fitting, (cycles) => {
        // A 2-cycle unit fills every even gap the 58-cycle template leaves.
        const lines = cycles.map((c, i) => instructionLine(c, i + 1));
        const run = () => scheduleScanlines(lines, templates, { width: WIDTH, nopCycles: 2 }, []);
        const first = run();
        expect(first).toBeDefined();
        expect(run()).toEqual(first);
      }),
    );
  });

  it('packs k lines of exactly the budget into k unpadded scanlines', () => {
    const templates = templateSet(20, 18, 20);
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 12 }), (k) => {
        const lines = Array.from({ length: k }, (_, i) => instructionLine(454, i + 1));
        const result = scheduleScanlines(lines, templates, { width: WIDTH, nopCycles: 4 }, []);
        expect(result?.budget).toBe(454);
        expect(result?.scanlines).toHaveLength(k);
        expect(result?.scanlines.every((s) => s.paddingCycles === 0)).toBe(true);
      }),
    );
  });
});
