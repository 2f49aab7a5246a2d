import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type {
  CostedLine,
  Scanline,
  ScanlineEntry,
  ScheduleResult,
  TemplateSegment,
  TemplateSet,
} from './types.js';

export interface ScheduleOptions {
  /** Exact cycle total of every scanline. */
  width: number;
  /** Cycle cost of one padding unit (`nop`). */
  nopCycles: number;
}

/**
 * Scanline under construction.
 */
interface OpenScanline {
  index: number;
  entries: ScanlineEntry[];
  running: number;
  scheduledCycles: number;
}

function pushSegment(scanline: OpenScanline, segment: TemplateSegment): void {
  let first = true;
  for (const line of segment.lines) {
    scanline.entries.push({
      kind: 'template',
      segment: segment.kind,
      first,
      line,
      offset: scanline.running,
    });
    scanline.running += line.cycles;
    first = false;
  }
}

/**
 * Pack costed lines, in order, into scanlines of exactly `options.width` cycles.
 *
 * Each scanline opens with the left border and stabilizer and closes with the right border
 * followed by whole `nop` units of padding. A line is never split across scanlines.
 */
export function scheduleScanlines(
  lines: CostedLine[],
  templates: TemplateSet,
  options: ScheduleOptions,
  diagnostics: Diagnostic[],
): ScheduleResult | undefined {
  const { width, nopCycles } = options;
  const openingCycles = templates.leftBorder.cycles + templates.stabilizer.cycles;
  const closingCycles = templates.rightBorder.cycles;
  const budget = width - openingCycles - closingCycles;
  if (budget <= 0) {
    diagnostics.push({
      id: DiagnosticIds.TemplateExceedsBudget,
      severity: 'error',
      message:
        `Template reserves ${openingCycles + closingCycles} cycles ` +
        `(opening ${openingCycles}, closing ${closingCycles}), leaving no room in a ${width}-cycle scanline.`,
      file: templates.source,
    });
    return undefined;
  }

  const scanlines: Scanline[] = [];
  let current: OpenScanline | undefined;
  const limit = width - closingCycles;

  const open = (): OpenScanline => {
    const scanline: OpenScanline = {
      index: scanlines.length + 1,
      entries: [],
      running: 0,
      scheduledCycles: 0,
    };
    pushSegment(scanline, templates.leftBorder);
    pushSegment(scanline, templates.stabilizer);
    return scanline;
  };

  const close = (scanline: OpenScanline, at: CostedLine | undefined): boolean => {
    pushSegment(scanline, templates.rightBorder);
    const gap = width - scanline.running;
    if (gap % nopCycles !== 0) {
      diagnostics.push({
        id: DiagnosticIds.UnfillableGap,
        severity: 'error',
        message:
          `Scanline ${scanline.index} leaves ${gap} cycles, which is not a multiple of the ` +
          `${nopCycles}-cycle nop.`,
        file: at?.file ?? templates.source,
        ...(at ? { line: at.line } : {}),
        ...(at && at.reptPath.length > 0 ? { reptPath: at.reptPath } : {}),
      });
      return false;
    }
    const units = gap / nopCycles;
    if (units > 0) {
      scanline.entries.push({ kind: 'padding', units, unitCycles: nopCycles, offset: scanline.running });
    }
    scanlines.push({
      index: scanline.index,
      entries: scanline.entries,
      cycles: scanline.running + gap,
      scheduledCycles: scanline.scheduledCycles,
      paddingCycles: gap,
    });
    return true;
  };

  // Last instruction placed in the open scanline; locates padding errors.
  let lastPlaced: CostedLine | undefined;

  for (const line of lines) {
    if (line.cycles > budget) {
      diagnostics.push({
        id: DiagnosticIds.InstructionExceedsBudget,
        severity: 'error',
        message: `Line costs ${line.cycles} cycles but a scanline only has ${budget} cycles available.`,
        file: line.file,
        line: line.line,
        ...(line.reptPath.length > 0 ? { reptPath: line.reptPath } : {}),
      });
      return undefined;
    }
    if (current && current.running + line.cycles > limit) {
      if (!close(current, lastPlaced)) return undefined;
      current = undefined;
      lastPlaced = undefined;
    }
    current ??= open();
    current.entries.push({ kind: 'code', line, offset: current.running });
    current.running += line.cycles;
    current.scheduledCycles += line.cycles;
    if (line.cycles > 0) lastPlaced = line;
  }
  if (current && !close(current, lastPlaced)) return undefined;

  return { width, openingCycles, closingCycles, budget, scanlines };
}
