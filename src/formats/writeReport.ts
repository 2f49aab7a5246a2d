import type { Scanline } from '../lowering/types.js';
import type {
  CycleReportJson,
  ReportArtifact,
  ScanlineReport,
  ScheduledProgram,
} from './types.js';

function scanlineReport(scanline: Scanline): ScanlineReport {
  let templateCycles = 0;
  let instructions = 0;
  for (const entry of scanline.entries) {
    if (entry.kind === 'template') templateCycles += entry.line.cycles;
    if (entry.kind === 'code' && entry.line.kind === 'instruction') instructions++;
  }
  return {
    index: scanline.index,
    templateCycles,
    scheduledCycles: scanline.scheduledCycles,
    paddingCycles: scanline.paddingCycles,
    instructions,
  };
}

/**
 * Create the `.cycles.json` timing report: reserved/available cycles and a per-scanline breakdown.
 */
export function writeReport(program: ScheduledProgram): ReportArtifact {
  const { schedule, templates } = program;
  const json: CycleReportJson = {
    format: 'syncline-cycles',
    version: 1,
    width: schedule.width,
    template: templates.source.replace(/\\/g, '/'),
    openingCycles: schedule.openingCycles,
    closingCycles: schedule.closingCycles,
    budget: schedule.budget,
    scanlineCount: schedule.scanlines.length,
    scanlines: schedule.scanlines.map(scanlineReport),
  };
  return { kind: 'report', json };
}
