import type { ScheduleResult, TemplateSet } from '../lowering/types.js';

/**
 * Padding emission style: one `nop` line per unit, or a single `dcb.w n,$4e71` line.
 */
export type PadStyle = 'nop' | 'dcb';

/**
 * Scheduled program handed to format writers.
 */
export interface ScheduledProgram {
  schedule: ScheduleResult;
  templates: TemplateSet;
}

/**
 * Options for annotated-source writing.
 */
export interface WriteAsmOptions {
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
  /** Symbol bound to the scanline count (default `SCANLINES_CONSUMED`). */
  label?: string;
  padStyle?: PadStyle;
  /** Version shown in the header banner. */
  toolVersion?: string;
}

/**
 * In-memory annotated assembly artifact.
 */
export interface AsmArtifact {
  kind: 'asm';
  text: string;
}

/**
 * Per-scanline cycle breakdown.
 */
export interface ScanlineReport {
  index: number;
  templateCycles: number;
  scheduledCycles: number;
  paddingCycles: number;
  instructions: number;
}

/**
 * JSON timing report shape (`.cycles.json`).
 */
export type CycleReportJson = {
  format: 'syncline-cycles';
  version: 1;
  width: number;
  template: string;
  openingCycles: number;
  closingCycles: number;
  budget: number;
  scanlineCount: number;
  scanlines: ScanlineReport[];
};

/**
 * In-memory JSON timing report artifact.
 */
export interface ReportArtifact {
  kind: 'report';
  json: CycleReportJson;
}

/**
 * Union of all artifact kinds produced by the pipeline.
 */
export type Artifact = AsmArtifact | ReportArtifact;

/**
 * Format writers used by the pipeline to turn a schedule into artifacts.
 */
export interface FormatWriters {
  writeAsm(program: ScheduledProgram, opts?: WriteAsmOptions): AsmArtifact;
  writeReport?(program: ScheduledProgram): ReportArtifact;
}
