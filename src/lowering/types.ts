import type { InstructionBody, SectionOrigin } from '../frontend/ast.js';

interface ExpandedLineBase {
  file: string;
  /** 1-based line number of the source line this copy came from. */
  line: number;
  label?: string;
  comment?: string;
  origin?: SectionOrigin;
  /** Active repeat frames when the line was emitted, outermost first. Empty at top level. */
  reptPath: string[];
}

/**
 * Instruction line after macro expansion; operand text has variables substituted.
 */
export interface ExpandedInstruction extends ExpandedLineBase {
  kind: 'instruction';
  instruction: InstructionBody;
  override?: number;
}

/**
 * Label-only or comment-only line carried through expansion.
 */
export interface ExpandedNote extends ExpandedLineBase {
  kind: 'label' | 'comment';
}

/**
 * Assembler statement copied verbatim (`EQU`); it costs nothing.
 */
export interface ExpandedPassthrough extends ExpandedLineBase {
  kind: 'passthrough';
  text: string;
}

/**
 * Directive-free line produced by the macro expander.
 */
export type ExpandedLine = ExpandedInstruction | ExpandedNote | ExpandedPassthrough;

/**
 * Which rule produced a line's cost.
 */
export type CostSource =
  | 'none'
  | 'override'
  | 'external-override'
  | 'static'
  | 'registerList'
  | 'shiftCount'
  | 'nopBlock';

/**
 * Expanded line with its resolved cost. Non-instruction lines cost 0 and have source `none`.
 */
export type CostedLine = ExpandedLine & {
  cycles: number;
  costSource: CostSource;
  /** Rule-derived annotation, e.g. `movem.l reglist,-(an) [8+11x8]`. Empty for non-instructions. */
  description: string;
};

export type SegmentKind = 'left-border' | 'right-border' | 'stabilizer';

/**
 * One costed template segment, shared read-only by every scanline boundary.
 */
export interface TemplateSegment {
  kind: SegmentKind;
  lines: CostedLine[];
  cycles: number;
}

/**
 * The three segments of a border template plus the identifier shown in output headers.
 */
export interface TemplateSet {
  source: string;
  leftBorder: TemplateSegment;
  rightBorder: TemplateSegment;
  stabilizer: TemplateSegment;
}

/**
 * Entry of a closed scanline. `offset` is the cycle count consumed before the entry in its scanline.
 */
export type ScanlineEntry =
  | { kind: 'template'; segment: SegmentKind; first: boolean; line: CostedLine; offset: number }
  | { kind: 'code'; line: CostedLine; offset: number }
  | { kind: 'padding'; units: number; unitCycles: number; offset: number };

export interface Scanline {
  /** 1-based ordinal. */
  index: number;
  entries: ScanlineEntry[];
  /** Realized total; always equals the configured width. */
  cycles: number;
  /** Cycles spent on scheduled (non-template, non-padding) lines. */
  scheduledCycles: number;
  paddingCycles: number;
}

export interface ScheduleResult {
  width: number;
  openingCycles: number;
  closingCycles: number;
  /** Cycles available to scheduled code in each scanline. */
  budget: number;
  scanlines: Scanline[];
}
