import type { CostedLine, ScanlineEntry, SegmentKind } from '../lowering/types.js';
import type { AsmArtifact, ScheduledProgram, WriteAsmOptions } from './types.js';

const RULE = '; ------------------------------------------';

const SEGMENT_NAMES: Record<SegmentKind, string> = {
  'left-border': 'left border',
  'right-border': 'right border',
  stabilizer: 'stabilizer',
};

/**
 * Source comment left after removing the override group the cost was taken from.
 */
function remainingComment(line: CostedLine): string | undefined {
  if (line.comment === undefined) return undefined;
  const text =
    line.costSource === 'override'
      ? line.comment.replace(/\([^()]*\)/, '').replace(/\s+/g, ' ').trim()
      : line.comment;
  return text.length > 0 ? text : undefined;
}

function annotation(offset: number, cycles: number, description: string): string {
  return description.length > 0 ? `; [${offset}] (${cycles}) ${description}` : `; [${offset}] (${cycles})`;
}

/**
 * Render one costed line. Labels sit in column 0; instructions are tab-indented.
 */
export function formatCostedLine(line: CostedLine, offset: number): string {
  const prefix = line.label !== undefined ? `${line.label}:` : '';
  switch (line.kind) {
    case 'instruction': {
      const { mnemonic, operands } = line.instruction;
      const code = operands.length > 0 ? `${mnemonic}\t${operands}` : mnemonic;
      const rest = remainingComment(line);
      const note = annotation(offset, line.cycles, line.description);
      return `${prefix}\t${code}\t${rest !== undefined ? `${note} | ${rest}` : note}`;
    }
    case 'label':
      return line.comment !== undefined ? `${prefix}\t; ${line.comment}` : prefix;
    case 'comment':
      return `; ${line.comment ?? ''}`;
    case 'passthrough':
      return line.text;
  }
}

/**
 * Create the annotated, scanline-delimited `.s` artifact.
 */
export function writeAsm(program: ScheduledProgram, opts?: WriteAsmOptions): AsmArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const label = opts?.label ?? 'SCANLINES_CONSUMED';
  const padStyle = opts?.padStyle ?? 'nop';
  const { schedule, templates } = program;
  const segmentCycles: Record<SegmentKind, number> = {
    'left-border': templates.leftBorder.cycles,
    'right-border': templates.rightBorder.cycles,
    stabilizer: templates.stabilizer.cycles,
  };

  const lines: string[] = [];
  lines.push(RULE);
  lines.push(`; Generated by syncline ${opts?.toolVersion ?? '0.0.0'}`);
  lines.push(`; Total scanlines: ${schedule.scanlines.length}`);
  lines.push(`; Template: ${templates.source}`);
  lines.push(`; Target width: ${schedule.width} cycles`);
  lines.push(RULE);
  lines.push('');
  lines.push(`${label}\tequ\t${schedule.scanlines.length}`);

  let section: number | undefined;
  const emitEntry = (entry: ScanlineEntry): void => {
    switch (entry.kind) {
      case 'template':
        if (entry.first) {
          lines.push(`; --- ${SEGMENT_NAMES[entry.segment]} (${segmentCycles[entry.segment]}) ---`);
        }
        lines.push(formatCostedLine(entry.line, entry.offset));
        return;
      case 'code': {
        const origin = entry.line.origin;
        if (origin && origin.index !== section) {
          section = origin.index;
          lines.push(`; --- Section ${origin.index}: ${origin.title} ---`);
        }
        lines.push(formatCostedLine(entry.line, entry.offset));
        return;
      }
      case 'padding': {
        const total = entry.units * entry.unitCycles;
        lines.push(`; --- padding (${total}) ---`);
        if (padStyle === 'dcb') {
          lines.push(
            `\tdcb.w\t${entry.units},$4e71\t; [${entry.offset}] (${total}) pad to ${schedule.width} cycles`,
          );
          return;
        }
        for (let i = 0; i < entry.units; i++) {
          lines.push(`\tnop\t; [${entry.offset + i * entry.unitCycles}] (${entry.unitCycles})`);
        }
        return;
      }
    }
  };

  for (const scanline of schedule.scanlines) {
    lines.push('');
    lines.push(`; === scanline ${scanline.index} ===`);
    for (const entry of scanline.entries) emitEntry(entry);
    lines.push(`; scanline ${scanline.index}: ${scanline.cycles} cycles`);
  }

  return { kind: 'asm', text: lines.join(lineEnding) + lineEnding };
}
