import { scheduleProgram } from '../../src/compile.js';
import type { CompilerOptions } from '../../src/pipeline.js';
import type { Diagnostic } from '../../src/diagnostics/types.js';
import type { ScheduledProgram } from '../../src/formats/types.js';
import type {
  CostedLine,
  SegmentKind,
  TemplateSegment,
  TemplateSet,
} from '../../src/lowering/types.js';

/**
 * Template text whose three segments are one overridden instruction each.
 */
export function overrideTemplate(left: number, right: number, stabilizer: number): string {
  return [
    'left_border:',
    `\tmove.b\td7,$ffff8260.w\t; (${left})`,
    'right_border:',
    `\tmove.w\td7,$ffff820a.w\t; (${right})`,
    'stabilizer:',
    `\tmove.b\td7,$ffff8260.w\t; (${stabilizer})`,
    '',
  ].join('\n');
}

export function instructionLine(cycles: number, line = 1, mnemonic = 'nop'): CostedLine {
  return {
    kind: 'instruction',
    file: 'gen.s',
    line,
    reptPath: [],
    instruction: { mnemonic, operands: '' },
    override: cycles,
    cycles,
    costSource: 'override',
    description: '(override)',
  };
}

function segment(kind: SegmentKind, cycles: number): TemplateSegment {
  return { kind, lines: [instructionLine(cycles)], cycles };
}

/**
 * In-memory template set with one line per segment.
 */
export function templateSet(left: number, right: number, stabilizer: number): TemplateSet {
  return {
    source: 'gen-template.s',
    leftBorder: segment('left-border', left),
    rightBorder: segment('right-border', right),
    stabilizer: segment('stabilizer', stabilizer),
  };
}

/**
 * Run the in-memory pipeline over `source` with an override-only template.
 */
export function scheduleText(
  source: string,
  options: CompilerOptions & { template?: string; overrides?: ReadonlyMap<string, number> } = {},
): { program: ScheduledProgram | undefined; diagnostics: Diagnostic[] } {
  const diagnostics: Diagnostic[] = [];
  const { template, overrides, ...compilerOptions } = options;
  const program = scheduleProgram(
    {
      source: { path: 'input.s', text: source },
      template: { path: 'template.s', text: template ?? overrideTemplate(20, 18, 20) },
      ...(overrides ? { overrides } : {}),
    },
    compilerOptions,
    diagnostics,
  );
  return { program, diagnostics };
}
