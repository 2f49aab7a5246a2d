import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { parseSource } from '../frontend/parser.js';
import { makeSourceFile } from '../frontend/source.js';
import type { CostTable } from '../m68k/costTable.js';
import { expandLines } from './expand.js';
import type { ResolveOptions } from './resolve.js';
import { resolveCosts } from './resolve.js';
import type { CostedLine, SegmentKind, TemplateSegment, TemplateSet } from './types.js';

const MARKERS: ReadonlyArray<{ label: string; kind: SegmentKind }> = [
  { label: 'left_border', kind: 'left-border' },
  { label: 'right_border', kind: 'right-border' },
  { label: 'stabilizer', kind: 'stabilizer' },
];

function markerKind(label: string | undefined): SegmentKind | undefined {
  if (label === undefined) return undefined;
  const lower = label.toLowerCase();
  return MARKERS.find((m) => m.label === lower)?.kind;
}

function segment(kind: SegmentKind, lines: CostedLine[]): TemplateSegment {
  return { kind, lines, cycles: lines.reduce((sum, l) => sum + l.cycles, 0) };
}

/**
 * Load a border template: the same source syntax as the input, split into three segments by the
 * label lines `left_border:`, `right_border:` and `stabilizer:` (in that order, each exactly once).
 *
 * `REPT`/`SET` are expanded and every line is costed with the same resolver as scheduled code.
 */
export function loadTemplate(
  file: string,
  text: string,
  table: CostTable,
  options: ResolveOptions,
  diagnostics: Diagnostic[],
): TemplateSet | undefined {
  const malformed = (message: string, line?: number): undefined => {
    diagnostics.push({
      id: DiagnosticIds.TemplateMalformed,
      severity: 'error',
      message,
      file,
      ...(line !== undefined ? { line } : {}),
    });
    return undefined;
  };

  const parsed = parseSource(makeSourceFile(file, text), diagnostics);
  if (!parsed) return undefined;
  const expanded = expandLines(parsed, diagnostics);
  if (!expanded) return undefined;
  const costed = resolveCosts(expanded, table, options, diagnostics);
  if (!costed) return undefined;

  const segments = new Map<SegmentKind, CostedLine[]>();
  let current: CostedLine[] | undefined;
  for (const line of costed) {
    const kind = markerKind(line.label);
    if (kind !== undefined) {
      if (segments.has(kind)) {
        return malformed(`Template segment "${line.label ?? ''}:" appears more than once.`, line.line);
      }
      const expected = MARKERS[segments.size];
      if (expected?.kind !== kind) {
        return malformed(
          `Template segment "${line.label ?? ''}:" is out of order; expected "${expected?.label ?? ''}:".`,
          line.line,
        );
      }
      current = [];
      segments.set(kind, current);
      // An instruction on the marker line belongs to the segment it opens.
      if (line.kind === 'instruction') {
        const { label: _marker, ...rest } = line;
        current.push(rest);
      }
      continue;
    }
    if (!current) {
      if (line.kind === 'comment') continue;
      return malformed('Only comments may precede the first template segment.', line.line);
    }
    current.push(line);
  }

  const left = segments.get('left-border');
  const right = segments.get('right-border');
  const stab = segments.get('stabilizer');
  if (!left || !right || !stab) {
    const missing = MARKERS.filter((m) => !segments.has(m.kind)).map((m) => `${m.label}:`);
    return malformed(`Template is missing segment(s): ${missing.join(', ')}.`);
  }
  return {
    source: file,
    leftBorder: segment('left-border', left),
    rightBorder: segment('right-border', right),
    stabilizer: segment('stabilizer', stab),
  };
}
