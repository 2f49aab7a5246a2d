import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { parseNumberLiteral } from '../frontend/expr.js';
import type { CostRule, CostTable } from '../m68k/costTable.js';
import { countRegisterList } from '../m68k/reglist.js';
import type { InstructionShape } from '../m68k/shape.js';
import { instructionShape, splitOperands } from '../m68k/shape.js';
import type { CostedLine, CostSource, ExpandedInstruction, ExpandedLine } from './types.js';

export interface ResolveOptions {
  /**
   * Granularity table-derived costs are rounded up to (4 on the ST bus). `1` disables rounding.
   */
  roundTo?: number;
  /**
   * External overrides keyed by normalized instruction text or by shape (see {@link instructionKey}).
   */
  overrides?: ReadonlyMap<string, number>;
}

const NOP_WORD = 0x4e71;

/**
 * Canonical text of an instruction for override lookup: lowercase, single spaces, no space
 * around commas.
 */
export function instructionKey(mnemonic: string, operands: string): string {
  const ops = splitOperands(operands.toLowerCase())
    .map((o) => o.replace(/\s+/g, ''))
    .join(',');
  const m = mnemonic.trim().toLowerCase();
  return ops.length > 0 ? `${m} ${ops}` : m;
}

function normalizeOverrideKey(key: string): string {
  const trimmed = key.trim();
  const space = trimmed.search(/\s/);
  if (space < 0) return trimmed.toLowerCase();
  return instructionKey(trimmed.slice(0, space), trimmed.slice(space + 1));
}

/**
 * Validate a parsed external override document: an object mapping instruction text or shape to a
 * non-negative integer cycle count.
 */
export function parseOverrideTable(
  json: unknown,
  file: string,
  diagnostics: Diagnostic[],
): Map<string, number> | undefined {
  if (typeof json !== 'object' || json === null || Array.isArray(json)) {
    diagnostics.push({
      id: DiagnosticIds.ConfigError,
      severity: 'error',
      message: 'Override table must be a JSON object mapping instructions to cycle counts.',
      file,
    });
    return undefined;
  }
  const out = new Map<string, number>();
  for (const [key, value] of Object.entries(json)) {
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
      diagnostics.push({
        id: DiagnosticIds.ConfigError,
        severity: 'error',
        message: `Override for "${key}" must be a non-negative integer (got ${JSON.stringify(value)}).`,
        file,
      });
      return undefined;
    }
    out.set(normalizeOverrideKey(key), value);
  }
  return out;
}

function roundUp(cycles: number, roundTo: number): number {
  return Math.ceil(cycles / roundTo) * roundTo;
}

interface Resolution {
  cycles: number;
  costSource: CostSource;
  description: string;
}

function tableDerived(
  raw: number,
  roundTo: number,
  costSource: CostSource,
  label: string,
  detail: string | undefined,
): Resolution {
  const cycles = roundUp(raw, roundTo);
  const parts = detail === undefined ? [] : [detail];
  if (cycles !== raw) parts.push(`${detail === undefined ? raw : ''}->${cycles}`);
  const bracket = parts.join('');
  return { cycles, costSource, description: bracket.length > 0 ? `${label} [${bracket}]` : label };
}

interface CostError {
  error: string;
}

function costError(error: string): CostError {
  return { error };
}

function applyRule(
  rule: CostRule,
  shape: InstructionShape,
  roundTo: number,
): Resolution | CostError {
  switch (rule.kind) {
    case 'static':
      return tableDerived(rule.cycles, roundTo, 'static', shape.key, undefined);
    case 'registerList': {
      const index = shape.operands.indexOf('reglist');
      const count = countRegisterList(shape.operandText[index] ?? '');
      if (count === undefined) {
        return costError(`Malformed register list in "${shape.operandText.join(',')}".`);
      }
      return tableDerived(
        rule.base + rule.perRegister * count,
        roundTo,
        'registerList',
        shape.key,
        `${rule.base}+${count}x${rule.perRegister}`,
      );
    }
    case 'shiftCount': {
      const immediate = shape.operandText[0] ?? '';
      const count = parseNumberLiteral(immediate.replace(/^#/, ''));
      if (count === undefined || count < 1 || count > 8) {
        return costError(
          `Shift count "${immediate}" must be a literal immediate between 1 and 8 for "${shape.key}".`,
        );
      }
      return tableDerived(
        rule.base + rule.perShift * count,
        roundTo,
        'shiftCount',
        shape.key,
        `${rule.base}+${count}x${rule.perShift}`,
      );
    }
    case 'branch':
      return costError(
        `"${shape.key}" takes ${rule.taken} cycles when taken and ${rule.notTaken} when not; ` +
          'add an explicit cycle override such as "; (12)".',
      );
  }
}

function nopBlock(line: ExpandedInstruction, table: CostTable, roundTo: number): Resolution | undefined {
  if (line.instruction.mnemonic.toLowerCase() !== 'dcb.w') return undefined;
  const ops = splitOperands(line.instruction.operands);
  if (ops.length !== 2) return undefined;
  const count = parseNumberLiteral(ops[0] ?? '');
  if (count === undefined || parseNumberLiteral(ops[1] ?? '') !== NOP_WORD) return undefined;
  return tableDerived(
    count * table.nopCycles,
    roundTo,
    'nopBlock',
    'dcb.w n,$4e71',
    `${count}x${table.nopCycles}`,
  );
}

function resolveInstruction(
  line: ExpandedInstruction,
  table: CostTable,
  roundTo: number,
  overrides: ReadonlyMap<string, number> | undefined,
): Resolution | CostError {
  const shape = instructionShape(line.instruction);
  const known = shape !== undefined && table.rules.has(shape.key);
  const overrideDescription = known ? `${shape.key} (override)` : '(override)';

  if (line.override !== undefined) {
    return { cycles: line.override, costSource: 'override', description: overrideDescription };
  }

  if (overrides) {
    const byText = overrides.get(instructionKey(line.instruction.mnemonic, line.instruction.operands));
    const external = byText ?? (shape ? overrides.get(shape.key) : undefined);
    if (external !== undefined) {
      return { cycles: external, costSource: 'external-override', description: overrideDescription };
    }
  }

  const block = nopBlock(line, table, roundTo);
  if (block) return block;

  const text = instructionKey(line.instruction.mnemonic, line.instruction.operands);
  if (!shape) return costError(`Cannot classify the operands of "${text}".`);
  const rule = table.rules.get(shape.key);
  if (!rule) return costError(`No cycle cost known for "${text}" (shape "${shape.key}").`);
  return applyRule(rule, shape, roundTo);
}

function uncosted(line: ExpandedLine): CostedLine {
  return { ...line, cycles: 0, costSource: 'none', description: '' };
}

/**
 * Assign a cycle cost to every expanded line.
 *
 * Precedence per instruction: inline override, external override, dynamic rule (`dcb.w` NOP
 * blocks, register lists, immediate shifts), static table entry. Table-derived costs are rounded up
 * to `roundTo`; overrides are used verbatim.
 */
export function resolveCosts(
  lines: ExpandedLine[],
  table: CostTable,
  options: ResolveOptions,
  diagnostics: Diagnostic[],
): CostedLine[] | undefined {
  const roundTo = options.roundTo ?? 4;
  const out: CostedLine[] = [];
  for (const line of lines) {
    if (line.kind !== 'instruction') {
      out.push(uncosted(line));
      continue;
    }
    const resolved = resolveInstruction(line, table, roundTo, options.overrides);
    if ('error' in resolved) {
      diagnostics.push({
        id: DiagnosticIds.UnknownInstructionCost,
        severity: 'error',
        message: resolved.error,
        file: line.file,
        line: line.line,
        ...(line.reptPath.length > 0 ? { reptPath: line.reptPath } : {}),
      });
      return undefined;
    }
    out.push({ ...line, ...resolved });
  }
  return out;
}
