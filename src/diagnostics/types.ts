/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A pipeline diagnostic (error/warning/info) with an optional source location.
 *
 * Diagnostics must have stable IDs so scripts wrapping the CLI can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `SYN110`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** 1-based line number, when known. */
  line?: number;
  /**
   * Active repeat nesting at the point of failure, outermost first
   * (e.g. `REPT 7 @ line 9 (pass 3/7)`).
   */
  reptPath?: string[];
}

/**
 * Known diagnostic IDs.
 *
 * Every error kind is fatal: the pipeline stops at the first one and produces no artifacts.
 */
export const DiagnosticIds = {
  /** Failed to read an input, template or override file. */
  IoReadFailed: 'SYN001',

  /** Unexpected exception inside a pipeline stage. */
  InternalError: 'SYN002',

  /** Invalid configuration value (override table shape, width, granularity). */
  ConfigError: 'SYN003',

  /** A directive was recognized but its arguments do not parse. */
  MalformedLine: 'SYN100',

  /** `REPT` without matching `ENDR`, or `ENDR` without an open `REPT`. */
  UnbalancedRept: 'SYN110',

  /** A `SET`/`REPT` expression names a variable that is not in scope. */
  UndefinedVariable: 'SYN120',

  /** Division by zero in a `SET`/`REPT` expression. */
  DivideByZero: 'SYN121',

  /** No override, dynamic rule or table entry matches the instruction. */
  UnknownInstructionCost: 'SYN200',

  /** Template segments missing, duplicated or out of order. */
  TemplateMalformed: 'SYN300',

  /** Border and stabilizer segments leave no room for scheduled code. */
  TemplateExceedsBudget: 'SYN310',

  /** A single instruction is larger than the per-scanline budget. */
  InstructionExceedsBudget: 'SYN311',

  /** A scanline remainder cannot be covered by whole NOP units. */
  UnfillableGap: 'SYN320',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];

/**
 * True when any diagnostic in the list is an error.
 */
export function hasErrors(diagnostics: Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}
