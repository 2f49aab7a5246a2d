import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds, hasErrors } from './diagnostics/types.js';
import type { Artifact, ScheduledProgram } from './formats/types.js';
import { parseSource } from './frontend/parser.js';
import { makeSourceFile } from './frontend/source.js';
import { expandLines } from './lowering/expand.js';
import { parseOverrideTable, resolveCosts } from './lowering/resolve.js';
import { scheduleScanlines } from './lowering/schedule.js';
import { loadTemplate } from './lowering/template.js';
import { loadDefaultCostTable } from './m68k/costTable.js';
import type { CompileFn, CompilerOptions, CompileResult, PipelineDeps } from './pipeline.js';
import { packageVersion } from './version.js';

/**
 * Path of the template used when no `templatePath` is given.
 */
export const DEFAULT_TEMPLATE_PATH = fileURLToPath(
  new URL('../data/templates/fullscreen.s', import.meta.url),
);

const LABEL_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * In-memory input file.
 */
export interface SourceInput {
  path: string;
  text: string;
}

export interface ScheduleInputs {
  source: SourceInput;
  template: SourceInput;
  /** Parsed external overrides (see `parseOverrideTable`). */
  overrides?: ReadonlyMap<string, number>;
}

function configError(diagnostics: Diagnostic[], file: string, message: string): void {
  diagnostics.push({ id: DiagnosticIds.ConfigError, severity: 'error', message, file });
}

function validateOptions(options: CompilerOptions, file: string, diagnostics: Diagnostic[]): void {
  const { width, roundTo, label } = options;
  if (width !== undefined && (!Number.isInteger(width) || width <= 0)) {
    configError(diagnostics, file, `Scanline width must be a positive integer (got ${width}).`);
  }
  if (roundTo !== undefined && (!Number.isInteger(roundTo) || roundTo <= 0)) {
    configError(diagnostics, file, `Rounding granularity must be a positive integer (got ${roundTo}).`);
  }
  if (label !== undefined && !LABEL_RE.test(label)) {
    configError(diagnostics, file, `Equate label "${label}" is not a valid symbol name.`);
  }
}

/**
 * Run the pure pipeline (parse, expand, resolve, template, schedule) over already-read text.
 */
export function scheduleProgram(
  inputs: ScheduleInputs,
  options: CompilerOptions,
  diagnostics: Diagnostic[],
): ScheduledProgram | undefined {
  validateOptions(options, inputs.source.path, diagnostics);
  if (hasErrors(diagnostics)) return undefined;

  const table = loadDefaultCostTable(diagnostics);
  if (!table) return undefined;
  const resolveOptions = {
    ...(options.roundTo !== undefined ? { roundTo: options.roundTo } : {}),
    ...(inputs.overrides ? { overrides: inputs.overrides } : {}),
  };

  const templates = loadTemplate(
    inputs.template.path,
    inputs.template.text,
    table,
    resolveOptions,
    diagnostics,
  );
  if (!templates) return undefined;

  const parsed = parseSource(makeSourceFile(inputs.source.path, inputs.source.text), diagnostics);
  if (!parsed) return undefined;
  const expanded = expandLines(parsed, diagnostics);
  if (!expanded) return undefined;
  const costed = resolveCosts(expanded, table, resolveOptions, diagnostics);
  if (!costed) return undefined;

  const schedule = scheduleScanlines(
    costed,
    templates,
    { width: options.width ?? 512, nopCycles: table.nopCycles },
    diagnostics,
  );
  if (!schedule) return undefined;
  return { schedule, templates };
}

/**
 * Schedule already-read inputs and render the requested artifacts.
 */
export function compileSource(
  inputs: ScheduleInputs,
  options: CompilerOptions,
  deps: PipelineDeps,
): CompileResult {
  const diagnostics: Diagnostic[] = [];
  let program: ScheduledProgram | undefined;
  try {
    program = scheduleProgram(inputs, options, diagnostics);
  } catch (err) {
    diagnostics.push({
      id: DiagnosticIds.InternalError,
      severity: 'error',
      message: `Internal error during scheduling: ${String(err)}`,
      file: inputs.source.path,
    });
  }
  if (!program || hasErrors(diagnostics)) return { diagnostics, artifacts: [] };

  const artifacts: Artifact[] = [
    deps.formats.writeAsm(program, {
      toolVersion: options.toolVersion ?? packageVersion(),
      ...(options.label !== undefined ? { label: options.label } : {}),
      ...(options.padStyle !== undefined ? { padStyle: options.padStyle } : {}),
    }),
  ];
  if (options.emitReport && deps.formats.writeReport) {
    artifacts.push(deps.formats.writeReport(program));
  }
  return { diagnostics, artifacts };
}

async function readInput(
  path: string,
  what: string,
  diagnostics: Diagnostic[],
): Promise<string | undefined> {
  try {
    return await readFile(path, 'utf8');
  } catch (err) {
    diagnostics.push({
      id: DiagnosticIds.IoReadFailed,
      severity: 'error',
      message: `Failed to read ${what}: ${String(err)}`,
      file: path,
    });
    return undefined;
  }
}

/**
 * Compile an entry file into scanline artifacts.
 *
 * Reads the entry, template and optional override files, then runs {@link compileSource}.
 * Artifacts are only returned when no error diagnostics were produced.
 */
export const compile: CompileFn = async (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
): Promise<CompileResult> => {
  const diagnostics: Diagnostic[] = [];
  const templatePath = options.templatePath ?? DEFAULT_TEMPLATE_PATH;

  const text = await readInput(entryFile, 'entry file', diagnostics);
  const templateText = await readInput(templatePath, 'template', diagnostics);
  let overrides: Map<string, number> | undefined;
  if (options.overridesPath !== undefined) {
    const overridesText = await readInput(options.overridesPath, 'override table', diagnostics);
    if (overridesText !== undefined) {
      let json: unknown;
      try {
        json = JSON.parse(overridesText);
      } catch (err) {
        configError(diagnostics, options.overridesPath, `Override table is not valid JSON: ${String(err)}`);
      }
      if (!hasErrors(diagnostics)) {
        overrides = parseOverrideTable(json, options.overridesPath, diagnostics);
      }
    }
  }
  if (text === undefined || templateText === undefined || hasErrors(diagnostics)) {
    return { diagnostics, artifacts: [] };
  }

  const result = compileSource(
    {
      source: { path: entryFile, text },
      template: { path: templatePath, text: templateText },
      ...(overrides ? { overrides } : {}),
    },
    options,
    deps,
  );
  return { diagnostics: [...diagnostics, ...result.diagnostics], artifacts: result.artifacts };
};
