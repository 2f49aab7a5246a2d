import type { Diagnostic } from './diagnostics/types.js';
import type { Artifact, FormatWriters, PadStyle } from './formats/types.js';

/**
 * Options that influence scheduling and which artifacts are produced.
 */
export interface CompilerOptions {
  /** Border template file. Defaults to the bundled `data/templates/fullscreen.s`. */
  templatePath?: string;
  /** JSON file of external cycle overrides (instruction text or shape -> cycles). */
  overridesPath?: string;
  /** Exact cycle total of every scanline (default 512). */
  width?: number;
  /** Granularity table-derived costs are rounded up to (default 4; 1 disables). */
  roundTo?: number;
  /** Symbol bound to the scanline count (default `SCANLINES_CONSUMED`). */
  label?: string;
  /** Padding style (default `nop`). */
  padStyle?: PadStyle;
  /** Emit the JSON cycle report (`.cycles.json`). */
  emitReport?: boolean;
  /** Version shown in the output banner. Defaults to the package version. */
  toolVersion?: string;
}

/**
 * Result of a compilation run: diagnostics plus any produced artifacts.
 */
export interface CompileResult {
  diagnostics: Diagnostic[];
  artifacts: Artifact[];
}

/**
 * Dependency injection surface for the pipeline.
 *
 * Callers provide concrete format writers so the core pipeline can be pure/in-memory.
 */
export interface PipelineDeps {
  formats: FormatWriters;
}

/**
 * Top-level compile function signature used by the pipeline contract.
 */
export type CompileFn = (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
) => Promise<CompileResult>;
