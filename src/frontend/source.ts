/**
 * Source file split into physical lines. Line `n` (1-based) is `lines[n - 1]`.
 */
export interface SourceFile {
  path: string;
  text: string;
  lines: string[];
}

/**
 * Build a {@link SourceFile} from a path and UTF-8 source text.
 *
 * Accepts `\n` and `\r\n` line endings; a trailing newline does not produce an extra empty line.
 */
export function makeSourceFile(path: string, text: string): SourceFile {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return { path, text, lines };
}
