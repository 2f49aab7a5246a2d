import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { ExprNode } from '../frontend/ast.js';

/**
 * Integer variables visible to one repeat frame (name -> current value).
 *
 * Each frame owns its map outright: nested frames receive a copy via {@link snapshotScope},
 * so a `SET` can only ever change the frame it runs in.
 */
export type VariableScope = Map<string, number>;

/**
 * Where an expression is evaluated, used to locate diagnostics.
 */
export interface EvalSite {
  file: string;
  line: number;
  reptPath?: string[];
}

/**
 * Copy a scope for a newly entered frame.
 */
export function snapshotScope(scope: ReadonlyMap<string, number>): VariableScope {
  return new Map(scope);
}

function report(
  diagnostics: Diagnostic[],
  site: EvalSite,
  id: typeof DiagnosticIds.UndefinedVariable | typeof DiagnosticIds.DivideByZero,
  message: string,
): void {
  diagnostics.push({
    id,
    severity: 'error',
    message,
    file: site.file,
    line: site.line,
    ...(site.reptPath && site.reptPath.length > 0 ? { reptPath: site.reptPath } : {}),
  });
}

/**
 * Evaluate an integer expression against a variable scope.
 *
 * Division truncates toward zero. Unknown names and division by zero append an error and yield
 * `undefined`.
 */
export function evalExpr(
  expr: ExprNode,
  scope: ReadonlyMap<string, number>,
  site: EvalSite,
  diagnostics: Diagnostic[],
): number | undefined {
  switch (expr.kind) {
    case 'ExprLiteral':
      return expr.value;
    case 'ExprName': {
      const value = scope.get(expr.name);
      if (value === undefined) {
        report(
          diagnostics,
          site,
          DiagnosticIds.UndefinedVariable,
          `Undefined variable "${expr.name}".`,
        );
      }
      return value;
    }
    case 'ExprUnary': {
      const v = evalExpr(expr.expr, scope, site, diagnostics);
      if (v === undefined) return undefined;
      return expr.op === '-' ? -v : v;
    }
    case 'ExprBinary': {
      const l = evalExpr(expr.left, scope, site, diagnostics);
      if (l === undefined) return undefined;
      const r = evalExpr(expr.right, scope, site, diagnostics);
      if (r === undefined) return undefined;
      switch (expr.op) {
        case '+':
          return l + r;
        case '-':
          return l - r;
        case '*':
          return l * r;
        case '/':
          if (r === 0) {
            report(diagnostics, site, DiagnosticIds.DivideByZero, 'Divide by zero in expression.');
            return undefined;
          }
          return Math.trunc(l / r);
      }
    }
  }
}
