import type { Diagnostic } from './types.js';

export interface ReportOptions {
  // ANSI colours
  color?: boolean;
}

export function groupDiagnostics(diagnostics: Diagnostic[]) {
  const errs = diagnostics.filter(d => d.severity === 'error');
  const warns = diagnostics.filter(d => d.severity === 'warning');
  return { errs, warns };
}

export function textReport(filename: string, content: string, diagnostics: Diagnostic[], options: ReportOptions = {}): string {
  const color = options.color ?? true;
  const paint = (code: string, s: string) => (color ? `\x1b[${code}m${s}\x1b[0m` : s);
  const { errs, warns } = groupDiagnostics(diagnostics);
  const allLines = content.split(/\r?\n/);
  const lines: string[] = [];

  const printBlock = (kind: 'error' | 'warning', d: Diagnostic) => {
    const kindLabel = kind === 'error' ? paint('31', 'error') : paint('33', 'warning');
    lines.push(`${kindLabel}[${d.code}]: ${d.message}`);
    if (d.line !== undefined) {
      const line = d.line;
      const column = d.column ?? 1;
      lines.push(`at ${filename}:${line}:${column}`);
      const numWidth = String(Math.min(allLines.length, line + 1)).length;
      const fmtNum = (n: number) => String(n).padStart(numWidth, ' ');
      const idx = Math.max(0, Math.min(allLines.length - 1, line - 1));
      const prev = idx > 0 ? allLines[idx - 1] : undefined;
      const text = allLines[idx] ?? '';
      const next = idx + 1 < allLines.length ? allLines[idx + 1] : undefined;
      if (typeof prev === 'string') lines.push(`  ${fmtNum(idx)} | ${prev}`);
      lines.push(`  ${fmtNum(idx + 1)} | ${text}`);
      const caretPad = ' '.repeat(Math.max(0, column - 1));
      const caretLen = Math.max(1, d.length ?? 1);
      lines.push(`  ${' '.repeat(numWidth)} | ${caretPad}${paint('31', '^'.repeat(caretLen))}`);
      if (typeof next === 'string') lines.push(`  ${fmtNum(idx + 2)} | ${next}`);
    } else {
      lines.push(d.element ? `at ${filename} (${d.element})` : `at ${filename}`);
    }
    if (d.hint) {
      const hintLines = String(d.hint).split(/\r?\n/);
      lines.push(`hint: ${hintLines[0]}`);
      for (let i = 1; i < hintLines.length; i++) {
        lines.push(`  ${hintLines[i]}`);
      }
    }
    lines.push('');
  };

  for (const e of errs) printBlock('error', e);
  for (const w of warns) printBlock('warning', w);
  if (errs.length === 0 && warns.length === 0) return 'OK';
  return lines.join('\n');
}

/**
 * Everything the CLI prints to stderr for one rendered file: the failure line when
 * the render failed, then each diagnostic once. Empty when there is nothing to say.
 */
export function renderReport(
  filename: string,
  content: string,
  failure: { message: string } | null,
  diagnostics: Diagnostic[],
  options: ReportOptions = {},
): string {
  const lines: string[] = [];
  if (failure) lines.push(`Could not render ${filename}: ${failure.message}`);
  if (diagnostics.length > 0) lines.push(textReport(filename, content, diagnostics, options).trimEnd());
  return lines.join('\n');
}

export function toJsonResult<T extends object>(filename: string, diagnostics: Diagnostic[], extra?: T) {
  const { errs, warns } = groupDiagnostics(diagnostics);
  return {
    file: filename,
    ok: errs.length === 0,
    errorCount: errs.length,
    warningCount: warns.length,
    errors: errs,
    warnings: warns,
    ...extra,
  };
}
