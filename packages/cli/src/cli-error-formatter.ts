/**
 * CLI Error Formatter
 * Format diagnostics with a source snippet
 */

import type { Diagnostic } from '@bozon/queries';

export interface SnippetLine {
  readonly lineNumber: number;
  readonly content: string;
  readonly isErrorLine: boolean;
}

/**
 * Source lines around a 1-based line: the line before (if any) and the line itself.
 */
export function extractSnippet(source: string, line: number): SnippetLine[] {
  const lines = source.split('\n');
  const snippet: SnippetLine[] = [];
  for (let n = Math.max(1, line - 1); n <= line; n++) {
    const content = lines[n - 1];
    if (content === undefined) break;
    snippet.push({
      lineNumber: n,
      content: content.replace(/\r$/, ''),
      isErrorLine: n === line,
    });
  }
  return snippet;
}

/** Caret under a 1-based column */
export function renderCaret(column: number): string {
  return `${' '.repeat(Math.max(0, column - 1))}^`;
}

/**
 * Format a diagnostic for the terminal:
 * ```
 * error[BOZON-P001]: Unexpected ')', expected one of: ...
 *   --> main.bz:1:4
 *    |
 *  1 | (a))
 *    |    ^
 *    |
 * ```
 */
export function formatDiagnostic(
  diagnostic: Diagnostic,
  source: string
): string {
  const lines: string[] = [];
  const { file, line, column } = diagnostic;
  lines.push(
    `${diagnostic.severity}[${diagnostic.errorId}]: ${diagnostic.message}`
  );
  lines.push(`  --> ${file}:${line}:${column}`);

  const snippet = extractSnippet(source, line);
  if (snippet.length > 0) {
    const width = String(line).length;
    const gutter = ' '.repeat(width);
    lines.push(` ${gutter} |`);
    for (const entry of snippet) {
      const lineNumber = String(entry.lineNumber).padStart(width, ' ');
      lines.push(` ${lineNumber} | ${entry.content}`);
      if (entry.isErrorLine) {
        lines.push(` ${gutter} | ${renderCaret(column)}`);
      }
    }
    lines.push(` ${gutter} |`);
  }

  return lines.join('\n');
}
