import { ArchitectureReport, Violation } from './ArchitectureChecker';

function formatViolation(violation: Violation): string {
  const where = violation.line === undefined ? '' : `line ${violation.line}: `;
  return `  ${where}[${violation.rule}] ${violation.message}`;
}

/**
 * Human-readable report, grouped by file.
 *
 * ```
 * app/features/articles/domain/entities/Article.ts
 *   [file-naming] File name 'Article.ts' is not snake_case
 *
 * 1 violation(s) in 12 file(s) checked.
 * ```
 */
export function formatReport(report: ArchitectureReport): string {
  if (report.violations.length === 0) {
    return `No architecture violations in ${report.filesChecked} file(s).`;
  }

  const lines: string[] = [];
  let currentFile: string | undefined;

  for (const violation of report.violations) {
    if (violation.file !== currentFile) {
      if (currentFile !== undefined) lines.push('');
      lines.push(violation.file);
      currentFile = violation.file;
    }
    lines.push(formatViolation(violation));
  }

  lines.push('', `${report.violations.length} violation(s) in ${report.filesChecked} file(s) checked.`);
  return lines.join('\n');
}
