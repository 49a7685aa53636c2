import type { Severity, SeveritySummary, ValidationResult } from './types.js';

export interface ResultInit {
  filePath: string;
  ruleName: string;
  severity: Severity;
  message: string;
  lineNumber?: number;
  suggestion?: string;
}

export function createResult(init: ResultInit): ValidationResult {
  const result: ValidationResult = {
    filePath: init.filePath,
    ruleName: init.ruleName,
    severity: init.severity,
    message: init.message,
    validatedAt: new Date(),
  };
  if (init.lineNumber !== undefined) result.lineNumber = init.lineNumber;
  if (init.suggestion) result.suggestion = init.suggestion;
  return result;
}

/** Severity of a rule that is a warning normally and an error under strict mode. */
export function escalated(strict: boolean): Severity {
  return strict ? 'error' : 'warning';
}

export function summarize(results: ValidationResult[]): SeveritySummary {
  const summary: SeveritySummary = { errors: 0, warnings: 0, info: 0 };
  for (const result of results) {
    if (result.severity === 'error') summary.errors++;
    else if (result.severity === 'warning') summary.warnings++;
    else summary.info++;
  }
  return summary;
}

/**
 * A run fails on any error, and under strict mode on any warning.
 * Info findings never affect the outcome.
 */
export function isSuccess(summary: SeveritySummary, strict: boolean): boolean {
  if (summary.errors > 0) return false;
  if (strict && summary.warnings > 0) return false;
  return true;
}

/**
 * Order findings by file and line. Findings without a line sort first
 * within their file; ties keep their insertion order.
 */
export function sortResults(results: ValidationResult[]): ValidationResult[] {
  return results
    .map((result, index) => ({ result, index }))
    .sort((a, b) => {
      if (a.result.filePath !== b.result.filePath) {
        return a.result.filePath < b.result.filePath ? -1 : 1;
      }
      const lineA = a.result.lineNumber ?? 0;
      const lineB = b.result.lineNumber ?? 0;
      if (lineA !== lineB) return lineA - lineB;
      return a.index - b.index;
    })
    .map(({ result }) => result);
}
