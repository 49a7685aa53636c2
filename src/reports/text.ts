import { basename } from 'node:path';
import type { ValidationReport } from '../engine.js';
import type { Severity, ValidationResult, ValidationStatus } from '../types.js';
import {
  displayPath,
  filterReferences,
  toStatusJson,
  type ReferenceFilter,
} from './json.js';

export const SEVERITY_SYMBOL: Record<Severity, string> = {
  error: '✗',
  warning: '⚠',
  info: 'ℹ',
};

const STATUS_SYMBOL: Record<ValidationStatus, string> = {
  valid: '✓',
  invalid: '✗',
  not_validated: '?',
};

const STATUS_TEXT: Record<ValidationStatus, string> = {
  valid: 'VALID',
  invalid: 'INVALID',
  not_validated: 'NOT VALIDATED',
};

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

export function formatIssue(result: ValidationResult): string[] {
  const lineInfo = result.lineNumber !== undefined ? ` (line ${result.lineNumber})` : '';
  const lines = [`  ${SEVERITY_SYMBOL[result.severity]} ${result.message}${lineInfo}`];
  if (result.suggestion) {
    lines.push(`    Suggestion: ${result.suggestion}`);
  }
  return lines;
}

export function renderValidationText(report: ValidationReport, baseDir?: string): string {
  const lines: string[] = [];
  const fileCount = report.paths.length;

  if (report.results.length === 0) {
    if (fileCount > 0) {
      lines.push('✓ All documentation files are valid');
      lines.push(`Files checked: ${fileCount}`);
    } else {
      lines.push('No documentation files found to validate');
    }
    return lines.join('\n');
  }

  const byFile = new Map<string, ValidationResult[]>();
  for (const result of report.results) {
    const list = byFile.get(result.filePath) ?? [];
    list.push(result);
    byFile.set(result.filePath, list);
  }

  for (const [filePath, issues] of byFile) {
    const name = displayPath(filePath, baseDir);
    const hasErrors = issues.some((issue) => issue.severity === 'error');
    lines.push(`${hasErrors ? '✗' : '⚠'} ${name}: ${plural(issues.length, 'issue')} found`);
    for (const issue of issues) {
      lines.push(...formatIssue(issue));
    }
  }

  const { errors, warnings, info } = report.summary;
  lines.push('');
  lines.push('Validation Summary:');
  lines.push(`- Files checked: ${fileCount}`);
  lines.push(
    `- Issues found: ${report.results.length} (${plural(errors, 'error')}, ${plural(warnings, 'warning')}, ${info} info)`
  );
  lines.push(`- Strict mode: ${report.strict ? 'on' : 'off'}`);
  lines.push(`- Status: ${report.success ? 'PASS' : 'FAIL'}`);

  return lines.join('\n');
}

export function renderCrossRefText(
  report: ValidationReport,
  filter: ReferenceFilter = {},
  baseDir?: string
): string {
  const references = filterReferences(report.references, filter);
  const lines: string[] = [];

  if (references.length === 0) {
    if (filter.term) lines.push(`No references found for term: ${filter.term}`);
    else if (filter.file) lines.push(`No cross-references found in: ${basename(filter.file)}`);
    else lines.push('No cross-references found in documentation');
    return lines.join('\n');
  }

  lines.push('Cross-Reference Report:');
  lines.push('');

  const byTerm = new Map<string, typeof references>();
  for (const ref of references) {
    const key = ref.canonicalTerm ?? ref.term;
    const list = byTerm.get(key) ?? [];
    list.push(ref);
    byTerm.set(key, list);
  }

  lines.push(`Terms Checked: ${byTerm.size}`);
  for (const [term, refs] of byTerm) {
    const broken = refs.filter((ref) => !ref.isValid);
    if (broken.length === 0) {
      lines.push(`✓ ${term}: ${plural(refs.length, 'reference')}, all valid`);
      continue;
    }
    lines.push(`✗ ${term}: ${plural(refs.length, 'reference')}, ${broken.length} broken`);
    for (const ref of broken) {
      lines.push(`  - ${displayPath(ref.sourceFile, baseDir)}:${ref.line} → broken reference`);
    }
  }

  const brokenLinks = references.filter((ref) => ref.kind === 'link' && !ref.isValid);
  if (brokenLinks.length > 0) {
    lines.push('');
    lines.push('Broken Links:');
    for (const ref of brokenLinks) {
      lines.push(
        `- ${displayPath(ref.sourceFile, baseDir)}:${ref.line} → '${ref.target ?? ref.term}' (target not found)`
      );
    }
  }

  const brokenCount = references.filter((ref) => !ref.isValid).length;
  lines.push('');
  lines.push(`Summary: ${references.length} references checked, ${brokenCount} broken`);

  return lines.join('\n');
}

export function renderStatusText(report: ValidationReport, baseDir?: string): string {
  const status = toStatusJson(report, baseDir);
  const lines: string[] = ['Documentation Status Report', ''];

  if (status.files.length === 0) {
    lines.push('No documentation files found');
    return lines.join('\n');
  }

  lines.push('Files:');
  for (const file of status.files) {
    const timeInfo = file.last_validated
      ? `Last validated: ${file.last_validated}`
      : 'Not validated';
    lines.push(`${STATUS_SYMBOL[file.status]} ${file.name.padEnd(20)} ${timeInfo}`);
  }

  lines.push('');
  lines.push('Statistics:');
  lines.push(`- Total terms defined: ${status.statistics.total_terms}`);
  lines.push(`- Total references: ${status.statistics.total_references}`);
  lines.push(`- Broken references: ${status.statistics.broken_references}`);
  lines.push('');
  lines.push(`Overall Status: ${STATUS_TEXT[status.overall_status]}`);

  return lines.join('\n');
}
