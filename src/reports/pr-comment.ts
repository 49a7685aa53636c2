import type { SeveritySummary, ValidationResult } from '../types.js';
import { displayPath } from './json.js';
import { SEVERITY_SYMBOL } from './text.js';

/** Hidden marker used to find and update our own comment on later runs. */
export const COMMENT_MARKER = '<!-- docs-crosscheck-report -->';

const DEFAULT_MAX_ROWS = 50;

export interface PrCommentData {
  success: boolean;
  strict: boolean;
  fileCount: number;
  summary: SeveritySummary;
  issues: ValidationResult[];
  /** Paths in the table are shown relative to this directory */
  baseDir?: string;
  maxRows?: number;
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

export function renderPrComment(data: PrCommentData): string {
  const lines: string[] = [];
  const { errors, warnings, info } = data.summary;

  lines.push('## Documentation Cross-Check');
  lines.push('');
  lines.push(`**Status:** ${data.success ? '✅ Pass' : '❌ Fail'}`);
  lines.push(`**Files checked:** ${data.fileCount} · **Strict mode:** ${data.strict ? 'on' : 'off'}`);
  lines.push(`**Findings:** ${errors} errors, ${warnings} warnings, ${info} info`);
  lines.push('');

  if (data.issues.length === 0) {
    lines.push('No findings. All documents are consistent.');
  } else {
    const maxRows = data.maxRows ?? DEFAULT_MAX_ROWS;
    lines.push('### Findings');
    lines.push('');
    lines.push('| Severity | File | Line | Rule | Message |');
    lines.push('|----------|------|------|------|---------|');
    for (const issue of data.issues.slice(0, maxRows)) {
      lines.push(
        `| ${SEVERITY_SYMBOL[issue.severity]} ${issue.severity} | ${escapeCell(displayPath(issue.filePath, data.baseDir))} | ${issue.lineNumber ?? ''} | \`${issue.ruleName}\` | ${escapeCell(issue.message)} |`
      );
    }
    if (data.issues.length > maxRows) {
      lines.push('');
      lines.push(`…and ${data.issues.length - maxRows} more findings.`);
    }
  }

  lines.push('');
  lines.push('---');
  lines.push('*Generated by docs-crosscheck*');
  return lines.join('\n');
}

export function buildCommentBody(data: PrCommentData): string {
  return `${COMMENT_MARKER}\n${renderPrComment(data)}`;
}
