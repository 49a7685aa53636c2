import { describe, it, expect } from 'vitest';
import { renderPrComment, buildCommentBody, COMMENT_MARKER } from '../src/reports/pr-comment.js';
import type { PrCommentData } from '../src/reports/pr-comment.js';
import { createResult } from '../src/results.js';

describe('renderPrComment', () => {
  const baseData: PrCommentData = {
    success: false,
    strict: false,
    fileCount: 3,
    summary: { errors: 1, warnings: 1, info: 0 },
    issues: [
      createResult({
        filePath: '/repo/docs/marker.md',
        ruleName: 'cross_reference',
        severity: 'error',
        lineNumber: 12,
        message: 'Broken link: target file "gone.md" not found in the documentation set',
      }),
      createResult({
        filePath: '/repo/docs/terminologie.md',
        ruleName: 'terminology_completeness',
        severity: 'warning',
        message: 'Missing key marker terms: MEMA',
      }),
    ],
    baseDir: '/repo',
  };

  it('renders the status header', () => {
    const comment = renderPrComment(baseData);
    expect(comment).toContain('## Documentation Cross-Check');
    expect(comment).toContain('**Status:** ❌ Fail');
    expect(comment).toContain('**Files checked:** 3 · **Strict mode:** off');
    expect(comment).toContain('**Findings:** 1 errors, 1 warnings, 0 info');
  });

  it('renders one table row per finding with relative paths', () => {
    const lines = renderPrComment(baseData).split('\n');
    expect(lines).toContain(
      '| ✗ error | docs/marker.md | 12 | `cross_reference` | Broken link: target file "gone.md" not found in the documentation set |'
    );
    expect(lines).toContain(
      '| ⚠ warning | docs/terminologie.md |  | `terminology_completeness` | Missing key marker terms: MEMA |'
    );
  });

  it('escapes pipes in messages', () => {
    const comment = renderPrComment({
      ...baseData,
      issues: [
        createResult({
          filePath: '/repo/docs/a.md',
          ruleName: 'markdown_syntax',
          severity: 'warning',
          lineNumber: 2,
          message: 'Unbalanced markdown link syntax: [a|b](x',
        }),
      ],
    });
    expect(comment).toContain('Unbalanced markdown link syntax: [a\\|b](x |');
  });

  it('caps the table and says how many rows were left out', () => {
    const comment = renderPrComment({ ...baseData, maxRows: 1 });
    expect(comment).not.toContain('docs/terminologie.md');
    expect(comment).toContain('…and 1 more findings.');
  });

  it('renders a pass without a table', () => {
    const comment = renderPrComment({
      ...baseData,
      success: true,
      summary: { errors: 0, warnings: 0, info: 0 },
      issues: [],
    });
    expect(comment).toContain('**Status:** ✅ Pass');
    expect(comment).toContain('No findings. All documents are consistent.');
    expect(comment).not.toContain('### Findings');
  });

  it('includes the footer', () => {
    expect(renderPrComment(baseData)).toContain('*Generated by docs-crosscheck*');
  });
});

describe('buildCommentBody', () => {
  it('starts with the hidden marker', () => {
    const body = buildCommentBody({
      success: true,
      strict: true,
      fileCount: 0,
      summary: { errors: 0, warnings: 0, info: 0 },
      issues: [],
    });
    expect(body.startsWith(`${COMMENT_MARKER}\n## Documentation Cross-Check`)).toBe(true);
  });
});
