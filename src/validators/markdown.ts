import { createResult, escalated } from '../results.js';
import type { DocumentationFile, ValidationResult } from '../types.js';

/**
 * Validate markdown structure: a level-1 title, balanced link syntax and
 * heading hierarchy.
 */
export function validateMarkdown(
  documents: DocumentationFile[],
  strict: boolean
): ValidationResult[] {
  const warnings: ValidationResult[] = [];

  for (const doc of documents) {
    if (doc.title === undefined) {
      warnings.push(
        createResult({
          filePath: doc.path,
          ruleName: 'markdown_structure',
          severity: escalated(strict),
          lineNumber: 1,
          message: 'Document has no main title (# Title)',
          suggestion: 'Add a level-1 heading at the beginning of the document',
        })
      );
    }

    for (const malformed of doc.malformedLinks) {
      warnings.push(
        createResult({
          filePath: doc.path,
          ruleName: 'markdown_syntax',
          severity: escalated(strict),
          lineNumber: malformed.line,
          message: `Unbalanced markdown link syntax: ${malformed.text}`,
          suggestion: 'Check that every link target is closed with a matching parenthesis',
        })
      );
    }

    // Skipped heading levels (e.g., H1 → H3 without H2)
    let lastHeadingLevel = 0;
    for (const heading of doc.headings) {
      if (lastHeadingLevel > 0 && heading.level > lastHeadingLevel + 1) {
        warnings.push(
          createResult({
            filePath: doc.path,
            ruleName: 'heading_hierarchy',
            severity: 'info',
            lineNumber: heading.line,
            message: `Skipped heading level: H${lastHeadingLevel} → H${heading.level} (missing H${lastHeadingLevel + 1})`,
            suggestion: `Use an H${lastHeadingLevel + 1} heading here`,
          })
        );
      }
      lastHeadingLevel = heading.level;
    }
  }

  return warnings;
}
