import { createResult, escalated } from '../results.js';
import { isTerminologyFile, missingTerms } from '../terminology.js';
import type { Config, DocumentationFile, ValidationResult } from '../types.js';

function body(doc: DocumentationFile): string {
  if (doc.frontmatterLineCount === 0) return doc.content;
  return doc.content.split(/\r?\n/).slice(doc.frontmatterLineCount).join('\n');
}

export function isComplianceFile(doc: DocumentationFile, config: Config): boolean {
  return config.compliance.files.some((stem) => doc.name.includes(stem.toLowerCase()));
}

/**
 * Corpus-level content rules: minimum length for every document, required
 * marker terms in the terminology file and the compliance keyword in the
 * pipeline specification.
 */
export function validateCompleteness(
  documents: DocumentationFile[],
  config: Config,
  strict: boolean
): ValidationResult[] {
  const warnings: ValidationResult[] = [];
  const severity = escalated(strict);

  for (const doc of documents) {
    const length = body(doc).trim().length;
    if (length < config.minContentLength) {
      warnings.push(
        createResult({
          filePath: doc.path,
          ruleName: 'content_completeness',
          severity,
          message: `Document content is shorter than the minimum length of ${config.minContentLength} characters (found ${length})`,
          suggestion: 'Add meaningful content to the document',
        })
      );
    }

    if (isTerminologyFile(doc, config)) {
      const missing = missingTerms(doc, config.terminology.requiredTerms);
      if (missing.length > 0) {
        warnings.push(
          createResult({
            filePath: doc.path,
            ruleName: 'terminology_completeness',
            severity,
            message: `Missing key marker terms: ${missing.join(', ')}`,
            suggestion: `Add definitions for all marker levels (${config.terminology.requiredTerms.join(', ')})`,
          })
        );
      }
    }

    if (isComplianceFile(doc, config)) {
      const keyword = config.compliance.keyword;
      if (!doc.content.toLowerCase().includes(keyword.toLowerCase())) {
        warnings.push(
          createResult({
            filePath: doc.path,
            ruleName: 'ld_compliance',
            severity,
            message: `No mention of the ${keyword} specification found`,
            suggestion: `Reference ${keyword} for marker compliance`,
          })
        );
      }
    }
  }

  return warnings;
}
