import { basename, isAbsolute, relative, resolve } from 'node:path';
import type { ValidationReport } from '../engine.js';
import type {
  CrossReference,
  ReferenceKind,
  Severity,
  SeveritySummary,
  ValidationResult,
  ValidationStatus,
} from '../types.js';

export interface IssueJson {
  file_path: string;
  rule_name: string;
  severity: Severity;
  line_number: number | null;
  message: string;
  suggestion: string | null;
  validated_at: string;
}

export interface ValidationJson {
  success: boolean;
  strict: boolean;
  file_count: number;
  issues: IssueJson[];
  summary: SeveritySummary;
}

export interface ReferenceJson {
  term: string;
  canonical_term: string | null;
  file: string;
  line: number;
  context: string;
  valid: boolean;
  reference_type: ReferenceKind;
}

export interface BrokenLinkJson {
  file: string;
  line: number;
  link: string;
  target: string;
}

export interface CrossRefJson {
  term_count: number;
  references: ReferenceJson[];
  broken_links: BrokenLinkJson[];
  orphans: string[];
  cycles: string[][];
}

export interface FileStatusJson {
  path: string;
  name: string;
  status: ValidationStatus;
  last_validated: string | null;
  issue_count: { errors: number; warnings: number };
}

export interface StatusJson {
  files: FileStatusJson[];
  last_validation: string;
  overall_status: ValidationStatus;
  statistics: {
    total_terms: number;
    total_references: number;
    broken_references: number;
  };
}

export interface ReferenceFilter {
  term?: string;
  file?: string;
}

/** Path relative to `baseDir` when the file lives below it, unchanged otherwise. */
export function displayPath(path: string, baseDir?: string): string {
  if (!baseDir) return path;
  const rel = relative(baseDir, path);
  return rel && !rel.startsWith('..') && !isAbsolute(rel) ? rel : path;
}

export function previewContext(context: string, maxLength = 50): string {
  return context.length > maxLength ? `${context.slice(0, maxLength - 3)}...` : context;
}

function issueJson(result: ValidationResult, baseDir?: string): IssueJson {
  return {
    file_path: displayPath(result.filePath, baseDir),
    rule_name: result.ruleName,
    severity: result.severity,
    line_number: result.lineNumber ?? null,
    message: result.message,
    suggestion: result.suggestion ?? null,
    validated_at: result.validatedAt.toISOString(),
  };
}

export function toValidationJson(report: ValidationReport, baseDir?: string): ValidationJson {
  return {
    success: report.success,
    strict: report.strict,
    file_count: report.paths.length,
    issues: report.results.map((result) => issueJson(result, baseDir)),
    summary: report.summary,
  };
}

/**
 * Keep references whose term (or canonical term) contains `term`,
 * case-insensitively, and whose source matches `file` by path or name.
 */
export function filterReferences(
  references: CrossReference[],
  filter: ReferenceFilter
): CrossReference[] {
  const term = filter.term?.toLowerCase();
  const file = filter.file;
  const filePath = file ? resolve(file) : undefined;
  const fileName = file ? basename(file) : undefined;

  return references.filter((ref) => {
    if (term) {
      const matchesTerm =
        ref.term.toLowerCase().includes(term) ||
        (ref.canonicalTerm?.toLowerCase().includes(term) ?? false);
      if (!matchesTerm) return false;
    }
    if (file) {
      if (ref.sourceFile !== filePath && basename(ref.sourceFile) !== fileName) return false;
    }
    return true;
  });
}

export function toCrossRefJson(
  report: ValidationReport,
  filter: ReferenceFilter = {},
  baseDir?: string
): CrossRefJson {
  const references = filterReferences(report.references, filter);

  return {
    term_count: new Set(references.map((ref) => ref.canonicalTerm ?? ref.term)).size,
    references: references.map((ref) => ({
      term: ref.term,
      canonical_term: ref.canonicalTerm ?? null,
      file: displayPath(ref.sourceFile, baseDir),
      line: ref.line,
      context: previewContext(ref.context),
      valid: ref.isValid,
      reference_type: ref.kind,
    })),
    broken_links: references
      .filter((ref) => ref.kind === 'link' && !ref.isValid)
      .map((ref) => ({
        file: displayPath(ref.sourceFile, baseDir),
        line: ref.line,
        link: ref.term,
        target: ref.target ?? ref.term,
      })),
    orphans: report.graph.orphans().map((path) => displayPath(path, baseDir)),
    cycles: report.graph.cycles().map((cycle) => cycle.map((path) => displayPath(path, baseDir))),
  };
}

export function overallStatus(statuses: ValidationStatus[]): ValidationStatus {
  if (statuses.length === 0) return 'not_validated';
  if (statuses.includes('invalid')) return 'invalid';
  if (statuses.includes('not_validated')) return 'not_validated';
  return 'valid';
}

export function toStatusJson(report: ValidationReport, baseDir?: string): StatusJson {
  const byPath = new Map(report.files.map((file) => [file.path, file]));

  const files: FileStatusJson[] = report.paths.map((path) => {
    const file = byPath.get(path);
    const own = report.results.filter((result) => result.filePath === path);
    return {
      path: displayPath(path, baseDir),
      name: file?.fileName ?? basename(path),
      status: file?.status ?? 'invalid',
      last_validated: file?.lastValidated?.toISOString() ?? null,
      issue_count: {
        errors: own.filter((result) => result.severity === 'error').length,
        warnings: own.filter((result) => result.severity === 'warning').length,
      },
    };
  });

  const lastValidation = report.files.reduce<Date | undefined>((latest, file) => {
    if (!file.lastValidated) return latest;
    return !latest || file.lastValidated > latest ? file.lastValidated : latest;
  }, undefined);

  return {
    files,
    last_validation: (lastValidation ?? new Date()).toISOString(),
    overall_status: overallStatus(files.map((file) => file.status)),
    statistics: {
      total_terms: report.terms.size,
      total_references: report.references.length,
      broken_references: report.references.filter((ref) => !ref.isValid).length,
    },
  };
}
