import { stat } from 'node:fs/promises';
import { basename, resolve } from 'node:path';
import { defaultConfig } from './config.js';
import { CorpusUnavailableError, ParseError, errorMessage } from './errors.js';
import type { ReferenceGraph } from './graph.js';
import { silentLogger, type Logger } from './logger.js';
import {
  collectMarkdownFiles,
  parseDocumentationFile,
  type DirectoryReader,
  type ParseOutcome,
} from './parser.js';
import { createResult, isSuccess, sortResults, summarize } from './results.js';
import { extractTerminology, type TermIndex } from './terminology.js';
import { validateCompleteness } from './validators/completeness.js';
import { validateCrossReferences } from './validators/cross-reference.js';
import { validateMarkdown } from './validators/markdown.js';
import type {
  Config,
  CrossReference,
  DocumentationFile,
  SeveritySummary,
  ValidateOptions,
  ValidationResult,
} from './types.js';

export interface ValidationReport {
  success: boolean;
  strict: boolean;
  /** Every corpus file, including those that could not be read */
  paths: string[];
  /** Files that were parsed, in corpus order */
  files: DocumentationFile[];
  unreadable: string[];
  results: ValidationResult[];
  references: CrossReference[];
  terms: TermIndex;
  graph: ReferenceGraph;
  summary: SeveritySummary;
  durationMs: number;
}

export interface EngineOptions {
  config?: Config;
  logger?: Logger;
  /** Directory listing used to expand corpus directories */
  readDir?: DirectoryReader;
}

interface ExpandedCorpus {
  paths: string[];
  /** Errors for directories below a corpus root that could not be listed */
  results: ValidationResult[];
}

type ParseAttempt =
  | { path: string; outcome: ParseOutcome }
  | { path: string; error: unknown };

/**
 * Runs the validation pipeline: parse every file, extract terminology,
 * apply content rules, resolve cross-references and aggregate findings.
 * Each call to `validate` is independent of the previous ones; the last
 * report is only kept for `status`.
 */
export class ValidationEngine {
  private readonly config: Config;
  private readonly logger: Logger;
  private readonly readDir: DirectoryReader | undefined;
  private lastReport: ValidationReport | undefined;

  constructor(options: EngineOptions = {}) {
    this.config = options.config ?? defaultConfig();
    this.logger = options.logger ?? silentLogger;
    this.readDir = options.readDir;
  }

  getLastReport(): ValidationReport | undefined {
    return this.lastReport;
  }

  /** Last report, or a fresh run over `corpusPaths` when nothing was validated yet. */
  async status(corpusPaths: string[]): Promise<ValidationReport> {
    return this.lastReport ?? this.validate(corpusPaths);
  }

  async validate(corpusPaths: string[], options: ValidateOptions = {}): Promise<ValidationReport> {
    const started = Date.now();
    const strict = options.strict ?? this.config.strict;
    const { paths, results: walkResults } = await this.expandCorpus(corpusPaths);
    this.logger.debug(`Corpus: ${paths.length} markdown files`);

    const attempts = await Promise.all(paths.map((path) => this.parse(path)));

    const files: DocumentationFile[] = [];
    const unreadable: string[] = [];
    const parseResults: ValidationResult[] = [];
    for (const attempt of attempts) {
      if ('outcome' in attempt) {
        files.push(attempt.outcome.file);
        parseResults.push(...attempt.outcome.results);
      } else {
        unreadable.push(attempt.path);
        parseResults.push(this.parseFailure(attempt.path, attempt.error));
      }
    }

    if (paths.length > 0 && files.length === 0) {
      throw new CorpusUnavailableError(
        corpusPaths,
        `None of the ${paths.length} documentation files could be read`
      );
    }

    const { index: terms, results: terminologyResults } = extractTerminology(files, this.config);
    this.logger.debug(`Term index: ${terms.size} terms`);

    const structureResults = validateMarkdown(files, strict);
    const completenessResults = validateCompleteness(files, this.config, strict);
    const crossRefs = validateCrossReferences(files, terms, this.config);

    let results = [
      ...walkResults,
      ...parseResults,
      ...terminologyResults,
      ...structureResults,
      ...completenessResults,
      ...crossRefs.results,
    ];

    const isTarget = this.targetFilter(options.targetFiles);
    results = sortResults(results.filter((result) => isTarget(result.filePath)));

    const validatedAt = new Date();
    for (const file of files) {
      if (!isTarget(file.path)) continue;
      const hasError = results.some((r) => r.filePath === file.path && r.severity === 'error');
      file.status = hasError ? 'invalid' : 'valid';
      file.lastValidated = validatedAt;
    }

    const summary = summarize(results);
    const report: ValidationReport = {
      success: isSuccess(summary, strict),
      strict,
      paths,
      files,
      unreadable,
      results,
      references: crossRefs.references,
      terms,
      graph: crossRefs.graph,
      summary,
      durationMs: Date.now() - started,
    };

    this.logger.info(
      `Validated ${paths.length} files in ${report.durationMs}ms: ` +
        `${summary.errors} errors, ${summary.warnings} warnings, ${summary.info} info`
    );

    this.lastReport = report;
    return report;
  }

  private async parse(path: string): Promise<ParseAttempt> {
    try {
      return { path, outcome: await parseDocumentationFile(path) };
    } catch (error) {
      this.logger.warning(`Failed to parse ${path}: ${errorMessage(error)}`);
      return { path, error };
    }
  }

  private parseFailure(path: string, error: unknown): ValidationResult {
    if (error instanceof ParseError && error.kind === 'not_found') {
      return createResult({
        filePath: path,
        ruleName: 'file_exists',
        severity: 'error',
        message: 'File does not exist',
        suggestion: 'Remove the path from the documentation set or restore the file',
      });
    }
    return createResult({
      filePath: path,
      ruleName: 'file_access',
      severity: 'error',
      message: `Failed to read file: ${errorMessage(error)}`,
      suggestion: 'Check the file permissions',
    });
  }

  /**
   * Expand directories into their markdown files, keep explicit file paths
   * (even missing ones, which are reported per file) and drop duplicates.
   * Subdirectories that cannot be listed become findings; only corpus roots
   * that cannot be reached at all abort the run.
   */
  private async expandCorpus(corpusPaths: string[]): Promise<ExpandedCorpus> {
    if (corpusPaths.length === 0) {
      throw new CorpusUnavailableError(corpusPaths, 'No documentation paths given');
    }

    const seen = new Set<string>();
    const expanded: string[] = [];
    const results: ValidationResult[] = [];
    let reachable = 0;

    const add = (file: string): void => {
      if (seen.has(file)) return;
      seen.add(file);
      expanded.push(file);
    };

    for (const corpusPath of corpusPaths) {
      const absolute = resolve(corpusPath);
      let isDirectory = false;
      try {
        isDirectory = (await stat(absolute)).isDirectory();
      } catch (error) {
        this.logger.debug(`Cannot stat ${absolute}: ${errorMessage(error)}`);
        add(absolute);
        continue;
      }

      if (!isDirectory) {
        reachable++;
        add(absolute);
        continue;
      }

      const walk = collectMarkdownFiles(absolute, this.readDir);
      for (const { path, error } of walk.unreadable) {
        this.logger.warning(`Cannot list ${path}: ${errorMessage(error)}`);
        if (path === absolute) continue;
        results.push(
          createResult({
            filePath: path,
            ruleName: 'file_access',
            severity: 'error',
            message: `Failed to read directory: ${errorMessage(error)}`,
            suggestion: 'Check the directory permissions',
          })
        );
      }
      if (walk.unreadable.some((entry) => entry.path === absolute)) continue;

      reachable++;
      walk.files.forEach(add);
    }

    if (reachable === 0) {
      throw new CorpusUnavailableError(
        corpusPaths,
        `Documentation path not found: ${corpusPaths.join(', ')}`
      );
    }

    return { paths: expanded, results };
  }

  private targetFilter(targetFiles: string[] | undefined): (path: string) => boolean {
    if (!targetFiles || targetFiles.length === 0) return () => true;

    const absolute = new Set(targetFiles.map((target) => resolve(target)));
    const names = new Set(targetFiles.map((target) => basename(target)));
    return (path) => absolute.has(path) || names.has(basename(path));
  }
}
