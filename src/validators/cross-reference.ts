import { existsSync } from 'node:fs';
import { basename, dirname, extname, resolve } from 'node:path';
import { ReferenceGraph } from '../graph.js';
import { isMarkdownPath, maskCodeSpans, scanLines } from '../parser.js';
import { createResult, sortResults } from '../results.js';
import type { TermIndex } from '../terminology.js';
import type {
  Config,
  CrossReference,
  DocumentLink,
  DocumentationFile,
  ReferenceKind,
  ValidationResult,
} from '../types.js';

export interface CrossReferenceOutcome {
  references: CrossReference[];
  results: ValidationResult[];
  graph: ReferenceGraph;
}

const RULE = 'cross_reference';
const SCHEME_PATTERN = /^(?:[a-z][a-z0-9+.-]*:|\/\/)/i;
const CANDIDATE_PATTERN = /(?<![\p{L}\p{N}_-])[A-Z0-9_]+(?![\p{L}\p{N}_-])/gu;
const KIND_ORDER: Record<ReferenceKind, number> = { definition: 0, link: 1, term_usage: 2 };

type LinkResolution =
  | { kind: 'external' }
  | { kind: 'resolved'; target: DocumentationFile }
  | { kind: 'asset' }
  | { kind: 'missing_file'; filePart: string }
  | { kind: 'missing_anchor'; target: DocumentationFile; anchor: string };

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

function blank(match: string): string {
  return ' '.repeat(match.length);
}

/**
 * Blank out inline code, link targets and bare URLs, keeping columns, so
 * that only prose is scanned for terms.
 */
export function maskProse(text: string): string {
  return maskCodeSpans(text)
    .replace(/\]\([^)]*\)/g, (match) => `]${blank(match.slice(1))}`)
    .replace(/\b[a-z][a-z0-9+.-]*:\/\/\S+/gi, blank);
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

class LinkResolver {
  private byPath = new Map<string, DocumentationFile>();
  private byName = new Map<string, DocumentationFile[]>();
  private slugs = new Map<string, Set<string>>();

  constructor(files: DocumentationFile[]) {
    for (const file of files) {
      this.byPath.set(file.path, file);
      const key = file.fileName.toLowerCase();
      const sameName = this.byName.get(key) ?? [];
      sameName.push(file);
      this.byName.set(key, sameName);

      const slugs = new Set<string>();
      for (const heading of file.headings) {
        slugs.add(heading.slug);
        slugs.add(heading.text.toLowerCase());
      }
      this.slugs.set(file.path, slugs);
    }
  }

  /**
   * Prefer the file the relative path points at; otherwise match by file
   * name alone so that links survive directory reshuffles.
   */
  findFile(source: DocumentationFile, filePart: string): DocumentationFile | undefined {
    const exact = this.byPath.get(resolve(dirname(source.path), filePart));
    if (exact) return exact;
    return this.byName.get(basename(filePart).toLowerCase())?.[0];
  }

  /** Markdown targets by path or name; `guide` also matches `guide.md`. */
  findDocument(source: DocumentationFile, filePart: string): DocumentationFile | undefined {
    if (isMarkdownPath(filePart)) return this.findFile(source, filePart);
    if (extname(filePart) === '') return this.findFile(source, `${filePart}.md`);
    return undefined;
  }

  hasAnchor(file: DocumentationFile, anchor: string): boolean {
    const slugs = this.slugs.get(file.path);
    if (!slugs) return false;
    const decoded = safeDecode(anchor).toLowerCase();
    return slugs.has(decoded) || slugs.has(decoded.replace(/\s+/g, '-'));
  }

  resolve(source: DocumentationFile, link: DocumentLink): LinkResolution {
    if (SCHEME_PATTERN.test(link.target)) return { kind: 'external' };

    const filePart = safeDecode(link.filePart.split('?')[0] ?? '');
    let target: DocumentationFile | undefined;
    if (filePart === '') {
      if (!link.anchor) return { kind: 'external' };
      target = source;
    } else {
      target = this.findDocument(source, filePart);
      if (!target) {
        // Images, downloads and other non-markdown targets only need to exist on disk
        const onDisk = resolve(dirname(source.path), filePart);
        if (!isMarkdownPath(filePart) && existsSync(onDisk)) return { kind: 'asset' };
        return { kind: 'missing_file', filePart };
      }
    }

    if (link.anchor && !this.hasAnchor(target, link.anchor)) {
      return { kind: 'missing_anchor', target, anchor: link.anchor };
    }
    return { kind: 'resolved', target };
  }
}

function compareReferences(a: CrossReference, b: CrossReference): number {
  if (a.sourceFile !== b.sourceFile) return a.sourceFile < b.sourceFile ? -1 : 1;
  if (a.line !== b.line) return a.line - b.line;
  if (a.column !== b.column) return a.column - b.column;
  return KIND_ORDER[a.kind] - KIND_ORDER[b.kind];
}

/**
 * Resolve every link and term usage in the corpus. Broken file links are
 * errors, broken anchors warnings, and tokens that look like undefined
 * terms are info only.
 */
export function validateCrossReferences(
  files: DocumentationFile[],
  index: TermIndex,
  config: Config
): CrossReferenceOutcome {
  const resolver = new LinkResolver(files);
  const graph = new ReferenceGraph();
  const references: CrossReference[] = [];
  const results: ValidationResult[] = [];

  const tokens = index.tokens();
  const tokenPatterns = tokens.map(
    (token) =>
      [token, new RegExp(`(?<![\\p{L}\\p{N}_])${escapeRegExp(token)}(?![\\p{L}\\p{N}_])`, 'gu')] as const
  );
  const stoplist = new Set(config.undefinedTerms.stoplist);

  const ordered = [...files].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

  for (const file of ordered) {
    graph.addNode(file.path);
    const lines = scanLines(file.content, file.frontmatterLineCount);
    const contextOf = (line: number): string => lines[line - 1]?.text.trim() ?? '';

    for (const link of file.links) {
      const resolution = resolver.resolve(file, link);
      if (resolution.kind === 'external') continue;

      const isValid = resolution.kind === 'resolved' || resolution.kind === 'asset';
      references.push({
        term: link.text || link.target,
        target: link.target,
        sourceFile: file.path,
        line: link.line,
        column: link.column,
        context: contextOf(link.line),
        kind: 'link',
        isValid,
      });

      if (resolution.kind === 'resolved') {
        graph.addEdge(file.path, resolution.target.path);
      } else if (resolution.kind === 'missing_file') {
        results.push(
          createResult({
            filePath: file.path,
            ruleName: RULE,
            severity: 'error',
            lineNumber: link.line,
            message: `Broken link: target file "${resolution.filePart}" not found in the documentation set`,
            suggestion: 'Check that the target file exists and is part of the validated documents',
          })
        );
      } else if (resolution.kind === 'missing_anchor') {
        graph.addEdge(file.path, resolution.target.path);
        results.push(
          createResult({
            filePath: file.path,
            ruleName: RULE,
            severity: 'warning',
            lineNumber: link.line,
            message: `Broken anchor: section "#${resolution.anchor}" not found in ${resolution.target.fileName}`,
            suggestion: `Link to one of the headings of ${resolution.target.fileName}`,
          })
        );
      }
    }

    const definitionLines = new Set<number>();
    for (const definition of file.definitions) {
      definitionLines.add(definition.line);
      const entry = index.lookup(definition.term);
      if (!entry) continue;
      references.push({
        term: definition.term,
        canonicalTerm: entry.term,
        sourceFile: file.path,
        line: definition.line,
        column: 1,
        context: contextOf(definition.line),
        kind: 'definition',
        isValid: true,
      });
    }

    const reportedUndefined = new Set<string>();

    for (const line of lines) {
      if (line.skipped || definitionLines.has(line.number)) continue;
      const prose = maskProse(line.text);
      const claimed: Array<[number, number]> = [];
      const overlaps = (start: number, end: number): boolean =>
        claimed.some(([s, e]) => start < e && end > s);

      for (const [token, pattern] of tokenPatterns) {
        pattern.lastIndex = 0;
        let match: RegExpExecArray | null;
        while ((match = pattern.exec(prose)) !== null) {
          const start = match.index;
          const end = start + token.length;
          if (overlaps(start, end)) continue;
          claimed.push([start, end]);

          const entry = index.lookup(token);
          references.push({
            term: token,
            canonicalTerm: entry?.term,
            sourceFile: file.path,
            line: line.number,
            column: start + 1,
            context: line.text.trim(),
            kind: 'term_usage',
            isValid: entry !== undefined,
          });
        }
      }

      if (!config.undefinedTerms.enabled) continue;

      const candidates = new RegExp(CANDIDATE_PATTERN.source, 'gu');
      let candidate: RegExpExecArray | null;
      while ((candidate = candidates.exec(prose)) !== null) {
        const token = candidate[0];
        const start = candidate.index;
        if (!looksLikeTerm(token, config.undefinedTerms.minLength)) continue;
        if (stoplist.has(token) || index.has(token)) continue;
        if (overlaps(start, start + token.length)) continue;

        references.push({
          term: token,
          sourceFile: file.path,
          line: line.number,
          column: start + 1,
          context: line.text.trim(),
          kind: 'term_usage',
          isValid: false,
        });

        if (reportedUndefined.has(token)) continue;
        reportedUndefined.add(token);
        results.push(
          createResult({
            filePath: file.path,
            ruleName: RULE,
            severity: 'info',
            lineNumber: line.number,
            message: `Possibly undefined term: ${token}`,
            suggestion: 'Define this term in the terminology file or verify its spelling',
          })
        );
      }
    }
  }

  return {
    references: references.sort(compareReferences),
    results: sortResults(results),
    graph,
  };
}

/** At least `minLength` long with two or more uppercase letters (ATO, CLU_X, V2X). */
function looksLikeTerm(token: string, minLength: number): boolean {
  if (token.length < minLength) return false;
  return (token.match(/[A-Z]/g) ?? []).length >= 2;
}
