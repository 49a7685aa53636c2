import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { readdirSync, type Dirent } from 'node:fs';
import { basename, extname, join, resolve } from 'node:path';
import matter from 'gray-matter';
import { ParseError, errorMessage } from './errors.js';
import { createResult } from './results.js';
import type {
  DocumentLink,
  DocumentationFile,
  Heading,
  MalformedLink,
  TermDefinition,
  ValidationResult,
} from './types.js';

export interface SourceLine {
  /** 1-based line number in the original file */
  number: number;
  text: string;
  /** Inside a fenced code block or the front matter block */
  skipped: boolean;
}

export interface ParseOutcome {
  file: DocumentationFile;
  /** Findings raised while reading the file (encoding, front matter) */
  results: ValidationResult[];
}

const HEADING_PATTERN = /^(#{1,6})\s+(.+)$/;
const DEFINITION_PATTERN = /^(?:[-*+]\s+)?\*\*([^*]+?)\*\*\s*[·•:\-–]\s*(.+)$/;
const BOLD_TERM_PATTERN = /^([^()]+?)\s*(?:\(([^)]+)\))?$/;
const AKA_PATTERN = /\(\s*aka\s+([^)]+)\)/i;
const FENCE_PATTERN = /^\s*(`{3,}|~{3,})/;
const FRONTMATTER_PATTERN = /^---\r?\n[\s\S]*?\r?\n---[ \t]*(?:\r?\n|$)/;
const LINK_OPEN_PATTERN = /\[([^\]]*)\]\(/g;

const MARKDOWN_EXTENSIONS = new Set(['.md', '.markdown']);
const IGNORED_DIRECTORIES = new Set(['node_modules']);

/**
 * Anchor slug for a heading: lowercase, punctuation stripped, whitespace
 * runs collapsed into a single hyphen.
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s-]/gu, '')
    .trim()
    .replace(/\s+/g, '-');
}

export function isMarkdownPath(filePath: string): boolean {
  return MARKDOWN_EXTENSIONS.has(extname(filePath).toLowerCase());
}

/**
 * Split content into lines, flagging those inside fenced code blocks or a
 * leading front matter block so extractors can skip them.
 */
export function scanLines(content: string, frontmatterLines = 0): SourceLine[] {
  const lines = content.split(/\r?\n/);
  const scanned: SourceLine[] = [];
  let fence: string | null = null;

  lines.forEach((text, index) => {
    const number = index + 1;
    if (number <= frontmatterLines) {
      scanned.push({ number, text, skipped: true });
      return;
    }

    const fenceMatch = text.match(FENCE_PATTERN);
    if (fenceMatch) {
      const marker = fenceMatch[1];
      if (fence === null) {
        fence = marker.charAt(0);
        scanned.push({ number, text, skipped: true });
        return;
      }
      if (marker.charAt(0) === fence) {
        fence = null;
        scanned.push({ number, text, skipped: true });
        return;
      }
    }

    scanned.push({ number, text, skipped: fence !== null });
  });

  return scanned;
}

export function parseHeading(text: string, line: number): Heading | null {
  const match = text.match(HEADING_PATTERN);
  if (!match) return null;

  const headingText = match[2].replace(/\s+#+\s*$/, '').trim();
  if (!headingText) return null;

  return {
    level: match[1].length,
    text: headingText,
    slug: slugify(headingText),
    line,
  };
}

/** Blank out inline code spans, keeping columns. */
export function maskCodeSpans(text: string): string {
  return text.replace(/`[^`]*`/g, (match) => ' '.repeat(match.length));
}

/**
 * Extract inline `[text](target)` links from one line. Code spans and image
 * links are skipped; a link whose parentheses never close is reported as
 * malformed.
 */
export function parseLinks(
  line: string,
  lineNumber: number
): { links: DocumentLink[]; malformed: MalformedLink[] } {
  const links: DocumentLink[] = [];
  const malformed: MalformedLink[] = [];
  const pattern = new RegExp(LINK_OPEN_PATTERN.source, 'g');
  const text = maskCodeSpans(line);

  let match: RegExpExecArray | null;
  while ((match = pattern.exec(text)) !== null) {
    const start = match.index;
    const isImage = start > 0 && text.charAt(start - 1) === '!';
    const targetStart = start + match[0].length;

    let depth = 1;
    let end = targetStart;
    while (end < text.length && depth > 0) {
      const ch = text.charAt(end);
      if (ch === '(') depth++;
      else if (ch === ')') depth--;
      end++;
    }

    if (depth > 0) {
      malformed.push({ line: lineNumber, text: line.slice(start).trim() });
      break;
    }

    pattern.lastIndex = end;
    if (isImage) continue;

    const rawTarget = text.slice(targetStart, end - 1).trim();
    const target = cleanTarget(rawTarget);
    if (!target) continue;

    const hashIndex = target.indexOf('#');
    const link: DocumentLink = {
      text: match[1],
      target,
      filePart: hashIndex === -1 ? target : target.slice(0, hashIndex),
      line: lineNumber,
      column: start + 1,
    };
    if (hashIndex !== -1) {
      link.anchor = target.slice(hashIndex + 1);
    }
    links.push(link);
  }

  return { links, malformed };
}

/** Drop angle brackets and a trailing link title: `<a.md> "Title"` becomes `a.md`. */
function cleanTarget(raw: string): string {
  if (raw.startsWith('<')) {
    const close = raw.indexOf('>');
    return close === -1 ? raw.slice(1) : raw.slice(1, close);
  }
  return raw.split(/\s+/)[0] ?? '';
}

/**
 * Parse a `**TERM** · definition` line. The bold part may carry a long
 * form in parentheses and the definition may declare `(aka X, Y)`; both
 * become aliases.
 */
export function parseDefinition(text: string, line: number): TermDefinition | null {
  const match = text.trim().match(DEFINITION_PATTERN);
  if (!match) return null;

  const bold = match[1].trim().match(BOLD_TERM_PATTERN);
  if (!bold) return null;

  const aliases: string[] = [];
  let term = bold[1].trim();
  if (term.length > 1 && term.endsWith('_')) {
    aliases.push(term);
    term = term.slice(0, -1);
  }
  if (!term) return null;

  const longForm = bold[2]?.trim();
  if (longForm) aliases.push(longForm);

  let definition = match[2].trim();
  const aka = definition.match(AKA_PATTERN);
  if (aka) {
    for (const alias of aka[1].split(',')) {
      const trimmed = alias.trim();
      if (trimmed) aliases.push(trimmed);
    }
    definition = definition.replace(AKA_PATTERN, ' ');
  }
  definition = definition.replace(/\s+/g, ' ').trim();

  return {
    term,
    definition,
    aliases: aliases.filter((alias, index) => alias !== term && aliases.indexOf(alias) === index),
    line,
  };
}

/**
 * Decode bytes as UTF-8. Invalid sequences are replaced rather than
 * rejected; the caller learns about it through `recovered`.
 */
export function decodeUtf8(buffer: Uint8Array): { text: string; recovered: boolean } {
  try {
    return { text: new TextDecoder('utf-8', { fatal: true }).decode(buffer), recovered: false };
  } catch {
    return { text: new TextDecoder('utf-8').decode(buffer), recovered: true };
  }
}

function splitFrontmatter(
  content: string
): { data: Record<string, unknown>; lineCount: number; error?: string } {
  const block = content.match(FRONTMATTER_PATTERN)?.[0];
  if (block === undefined) {
    return { data: {}, lineCount: 0 };
  }

  const newlines = (block.match(/\n/g) ?? []).length;
  const lineCount = block.endsWith('\n') ? newlines : newlines + 1;

  try {
    return { data: matter(content).data, lineCount };
  } catch (error) {
    return { data: {}, lineCount, error: errorMessage(error) };
  }
}

/**
 * Build a DocumentationFile from raw bytes. Pure: the same bytes always
 * produce the same file apart from the timestamps of the findings.
 */
export function parseContent(filePath: string, buffer: Uint8Array): ParseOutcome {
  const results: ValidationResult[] = [];
  const { text: content, recovered } = decodeUtf8(buffer);

  if (recovered) {
    results.push(
      createResult({
        filePath,
        ruleName: 'file_encoding',
        severity: 'info',
        message: 'File contains invalid UTF-8 byte sequences; they were replaced during decoding',
        suggestion: 'Re-save the file as UTF-8',
      })
    );
  }

  const frontmatter = splitFrontmatter(content);
  if (frontmatter.error) {
    results.push(
      createResult({
        filePath,
        ruleName: 'frontmatter',
        severity: 'info',
        lineNumber: 1,
        message: `Front matter could not be parsed: ${frontmatter.error}`,
        suggestion: 'Fix the YAML between the leading --- markers',
      })
    );
  }

  const headings: Heading[] = [];
  const slugCounts = new Map<string, number>();
  const links: DocumentLink[] = [];
  const definitions: TermDefinition[] = [];
  const malformedLinks: MalformedLink[] = [];

  for (const line of scanLines(content, frontmatter.lineCount)) {
    if (line.skipped) continue;

    const heading = parseHeading(line.text, line.number);
    if (heading) {
      // Repeated headings get -1, -2, ... suffixes, as markdown renderers do
      const seen = slugCounts.get(heading.slug) ?? 0;
      slugCounts.set(heading.slug, seen + 1);
      if (seen > 0) heading.slug = `${heading.slug}-${seen}`;
      headings.push(heading);
    }

    const definition = parseDefinition(line.text, line.number);
    if (definition) definitions.push(definition);

    const parsedLinks = parseLinks(line.text, line.number);
    links.push(...parsedLinks.links);
    malformedLinks.push(...parsedLinks.malformed);
  }

  const fileName = basename(filePath);

  return {
    file: {
      path: filePath,
      name: basename(fileName, extname(fileName)).toLowerCase(),
      fileName,
      sizeBytes: buffer.byteLength,
      contentHash: createHash('sha256').update(buffer).digest('hex').slice(0, 16),
      title: headings.find((h) => h.level === 1)?.text,
      headings,
      links,
      definitions,
      malformedLinks,
      frontmatter: frontmatter.data,
      frontmatterLineCount: frontmatter.lineCount,
      content,
      status: 'not_validated',
    },
    results,
  };
}

/**
 * Read and parse one documentation file.
 * Throws a ParseError when the file is missing or cannot be read.
 */
export async function parseDocumentationFile(filePath: string): Promise<ParseOutcome> {
  const absolutePath = resolve(filePath);
  let buffer: Buffer;
  try {
    buffer = await readFile(absolutePath);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      throw new ParseError(absolutePath, 'not_found', `File not found: ${absolutePath}`, error);
    }
    throw new ParseError(
      absolutePath,
      'unreadable',
      `Cannot read ${absolutePath}: ${errorMessage(error)}`,
      error
    );
  }

  return parseContent(absolutePath, buffer);
}

function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

export type DirectoryReader = (dirPath: string) => Dirent[];

export interface DirectoryWalk {
  /** Markdown files found, sorted by path */
  files: string[];
  /** Directories that could not be listed, the root included */
  unreadable: Array<{ path: string; error: unknown }>;
}

const readDirectory: DirectoryReader = (dirPath) => readdirSync(dirPath, { withFileTypes: true });

/**
 * Recursively list markdown files below a directory. A directory that
 * cannot be listed is recorded and the walk carries on with its siblings.
 */
export function collectMarkdownFiles(
  dirPath: string,
  readDir: DirectoryReader = readDirectory
): DirectoryWalk {
  const walk: DirectoryWalk = { files: [], unreadable: [] };
  visitDirectory(resolve(dirPath), readDir, walk);
  walk.files.sort();
  return walk;
}

function visitDirectory(dirPath: string, readDir: DirectoryReader, walk: DirectoryWalk): void {
  let entries: Dirent[];
  try {
    entries = readDir(dirPath);
  } catch (error) {
    walk.unreadable.push({ path: dirPath, error });
    return;
  }

  for (const entry of entries) {
    if (entry.name.startsWith('.') || IGNORED_DIRECTORIES.has(entry.name)) continue;

    const fullPath = join(dirPath, entry.name);
    if (entry.isDirectory()) {
      visitDirectory(fullPath, readDir, walk);
    } else if (entry.isFile() && isMarkdownPath(entry.name)) {
      walk.files.push(fullPath);
    }
  }
}
