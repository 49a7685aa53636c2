import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { parseContent } from '../src/parser.js';
import type { DocumentationFile } from '../src/types.js';

/** Enough prose to clear the default minimum content length. */
export const FILLER =
  'This section describes the behaviour of the analysis in enough detail for readers ' +
  'who are new to the project and want to follow along.';

export interface TempCorpus {
  root: string;
  path(name: string): string;
  cleanup(): void;
}

/** Write `files` (relative path → content) into a fresh temporary directory. */
export function writeCorpus(files: Record<string, string | Uint8Array>): TempCorpus {
  const root = mkdtempSync(join(tmpdir(), 'crosscheck-'));
  for (const [name, content] of Object.entries(files)) {
    const target = join(root, name);
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, content);
  }
  return {
    root,
    path: (name) => join(root, name),
    cleanup: () => rmSync(root, { recursive: true, force: true }),
  };
}

export function doc(path: string, lines: string[]): DocumentationFile {
  return parseContent(path, Buffer.from(lines.join('\n'), 'utf-8')).file;
}
