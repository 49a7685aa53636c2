import { createResult } from './results.js';
import type {
  Config,
  DocumentationFile,
  TermCategory,
  TermDefinition,
  TerminologyEntry,
  ValidationResult,
} from './types.js';

/**
 * Canonical term → entry, with alias lookup falling back to the entry the
 * alias was declared on. Entries keep the order in which they were first
 * defined.
 */
export class TermIndex {
  private entries = new Map<string, TerminologyEntry>();
  private aliases = new Map<string, string>();

  get size(): number {
    return this.entries.size;
  }

  get(term: string): TerminologyEntry | undefined {
    return this.entries.get(term);
  }

  /** Resolve a canonical term or an alias. Canonical terms take precedence. */
  lookup(token: string): TerminologyEntry | undefined {
    const entry = this.entries.get(token);
    if (entry) return entry;
    const canonical = this.aliases.get(token);
    return canonical === undefined ? undefined : this.entries.get(canonical);
  }

  has(token: string): boolean {
    return this.lookup(token) !== undefined;
  }

  set(entry: TerminologyEntry): void {
    this.entries.set(entry.term, entry);
    for (const alias of entry.aliases) {
      if (!this.aliases.has(alias)) {
        this.aliases.set(alias, entry.term);
      }
    }
  }

  /** Every canonical term and alias, longest first so longer names win overlaps. */
  tokens(): string[] {
    const all = new Set<string>([...this.entries.keys(), ...this.aliases.keys()]);
    return Array.from(all).sort((a, b) => b.length - a.length || (a < b ? -1 : a > b ? 1 : 0));
  }
}

export function isTerminologyFile(file: DocumentationFile, config: Config): boolean {
  return config.terminology.files.some((stem) => file.name.includes(stem.toLowerCase()));
}

export function categorize(term: string, config: Config): TermCategory {
  if (config.terminology.requiredTerms.includes(term)) return 'marker_level';
  if (/^me\s/i.test(term)) return 'cli_command';
  return 'general';
}

function toEntry(
  definition: TermDefinition,
  file: DocumentationFile,
  config: Config
): TerminologyEntry {
  return {
    term: definition.term,
    definition: definition.definition,
    aliases: [...definition.aliases],
    category: categorize(definition.term, config),
    sourceFile: file.path,
    line: definition.line,
  };
}

/**
 * Build the term index from the terminology files, in corpus order.
 * A later definition of the same term with different text replaces the
 * earlier one and is reported as info.
 */
export function extractTerminology(
  files: DocumentationFile[],
  config: Config
): { index: TermIndex; results: ValidationResult[] } {
  const index = new TermIndex();
  const results: ValidationResult[] = [];

  for (const file of files) {
    if (!isTerminologyFile(file, config)) continue;

    for (const definition of file.definitions) {
      const next = toEntry(definition, file, config);
      const existing = index.get(definition.term);

      if (existing) {
        next.aliases = Array.from(new Set([...existing.aliases, ...next.aliases]));
        if (existing.definition !== next.definition) {
          const previous = `${existing.sourceFile === file.path ? file.fileName : existing.sourceFile}:${existing.line}`;
          results.push(
            createResult({
              filePath: file.path,
              ruleName: 'terminology_consistency',
              severity: 'info',
              lineNumber: definition.line,
              message: `Redefinition of ${definition.term}; replaces the definition at ${previous}`,
              suggestion: `Keep a single definition of ${definition.term}`,
            })
          );
        }
      }

      index.set(next);
    }
  }

  return { index, results };
}

/** Terms from `required` that a file neither defines nor declares as an alias. */
export function missingTerms(file: DocumentationFile, required: string[]): string[] {
  const defined = new Set<string>();
  for (const definition of file.definitions) {
    defined.add(definition.term);
    for (const alias of definition.aliases) defined.add(alias);
  }
  return required.filter((term) => !defined.has(term));
}
