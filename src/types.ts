export type Severity = 'error' | 'warning' | 'info';
export type ValidationStatus = 'not_validated' | 'valid' | 'invalid';
export type ReferenceKind = 'link' | 'term_usage' | 'definition';
export type TermCategory = 'marker_level' | 'cli_command' | 'general';
export type OutputFormat = 'text' | 'json';

export interface Config {
  strict: boolean;
  /** Minimum number of non-whitespace-trimmed characters a document must carry */
  minContentLength: number;
  terminology: {
    /** File-name stems that mark a terminology file */
    files: string[];
    requiredTerms: string[];
  };
  compliance: {
    files: string[];
    keyword: string;
  };
  undefinedTerms: {
    enabled: boolean;
    minLength: number;
    stoplist: string[];
  };
  /** Documentation directories tried when no path is given */
  docsRoots: string[];
}

export interface Heading {
  level: number;
  text: string;
  slug: string;
  line: number;
}

export interface DocumentLink {
  text: string;
  /** Raw target as written between the parentheses */
  target: string;
  filePart: string;
  anchor?: string;
  line: number;
  column: number;
}

export interface TermDefinition {
  term: string;
  definition: string;
  aliases: string[];
  line: number;
}

export interface MalformedLink {
  line: number;
  text: string;
}

export interface DocumentationFile {
  /** Absolute path, unique within a corpus */
  path: string;
  /** Lowercased file stem (e.g. "terminologie") */
  name: string;
  fileName: string;
  sizeBytes: number;
  /** sha256 prefix of the raw bytes */
  contentHash: string;
  title?: string;
  headings: Heading[];
  links: DocumentLink[];
  definitions: TermDefinition[];
  malformedLinks: MalformedLink[];
  frontmatter: Record<string, unknown>;
  /** Number of leading lines taken by the front matter block */
  frontmatterLineCount: number;
  /** Decoded text, front matter included */
  content: string;
  lastValidated?: Date;
  status: ValidationStatus;
}

export interface TerminologyEntry {
  term: string;
  definition: string;
  aliases: string[];
  category: TermCategory;
  /** Where the winning definition was read */
  sourceFile: string;
  line: number;
}

export interface CrossReference {
  /** Referenced term, or link text for links */
  term: string;
  /** Link target for links */
  target?: string;
  /** Canonical term of the entry a term usage resolved to */
  canonicalTerm?: string;
  sourceFile: string;
  line: number;
  column: number;
  context: string;
  kind: ReferenceKind;
  isValid: boolean;
}

export interface ValidationResult {
  filePath: string;
  ruleName: string;
  severity: Severity;
  lineNumber?: number;
  message: string;
  suggestion?: string;
  validatedAt: Date;
}

export interface SeveritySummary {
  errors: number;
  warnings: number;
  info: number;
}

export interface ValidateOptions {
  strict?: boolean;
  /** Restrict reported findings to these files; the full corpus is still resolved */
  targetFiles?: string[];
}
