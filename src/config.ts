import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';
import type { Config } from './types.js';

export const DEFAULT_CONFIG_FILE = '.crosscheckrc.yml';

/** The four marker levels of the documented analysis pipeline. */
export const MARKER_LEVELS = ['ATO', 'SEM', 'CLU', 'MEMA'];

/** Acronyms common enough in technical prose that they are never reported as undefined. */
const DEFAULT_STOPLIST = [
  'API',
  'CLI',
  'CPU',
  'CSS',
  'CSV',
  'GPU',
  'HTML',
  'HTTP',
  'HTTPS',
  'JSON',
  'MIT',
  'NOTE',
  'PDF',
  'README',
  'REST',
  'SDK',
  'SQL',
  'TODO',
  'URL',
  'UTF',
  'UUID',
  'WARNING',
  'XML',
  'YAML',
];

const stringList = z.array(z.string().min(1));

const ConfigFileSchema = z
  .object({
    strict: z.boolean().optional(),
    'min-content-length': z.number().int().min(0).optional(),
    terminology: z
      .object({
        files: stringList.optional(),
        'required-terms': stringList.optional(),
      })
      .strict()
      .optional(),
    compliance: z
      .object({
        files: stringList.optional(),
        keyword: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    'undefined-terms': z
      .object({
        enabled: z.boolean().optional(),
        'min-length': z.number().int().min(1).optional(),
        stoplist: stringList.optional(),
      })
      .strict()
      .optional(),
    'docs-roots': stringList.optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Built-in defaults. Each call returns a fresh instance so callers may
 * adjust it without affecting other runs.
 */
export function defaultConfig(): Config {
  return {
    strict: false,
    minContentLength: 100,
    terminology: {
      files: ['terminologie', 'terminology', 'glossary'],
      requiredTerms: [...MARKER_LEVELS],
    },
    compliance: {
      files: ['marker'],
      keyword: 'LD-3.4',
    },
    undefinedTerms: {
      enabled: true,
      minLength: 3,
      stoplist: [...DEFAULT_STOPLIST],
    },
    docsRoots: ['docs', 'demo-docs', 'test-docs'],
  };
}

export function resolveConfig(file: ConfigFile): Config {
  const defaults = defaultConfig();

  return {
    strict: file.strict ?? defaults.strict,
    minContentLength: file['min-content-length'] ?? defaults.minContentLength,
    terminology: {
      files: file.terminology?.files ?? defaults.terminology.files,
      requiredTerms: file.terminology?.['required-terms'] ?? defaults.terminology.requiredTerms,
    },
    compliance: {
      files: file.compliance?.files ?? defaults.compliance.files,
      keyword: file.compliance?.keyword ?? defaults.compliance.keyword,
    },
    undefinedTerms: {
      enabled: file['undefined-terms']?.enabled ?? defaults.undefinedTerms.enabled,
      minLength: file['undefined-terms']?.['min-length'] ?? defaults.undefinedTerms.minLength,
      stoplist: file['undefined-terms']?.stoplist ?? defaults.undefinedTerms.stoplist,
    },
    docsRoots: file['docs-roots'] ?? defaults.docsRoots,
  };
}

export function loadConfig(configPath: string): Config {
  if (!existsSync(configPath)) {
    return defaultConfig();
  }

  const raw = readFileSync(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (error) {
    throw new ConfigError(`Failed to parse ${configPath}: ${errorMessage(error)}`, error);
  }

  if (parsed === null || parsed === undefined) {
    return defaultConfig();
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw ConfigError.fromZod(configPath, result.error);
  }

  return resolveConfig(result.data);
}

/**
 * The documentation root: the first of `candidates` that exists below
 * `cwd`, otherwise `cwd` itself.
 */
export function resolveDocsRoot(cwd: string, candidates: string[]): string {
  for (const candidate of candidates) {
    const candidatePath = join(cwd, candidate);
    if (existsSync(candidatePath)) return candidatePath;
  }
  return cwd;
}
