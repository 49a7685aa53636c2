import { statSync } from 'node:fs';
import { resolve } from 'node:path';
import { parseArgs } from 'node:util';
import { DEFAULT_CONFIG_FILE, loadConfig, resolveDocsRoot } from './config.js';
import { ValidationEngine } from './engine.js';
import { CrosscheckError, InvalidArgumentsError, errorMessage } from './errors.js';
import { createConsoleLogger } from './logger.js';
import { toCrossRefJson, toStatusJson, toValidationJson } from './reports/json.js';
import { renderCrossRefText, renderStatusText, renderValidationText } from './reports/text.js';
import type { OutputFormat } from './types.js';

export const EXIT_SUCCESS = 0;
export const EXIT_VALIDATION_FAILED = 1;
export const EXIT_ERROR = 2;

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  cwd: string;
}

const USAGE = `Usage: docs-crosscheck <command> [options]

Commands:
  validate [paths...]   Validate documentation consistency
  cross-ref             Report links and term usages
  status                Show per-file validation status

Options:
  --strict              Treat warnings as failures (validate)
  --format <text|json>  Output format (default: text)
  --config <file>       Configuration file (default: ${DEFAULT_CONFIG_FILE})
  --term <term>         Only references to this term (cross-ref)
  --file <file>         Only references in this file (cross-ref)
  --verbose             Log progress to stderr
  --help                Show this help`;

function defaultIo(): CliIo {
  return {
    stdout: (text) => process.stdout.write(`${text}\n`),
    stderr: (text) => process.stderr.write(`${text}\n`),
    cwd: process.cwd(),
  };
}

function parseFormat(value: string | undefined): OutputFormat {
  if (value === undefined || value === 'text') return 'text';
  if (value === 'json') return 'json';
  throw new InvalidArgumentsError(`Unknown format "${value}" (expected text or json)`);
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Run one CLI invocation and return its exit code: 0 on success, 1 when
 * validation fails, 2 on invocation or I/O errors.
 */
export async function runCli(argv: string[], io: CliIo = defaultIo()): Promise<number> {
  const [command, ...rest] = argv;

  if (!command || command === '--help' || command === 'help') {
    io.stdout(USAGE);
    return command ? EXIT_SUCCESS : EXIT_ERROR;
  }

  try {
    const { values, positionals } = parseArgs({
      args: rest,
      options: {
        strict: { type: 'boolean', default: false },
        format: { type: 'string' },
        config: { type: 'string' },
        term: { type: 'string' },
        file: { type: 'string' },
        verbose: { type: 'boolean', default: false },
        help: { type: 'boolean', default: false },
      },
      allowPositionals: true,
      strict: true,
    });

    if (values.help) {
      io.stdout(USAGE);
      return EXIT_SUCCESS;
    }

    const format = parseFormat(values.format);
    const config = loadConfig(resolve(io.cwd, values.config ?? DEFAULT_CONFIG_FILE));
    const engine = new ValidationEngine({
      config,
      logger: createConsoleLogger(values.verbose ? 'debug' : 'warn'),
    });
    const docsRoot = resolveDocsRoot(io.cwd, config.docsRoots);

    switch (command) {
      case 'validate': {
        const paths = positionals.map((p) => resolve(io.cwd, p));
        const onlyFiles = paths.length > 0 && paths.every((p) => !isDirectory(p));
        const report = onlyFiles
          ? await engine.validate([docsRoot, ...paths], {
              strict: values.strict || config.strict,
              targetFiles: paths,
            })
          : await engine.validate(paths.length > 0 ? paths : [docsRoot], {
              strict: values.strict || config.strict,
            });

        io.stdout(
          format === 'json'
            ? JSON.stringify(toValidationJson(report, io.cwd), null, 2)
            : renderValidationText(report, io.cwd)
        );
        return report.success ? EXIT_SUCCESS : EXIT_VALIDATION_FAILED;
      }

      case 'cross-ref': {
        if (positionals.length > 0) {
          throw new InvalidArgumentsError('cross-ref takes no positional arguments');
        }
        const corpus = values.file ? [docsRoot, resolve(io.cwd, values.file)] : [docsRoot];
        const report = await engine.validate(corpus);
        const filter = {
          term: values.term,
          file: values.file ? resolve(io.cwd, values.file) : undefined,
        };
        io.stdout(
          format === 'json'
            ? JSON.stringify(toCrossRefJson(report, filter, io.cwd), null, 2)
            : renderCrossRefText(report, filter, io.cwd)
        );
        return EXIT_SUCCESS;
      }

      case 'status': {
        const report = await engine.status(
          positionals.length > 0 ? positionals.map((p) => resolve(io.cwd, p)) : [docsRoot]
        );
        io.stdout(
          format === 'json'
            ? JSON.stringify(toStatusJson(report, io.cwd), null, 2)
            : renderStatusText(report, io.cwd)
        );
        return EXIT_SUCCESS;
      }

      default:
        throw new InvalidArgumentsError(`Unknown command "${command}"`);
    }
  } catch (error) {
    if (error instanceof CrosscheckError) {
      io.stderr(`Error: ${error.message}`);
      if (error instanceof InvalidArgumentsError) io.stderr(USAGE);
      return EXIT_ERROR;
    }
    if (error instanceof TypeError && 'code' in error) {
      // parseArgs rejects unknown options and missing values with a coded TypeError
      io.stderr(`Error: ${error.message}`);
      io.stderr(USAGE);
      return EXIT_ERROR;
    }
    io.stderr(`Error: ${errorMessage(error)}`);
    return EXIT_ERROR;
  }
}
