import * as core from '@actions/core';
import * as github from '@actions/github';
import { join, relative } from 'node:path';

import { DEFAULT_CONFIG_FILE, loadConfig, resolveDocsRoot } from './config.js';
import { ValidationEngine, type ValidationReport } from './engine.js';
import { createActionsLogger } from './logger.js';
import { buildCommentBody, COMMENT_MARKER } from './reports/pr-comment.js';
import type { ValidationResult } from './types.js';

async function run(): Promise<void> {
  try {
    const repoRoot = process.env.GITHUB_WORKSPACE || process.cwd();
    const pathsInput = core.getInput('paths') || process.env.INPUT_PATHS || '';
    const configFile =
      core.getInput('config-file') || process.env.INPUT_CONFIG_FILE || DEFAULT_CONFIG_FILE;

    const config = loadConfig(join(repoRoot, configFile));
    const strictInput = core.getInput('strict') || process.env.INPUT_STRICT || '';
    const strict = strictInput ? strictInput.toLowerCase() === 'true' : config.strict;

    const paths = pathsInput
      .split(/[\n,]/)
      .map((p) => p.trim())
      .filter(Boolean)
      .map((p) => join(repoRoot, p));
    const corpus = paths.length > 0 ? paths : [resolveDocsRoot(repoRoot, config.docsRoots)];

    core.info(`Docs cross-check: strict=${strict}, paths=${corpus.map((p) => relative(repoRoot, p) || '.').join(', ')}`);

    const engine = new ValidationEngine({ config, logger: createActionsLogger() });
    const report = await engine.validate(corpus, { strict });
    core.info(`Checked ${report.paths.length} documents, ${report.terms.size} terms defined`);

    for (const result of report.results) {
      annotate(result, repoRoot);
    }

    await postPrComment(report, repoRoot);

    core.setOutput('errors', report.summary.errors);
    core.setOutput('warnings', report.summary.warnings);
    core.setOutput('info', report.summary.info);
    core.setOutput('files-count', report.paths.length);

    if (!report.success) {
      core.setFailed(
        `Documentation validation failed: ${report.summary.errors} errors, ${report.summary.warnings} warnings${strict ? ' (strict mode)' : ''}`
      );
    }
  } catch (error) {
    core.setFailed(error instanceof Error ? error.message : String(error));
  }
}

function annotate(result: ValidationResult, repoRoot: string): void {
  const properties: core.AnnotationProperties = {
    title: result.ruleName,
    file: relative(repoRoot, result.filePath),
    startLine: result.lineNumber,
  };
  const message = result.suggestion ? `${result.message}\n${result.suggestion}` : result.message;

  if (result.severity === 'error') core.error(message, properties);
  else if (result.severity === 'warning') core.warning(message, properties);
  else core.notice(message, properties);
}

async function postPrComment(report: ValidationReport, repoRoot: string): Promise<void> {
  const context = github.context;
  const pr = context.payload.pull_request;

  if (!pr) {
    core.info('Not running in a pull request context. Skipping PR comment.');
    return;
  }

  const commentBody = buildCommentBody({
    success: report.success,
    strict: report.strict,
    fileCount: report.paths.length,
    summary: report.summary,
    issues: report.results,
    baseDir: repoRoot,
  });

  const token = process.env.GITHUB_TOKEN;
  if (!token) {
    core.warning('No GITHUB_TOKEN available. Logging results to console instead.');
    core.info(commentBody);
    return;
  }

  const octokit = github.getOctokit(token);
  const { owner, repo } = context.repo;
  const prNumber = pr.number;

  const { data: comments } = await octokit.rest.issues.listComments({
    owner,
    repo,
    issue_number: prNumber,
  });

  const existingComment = comments.find((c) => c.body?.includes(COMMENT_MARKER));

  if (existingComment) {
    await octokit.rest.issues.updateComment({
      owner,
      repo,
      comment_id: existingComment.id,
      body: commentBody,
    });
    core.info(`Updated existing PR comment #${existingComment.id}`);
  } else {
    await octokit.rest.issues.createComment({
      owner,
      repo,
      issue_number: prNumber,
      body: commentBody,
    });
    core.info('Created new PR comment');
  }
}

void run();
