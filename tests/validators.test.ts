import { describe, it, expect } from 'vitest';
import { defaultConfig } from '../src/config.js';
import { extractTerminology } from '../src/terminology.js';
import { isComplianceFile, validateCompleteness } from '../src/validators/completeness.js';
import { maskProse, validateCrossReferences } from '../src/validators/cross-reference.js';
import { validateMarkdown } from '../src/validators/markdown.js';
import type { Config, DocumentationFile } from '../src/types.js';
import { doc, FILLER } from './helpers.js';

function crossReference(files: DocumentationFile[], config: Config = defaultConfig()) {
  const { index } = extractTerminology(files, config);
  return validateCrossReferences(files, index, config);
}

const terminologie = doc('/d/terminologie.md', [
  '# Terminologie',
  '',
  '## Levels',
  '',
  '**ATO** · Atomic marker',
  '**CLU (Cluster)** · Cluster marker',
]);

describe('validateMarkdown', () => {
  it('requires a level-1 title', () => {
    const results = validateMarkdown([doc('/d/a.md', ['## Only a section', FILLER])], false);
    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({
      filePath: '/d/a.md',
      ruleName: 'markdown_structure',
      severity: 'warning',
      lineNumber: 1,
      message: 'Document has no main title (# Title)',
    });
  });

  it('escalates structure findings under strict mode', () => {
    const results = validateMarkdown([doc('/d/a.md', ['No heading at all'])], true);
    expect(results.map((r) => r.severity)).toEqual(['error']);
  });

  it('reports unbalanced link syntax', () => {
    const results = validateMarkdown([doc('/d/a.md', ['# A', 'See [here](b.md for details'])], false);
    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({
      ruleName: 'markdown_syntax',
      severity: 'warning',
      lineNumber: 2,
      message: 'Unbalanced markdown link syntax: [here](b.md for details',
    });
  });

  it('notes skipped heading levels as info', () => {
    const results = validateMarkdown([doc('/d/a.md', ['# A', '### Deep'])], true);
    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({
      ruleName: 'heading_hierarchy',
      severity: 'info',
      lineNumber: 2,
      message: 'Skipped heading level: H1 → H3 (missing H2)',
    });
  });
});

describe('validateCompleteness', () => {
  const config = defaultConfig();

  it('flags documents below the minimum content length', () => {
    const results = validateCompleteness([doc('/d/short.md', ['# Title', '', '   '])], config, false);
    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({
      ruleName: 'content_completeness',
      severity: 'warning',
      message: 'Document content is shorter than the minimum length of 100 characters (found 7)',
    });
    expect(results[0]?.lineNumber).toBeUndefined();
  });

  it('does not count front matter towards the content length', () => {
    const frontmatter = ['---', `summary: ${FILLER}`, '---'];
    const results = validateCompleteness(
      [doc('/d/fm.md', [...frontmatter, '# Title'])],
      config,
      false
    );
    expect(results.map((r) => r.ruleName)).toEqual(['content_completeness']);
  });

  it('lists missing marker terms in the terminology file', () => {
    const file = doc('/d/terminologie.md', ['# Terms', FILLER, '**ATO** · a', '**SEM** · s']);
    const results = validateCompleteness([file], config, false);
    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({
      ruleName: 'terminology_completeness',
      severity: 'warning',
      message: 'Missing key marker terms: CLU, MEMA',
    });
  });

  it('requires the compliance keyword in the marker file', () => {
    const marker = doc('/d/marker.md', ['# Marker', FILLER]);
    expect(isComplianceFile(marker, config)).toBe(true);
    const results = validateCompleteness([marker], config, true);
    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({
      ruleName: 'ld_compliance',
      severity: 'error',
      message: 'No mention of the LD-3.4 specification found',
    });
  });

  it('matches the compliance keyword case-insensitively', () => {
    const marker = doc('/d/marker.md', ['# Marker', FILLER, 'Follows ld-3.4.']);
    expect(validateCompleteness([marker], config, false)).toEqual([]);
  });
});

describe('maskProse', () => {
  it('blanks code spans, link targets and URLs without moving columns', () => {
    const text = 'Use `ATO` via [doc](a.md) or https://x.test/SEM now';
    const masked = maskProse(text);
    expect(masked).toHaveLength(text.length);
    expect(masked).toBe('Use       via [doc]       or                    now');
  });
});

describe('validateCrossReferences', () => {
  it('resolves links and reports missing target files as errors', () => {
    const marker = doc('/d/marker.md', [
      '# Marker',
      'See [term](terminologie.md) and [bad link](nonexistent.md).',
    ]);
    const { references, results, graph } = crossReference([terminologie, marker]);

    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({
      filePath: '/d/marker.md',
      ruleName: 'cross_reference',
      severity: 'error',
      lineNumber: 2,
      message: 'Broken link: target file "nonexistent.md" not found in the documentation set',
    });

    const links = references.filter((ref) => ref.kind === 'link');
    expect(links.map((ref) => [ref.term, ref.target, ref.isValid, ref.column])).toEqual([
      ['term', 'terminologie.md', true, 5],
      ['bad link', 'nonexistent.md', false, 33],
    ]);
    expect(graph.outgoing('/d/marker.md')).toEqual(['/d/terminologie.md']);
  });

  it('reports missing anchors as warnings and resolves same-file anchors', () => {
    const marker = doc('/d/marker.md', [
      '# Marker',
      '[levels](terminologie.md#levels) [gone](terminologie.md#missing)',
      '[top](#marker) [nowhere](#nowhere)',
    ]);
    const { results } = crossReference([terminologie, marker]);
    expect(results.map((r) => [r.severity, r.lineNumber, r.message])).toEqual([
      ['warning', 2, 'Broken anchor: section "#missing" not found in terminologie.md'],
      ['warning', 3, 'Broken anchor: section "#nowhere" not found in marker.md'],
    ]);
  });

  it('ignores links with a URI scheme', () => {
    const marker = doc('/d/marker.md', [
      '# Marker',
      '[site](https://example.com/a.md) [mail](mailto:docs@example.com) [proto](//cdn.example.com/x.md)',
    ]);
    const { references, results } = crossReference([terminologie, marker]);
    expect(references.filter((ref) => ref.kind === 'link')).toEqual([]);
    expect(results).toEqual([]);
  });

  it('reports non-markdown targets missing on disk as broken', () => {
    const marker = doc('/d/marker.md', ['# Marker', 'See [d](missing-diagram.png).']);
    const { references, results, graph } = crossReference([terminologie, marker]);
    expect(results.map((r) => [r.severity, r.lineNumber, r.message])).toEqual([
      ['error', 2, 'Broken link: target file "missing-diagram.png" not found in the documentation set'],
    ]);
    const links = references.filter((ref) => ref.kind === 'link');
    expect(links.map((ref) => [ref.target, ref.isValid])).toEqual([['missing-diagram.png', false]]);
    expect(graph.outgoing('/d/marker.md')).toEqual([]);
  });

  it('resolves extensionless targets to markdown files', () => {
    const marker = doc('/d/marker.md', ['# Marker', '[t](terminologie) [gone](glossary)']);
    const { references, results, graph } = crossReference([terminologie, marker]);
    expect(results.map((r) => r.message)).toEqual([
      'Broken link: target file "glossary" not found in the documentation set',
    ]);
    const links = references.filter((ref) => ref.kind === 'link');
    expect(links.map((ref) => [ref.target, ref.isValid])).toEqual([
      ['terminologie', true],
      ['glossary', false],
    ]);
    expect(graph.outgoing('/d/marker.md')).toEqual(['/d/terminologie.md']);
  });

  it('resolves anchors of repeated headings', () => {
    const notes = doc('/d/notes.md', ['# Notes', '## Step', 'one', '## Step', 'two', '[second](#step-1)']);
    const { references, results } = crossReference([notes]);
    expect(results).toEqual([]);
    expect(references.find((ref) => ref.kind === 'link')?.isValid).toBe(true);
  });

  it('does not treat link syntax in inline code as a link', () => {
    const marker = doc('/d/marker.md', ['# Marker', 'Write `[text](other.md)` to link a page.']);
    const { references, results } = crossReference([terminologie, marker]);
    expect(references.filter((ref) => ref.kind === 'link')).toEqual([]);
    expect(results).toEqual([]);
  });

  it('falls back to the file name when the relative path does not match', () => {
    const guide = doc('/d/sub/guide.md', ['# Guide', '[terms](other/terminologie.md)']);
    const { references, results } = crossReference([terminologie, guide]);
    expect(results).toEqual([]);
    expect(references.find((ref) => ref.kind === 'link')?.isValid).toBe(true);
  });

  it('records term usages by canonical term and alias, skipping inline code', () => {
    const marker = doc('/d/marker.md', ['# Marker', 'ATO and Cluster markers, but not `ATO` in code.']);
    const { references } = crossReference([terminologie, marker]);
    const usages = references.filter(
      (ref) => ref.sourceFile === '/d/marker.md' && ref.kind === 'term_usage'
    );
    expect(usages.map((ref) => [ref.term, ref.canonicalTerm, ref.column, ref.isValid])).toEqual([
      ['ATO', 'ATO', 1, true],
      ['Cluster', 'CLU', 9, true],
    ]);
    expect(usages[0]?.context).toBe('ATO and Cluster markers, but not `ATO` in code.');
  });

  it('records definitions as references', () => {
    const { references } = crossReference([terminologie]);
    expect(
      references.map((ref) => [ref.kind, ref.term, ref.line, ref.column])
    ).toEqual([
      ['definition', 'ATO', 5, 1],
      ['definition', 'CLU', 6, 1],
    ]);
  });

  it('lets the longest term claim overlapping text', () => {
    const glossary = doc('/d/glossary.md', ['# G', '**SEM** · s', '**SEM DATA** · d']);
    const page = doc('/d/page.md', ['# Page', 'The SEM DATA set.']);
    const { references, results } = crossReference([glossary, page]);
    const usages = references.filter((ref) => ref.sourceFile === '/d/page.md');
    expect(usages.map((ref) => [ref.term, ref.column])).toEqual([['SEM DATA', 5]]);
    expect(results).toEqual([]);
  });

  it('reports a possibly undefined term once per file', () => {
    const page = doc('/d/page.md', [
      '# Page',
      'The XYZZY module and the XYZZY cache talk HTTP to the AB unit.',
      'XYZZY again, next to ATO and LD-3.4.',
    ]);
    const { references, results } = crossReference([terminologie, page]);

    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({
      filePath: '/d/page.md',
      ruleName: 'cross_reference',
      severity: 'info',
      lineNumber: 2,
      message: 'Possibly undefined term: XYZZY',
    });

    const undefinedRefs = references.filter((ref) => ref.term === 'XYZZY');
    expect(undefinedRefs.map((ref) => [ref.line, ref.column, ref.isValid])).toEqual([
      [2, 5, false],
      [2, 26, false],
      [3, 1, false],
    ]);
  });

  it('can switch undefined-term detection off', () => {
    const config = defaultConfig();
    config.undefinedTerms.enabled = false;
    const page = doc('/d/page.md', ['# Page', 'The XYZZY module.']);
    const { references, results } = crossReference([terminologie, page], config);
    expect(results).toEqual([]);
    expect(references.filter((ref) => ref.sourceFile === '/d/page.md')).toEqual([]);
  });

  it('does not scan fenced code blocks', () => {
    const page = doc('/d/page.md', ['# Page', '```', 'XYZZY ATO', '```']);
    const { references } = crossReference([terminologie, page]);
    expect(references.filter((ref) => ref.sourceFile === '/d/page.md')).toEqual([]);
  });
});
