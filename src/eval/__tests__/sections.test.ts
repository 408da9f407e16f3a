/**
 * Documentation Section Tests
 *
 * Parsing runs against real documents in a temp directory; matching is
 * pure.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';

import { matchSections, readDocSections, splitSections } from '../sections.js';
import type { DocSection } from '../types.js';
import { DocumentStore } from '../../docs/document-store.js';
import type { CodeSymbol } from '../../indexer/types.js';
import { createTempRepo, type TempRepo } from '../../test-utils/index.js';

// ============================================================================
// HELPERS
// ============================================================================

function sym(symbolId: string, start: number): CodeSymbol {
  return {
    symbolId,
    kind: 'function',
    file: 'src/pkg/util.py',
    qualname: symbolId,
    parent: null,
    start,
    end: start + 1,
    docstring: '',
    hash: 'h',
  };
}

const named = (symbolId: string, content = symbolId): DocSection => ({ symbolId, content });
const unnamed = (content: string): DocSection => ({ symbolId: null, content });

// ============================================================================
// PARSING
// ============================================================================

describe('splitSections', () => {
  it('splits on separator lines and drops the title part', () => {
    const text = '# API Documentation: pkg_util\n\n---\n\nFirst part\n\n-----\nSecond part\n---\n';

    expect(splitSections(text)).toEqual([unnamed('First part'), unnamed('Second part')]);
  });

  it('keeps a leading part that has more than the title', () => {
    expect(splitSections('# Title\n\nIntro text\n---\nBody')).toEqual([
      unnamed('# Title\n\nIntro text'),
      unnamed('Body'),
    ]);
  });

  it('does not split on dashes inside a line', () => {
    expect(splitSections('a --- b\n')).toEqual([unnamed('a --- b')]);
  });
});

describe('readDocSections', () => {
  let repo: TempRepo;
  let documents: DocumentStore;

  beforeEach(() => {
    repo = createTempRepo();
    documents = new DocumentStore({ docsRoot: join(repo.root, 'docs'), repoRoot: repo.root });
  });

  afterEach(() => {
    repo.cleanup();
  });

  it('prefers marker blocks over separators', () => {
    repo.write(
      'docs/pkg_util.md',
      '# API Documentation: pkg_util\n\n' +
        '<!-- BEGIN: auto:pkg.util.a -->\n  A docs  \n<!-- END: auto:pkg.util.a -->\n\n---\n\n' +
        '<!-- BEGIN: auto:pkg.util.b -->\nB docs\n<!-- END: auto:pkg.util.b -->\n'
    );

    expect(readDocSections(documents, 'pkg_util.md')).toEqual([named('pkg.util.a', 'A docs'), named('pkg.util.b', 'B docs')]);
  });

  it('falls back to separated sections', () => {
    repo.write('docs/plain.md', 'Alpha\n---\nBeta\n');

    expect(readDocSections(documents, 'plain.md')).toEqual([unnamed('Alpha'), unnamed('Beta')]);
  });

  it('returns nothing for a missing document', () => {
    expect(readDocSections(documents, 'absent.md')).toEqual([]);
  });
});

// ============================================================================
// MATCHING
// ============================================================================

describe('matchSections', () => {
  it('matches by id when any section is named and lists leftovers as extras', () => {
    const a = sym('pkg.util.a', 1);
    const b = sym('pkg.util.b', 5);

    const result = matchSections([a, b], [named('pkg.util.stale'), named('pkg.util.a')]);

    expect(result.strategy).toBe('name');
    expect(result.pairs).toEqual([
      { symbol: a, section: named('pkg.util.a') },
      { symbol: b, section: null },
      { symbol: null, section: named('pkg.util.stale') },
    ]);
  });

  it('falls back to the simple name after exact ids are claimed', () => {
    const helper = sym('pkg.util.helper', 1);
    const other = sym('pkg.other.helper', 9);

    const result = matchSections([helper, other], [named('old.path.helper'), named('pkg.other.helper')]);

    expect(result.pairs).toEqual([
      { symbol: helper, section: named('old.path.helper') },
      { symbol: other, section: named('pkg.other.helper') },
    ]);
  });

  it('pairs by position when no section is named', () => {
    const a = sym('pkg.util.a', 1);

    const result = matchSections([a], [unnamed('First'), unnamed('Second')]);

    expect(result.strategy).toBe('order');
    expect(result.pairs).toEqual([
      { symbol: a, section: unnamed('First') },
      { symbol: null, section: unnamed('Second') },
    ]);
  });
});
