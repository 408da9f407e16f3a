/**
 * Tests for the tree-sitter symbol extractor
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { extractSymbols, moduleQualname, TreeSitterSymbolExtractor } from '../extractor.js';
import { sha256Hex } from '../span.js';
import { SymbolParseError } from '../../../errors/index.js';

const PYTHON_SOURCE = `"""Calculator core."""


class Calculator:
    """Adds numbers."""

    def add(self, a, b):
        """Return a + b."""
        return a + b

    @staticmethod
    def zero():
        return 0


async def fetch():
    pass


def helper():
    def inner():
        pass
    return inner
`;

const TS_SOURCE = `/** Greeting helpers. */

import { x } from './x.js';

/** Says hello. */
export function hello(name: string): string {
  return \`hi \${name}\`;
}

export class Greeter {
  /** Greets loudly. */
  shout(name: string): string {
    return name.toUpperCase();
  }
}

export const wave = async (): Promise<void> => {};
`;

describe('extractSymbols (python)', () => {
  const symbols = extractSymbols(PYTHON_SOURCE, 'src/pkg/core.py', 'pkg.core', 'python');

  it('emits module, top-level and method symbols in source order', () => {
    expect(symbols.map((s) => [s.symbolId, s.kind, s.start, s.end])).toEqual([
      ['pkg.core', 'module', 1, 23],
      ['pkg.core.Calculator', 'class', 4, 13],
      ['pkg.core.Calculator.add', 'method', 7, 9],
      ['pkg.core.Calculator.zero', 'method', 12, 13],
      ['pkg.core.fetch', 'function', 16, 17],
      ['pkg.core.helper', 'function', 20, 23],
    ]);
  });

  it('does not emit nested functions', () => {
    expect(symbols.find((s) => s.symbolId.endsWith('inner'))).toBeUndefined();
  });

  it('records parents and docstrings', () => {
    const add = symbols.find((s) => s.symbolId === 'pkg.core.Calculator.add');

    expect(add?.parent).toBe('pkg.core.Calculator');
    expect(add?.docstring).toBe('Return a + b.');
    expect(add?.file).toBe('src/pkg/core.py');
    expect(symbols[0]?.docstring).toBe('Calculator core.');
    expect(symbols[0]?.parent).toBeNull();
  });

  it('hashes the exact span text', () => {
    const add = symbols.find((s) => s.symbolId === 'pkg.core.Calculator.add');
    const expected = sha256Hex(
      '    def add(self, a, b):\n        """Return a + b."""\n        return a + b'
    );

    expect(add?.hash).toBe(expected);
  });

  it('changes only the hashes of spans that changed', () => {
    const edited = PYTHON_SOURCE.replace('return a + b', 'return b + a');
    const after = extractSymbols(edited, 'src/pkg/core.py', 'pkg.core', 'python');
    const changed = symbols
      .filter((s, i) => s.hash !== after[i]?.hash)
      .map((s) => s.symbolId);

    expect(changed).toEqual(['pkg.core', 'pkg.core.Calculator', 'pkg.core.Calculator.add']);
  });

  it('is stable across runs', () => {
    const again = extractSymbols(PYTHON_SOURCE, 'src/pkg/core.py', 'pkg.core', 'python');

    expect(again.map((s) => s.hash)).toEqual(symbols.map((s) => s.hash));
  });

  it('cleans multi-line docstrings', () => {
    const source = 'def f():\n    """Summary.\n\n    Details here.\n    """\n    return 1\n';
    const [, f] = extractSymbols(source, 'm.py', 'm', 'python');

    expect(f?.docstring).toBe('Summary.\n\nDetails here.');
  });

  it('throws SymbolParseError on syntax errors', () => {
    expect(() => extractSymbols('def broken(:\n    pass\n', 'bad.py', 'bad', 'python')).toThrow(
      SymbolParseError
    );
  });
});

describe('extractSymbols (typescript)', () => {
  const symbols = extractSymbols(TS_SOURCE, 'src/web/greet.ts', 'web.greet', 'typescript');

  it('finds exported functions, classes, methods and arrow functions', () => {
    expect(symbols.map((s) => [s.symbolId, s.kind, s.start, s.end])).toEqual([
      ['web.greet', 'module', 1, 17],
      ['web.greet.hello', 'function', 6, 8],
      ['web.greet.Greeter', 'class', 10, 15],
      ['web.greet.Greeter.shout', 'method', 12, 14],
      ['web.greet.wave', 'function', 17, 17],
    ]);
  });

  it('reads JSDoc comments', () => {
    const docs = Object.fromEntries(symbols.map((s) => [s.symbolId, s.docstring]));

    expect(docs['web.greet']).toBe('Greeting helpers.');
    expect(docs['web.greet.hello']).toBe('Says hello.');
    expect(docs['web.greet.Greeter']).toBe('');
    expect(docs['web.greet.Greeter.shout']).toBe('Greets loudly.');
  });
});

describe('moduleQualname', () => {
  it('joins path segments with dots', () => {
    expect(moduleQualname('/repo/src/pkg/core.py', '/repo/src')).toBe('pkg.core');
  });

  it('falls back to the stem outside the package root', () => {
    expect(moduleQualname('/repo/scripts/run.py', '/repo/src')).toBe('run');
  });
});

describe('TreeSitterSymbolExtractor', () => {
  let repo: string;

  beforeEach(() => {
    repo = mkdtempSync(join(tmpdir(), 'docweave-extract-'));
    mkdirSync(join(repo, 'src', 'pkg'), { recursive: true });
  });

  afterEach(() => {
    rmSync(repo, { recursive: true, force: true });
  });

  it('reads files relative to the repository', () => {
    writeFileSync(join(repo, 'src', 'pkg', 'Foo.py'), 'class Foo:\n    def bar(self):\n        pass\n');
    const extractor = new TreeSitterSymbolExtractor(repo, join(repo, 'src'));

    expect(extractor.extractFile('src/pkg/Foo.py').map((s) => s.symbolId)).toEqual([
      'pkg.Foo',
      'pkg.Foo.Foo',
      'pkg.Foo.Foo.bar',
    ]);
  });

  it('wraps missing files in SymbolParseError', () => {
    const extractor = new TreeSitterSymbolExtractor(repo, join(repo, 'src'));

    expect(() => extractor.extractFile('src/pkg/missing.py')).toThrow(SymbolParseError);
  });
});
