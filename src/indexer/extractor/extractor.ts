/**
 * Symbol Extractor
 *
 * Uses tree-sitter to find the documentable symbols of a source file:
 * - one module symbol spanning the whole file
 * - top-level classes and functions (async and generators included)
 * - methods defined directly in a top-level class
 *
 * Nested functions and classes belong to their enclosing symbol's span.
 * Supports: Python, TypeScript, JavaScript
 */

import { readFileSync } from 'node:fs';
import { basename, extname, join, relative, sep } from 'node:path';
import Parser from 'tree-sitter';
import TypeScriptLang from 'tree-sitter-typescript';
import JavaScriptLang from 'tree-sitter-javascript';
import PythonLang from 'tree-sitter-python';

import { SymbolParseError } from '../../errors/index.js';
import { languageForFile } from '../scanner.js';
import type { CodeSymbol, SourceLanguage, SymbolKind } from '../types.js';
import { jsDocText, pythonDocstring } from './docstrings.js';
import { hashSpan, splitLines } from './span.js';

// tree-sitter's Language type (compiled parser) vs our SourceLanguage (string union)
type TreeSitterLanguage = Parameters<Parser['setLanguage']>[0];
type SyntaxNode = Parser.SyntaxNode;

/** tree-sitter's node binding rejects single strings above this size */
const PARSE_CHUNK = 16 * 1024;

/**
 * Language to tree-sitter parser mapping.
 */
function getParserLanguage(language: SourceLanguage): TreeSitterLanguage {
  switch (language) {
    case 'typescript':
      return TypeScriptLang.typescript as TreeSitterLanguage;
    case 'javascript':
      return JavaScriptLang as TreeSitterLanguage;
    case 'python':
      return PythonLang as TreeSitterLanguage;
  }
}

/**
 * Something that turns a source file into symbols.
 */
export interface SymbolExtractor {
  /**
   * @param file repo-relative POSIX path
   * @throws SymbolParseError when the file cannot be read or parsed
   */
  extractFile(file: string): CodeSymbol[];
}

/**
 * Module name for a file: its path relative to the package root without
 * extension, segments joined by '.'. Files outside the package root fall
 * back to their stem.
 */
export function moduleQualname(absoluteFile: string, packageRoot: string): string {
  const rel = relative(packageRoot, absoluteFile);
  if (rel === '' || rel.startsWith('..')) {
    return basename(absoluteFile, extname(absoluteFile));
  }
  const withoutExt = rel.slice(0, rel.length - extname(rel).length);
  return withoutExt.split(sep).join('.');
}

// ============================================================================
// Symbol construction
// ============================================================================

interface WalkContext {
  file: string;
  module: string;
  lines: string[];
  out: CodeSymbol[];
}

function pushSymbol(
  ctx: WalkContext,
  kind: SymbolKind,
  name: string,
  parent: string,
  span: SyntaxNode,
  docstring: string
): string {
  const qualname = `${parent}.${name}`;
  const start = span.startPosition.row + 1;
  const end = span.endPosition.row + 1;
  ctx.out.push({
    symbolId: qualname,
    kind,
    file: ctx.file,
    qualname,
    parent,
    start,
    end,
    docstring,
    hash: hashSpan(ctx.lines, start, end),
  });
  return qualname;
}

function nameOf(node: SyntaxNode): string | null {
  return node.childForFieldName('name')?.text ?? null;
}

// ============================================================================
// Python
// ============================================================================

/** `@decorator\ndef f()` => the def itself; the span starts at `def` */
function unwrapDecorated(node: SyntaxNode): SyntaxNode {
  if (node.type === 'decorated_definition') {
    return node.childForFieldName('definition') ?? node;
  }
  return node;
}

/** First statement of a block/module when it is a bare string literal */
function leadingPythonDocstring(container: SyntaxNode | null): string {
  const first = container?.namedChildren.find((child) => child.type !== 'comment');
  if (first?.type !== 'expression_statement') {
    return '';
  }
  const literal = first.namedChildren[0];
  return literal?.type === 'string' ? pythonDocstring(literal.text) : '';
}

function walkPython(root: SyntaxNode, ctx: WalkContext): string {
  for (const child of root.namedChildren) {
    const def = unwrapDecorated(child);
    const name = nameOf(def);
    if (name === null) continue;

    if (def.type === 'function_definition') {
      pushSymbol(ctx, 'function', name, ctx.module, def, leadingPythonDocstring(def.childForFieldName('body')));
    } else if (def.type === 'class_definition') {
      const body = def.childForFieldName('body');
      const classQualname = pushSymbol(ctx, 'class', name, ctx.module, def, leadingPythonDocstring(body));

      for (const item of body?.namedChildren ?? []) {
        const method = unwrapDecorated(item);
        const methodName = nameOf(method);
        if (method.type === 'function_definition' && methodName !== null) {
          pushSymbol(
            ctx,
            'method',
            methodName,
            classQualname,
            method,
            leadingPythonDocstring(method.childForFieldName('body'))
          );
        }
      }
    }
  }
  return leadingPythonDocstring(root);
}

// ============================================================================
// TypeScript / JavaScript
// ============================================================================

const JS_FUNCTION_DECLARATIONS = new Set(['function_declaration', 'generator_function_declaration']);
const JS_CLASS_DECLARATIONS = new Set(['class_declaration', 'abstract_class_declaration', 'class']);
const JS_FUNCTION_VALUES = new Set(['arrow_function', 'function_expression', 'function', 'generator_function']);

/** The `/** *\/` comment directly above a node, skipping decorators */
function precedingJsDoc(node: SyntaxNode): string {
  let sibling = node.previousNamedSibling;
  while (sibling?.type === 'decorator') {
    sibling = sibling.previousNamedSibling;
  }
  if (
    sibling?.type === 'comment' &&
    sibling.text.startsWith('/**') &&
    sibling.endPosition.row >= node.startPosition.row - 1
  ) {
    return jsDocText(sibling.text);
  }
  return '';
}

function walkJsClass(cls: SyntaxNode, classQualname: string, ctx: WalkContext): void {
  const body = cls.childForFieldName('body');
  for (const member of body?.namedChildren ?? []) {
    const name = nameOf(member);
    if (member.type === 'method_definition' && name !== null) {
      pushSymbol(ctx, 'method', name, classQualname, member, precedingJsDoc(member));
    }
  }
}

function walkJs(root: SyntaxNode, ctx: WalkContext): string {
  for (const statement of root.namedChildren) {
    // `export ...` wraps the declaration; span and doc comment belong to the export
    const decl =
      statement.type === 'export_statement'
        ? statement.childForFieldName('declaration') ?? statement.childForFieldName('value')
        : statement;
    if (decl === null) continue;

    const docstring = precedingJsDoc(statement);
    const name = nameOf(decl);

    if (JS_FUNCTION_DECLARATIONS.has(decl.type) && name !== null) {
      pushSymbol(ctx, 'function', name, ctx.module, statement, docstring);
    } else if (JS_CLASS_DECLARATIONS.has(decl.type) && name !== null) {
      const classQualname = pushSymbol(ctx, 'class', name, ctx.module, statement, docstring);
      walkJsClass(decl, classQualname, ctx);
    } else if (decl.type === 'lexical_declaration' || decl.type === 'variable_declaration') {
      // const handler = async () => {...}
      const declarators = decl.namedChildren.filter((c) => c.type === 'variable_declarator');
      for (const declarator of declarators) {
        const value = declarator.childForFieldName('value');
        const declaratorName = nameOf(declarator);
        if (value && JS_FUNCTION_VALUES.has(value.type) && declaratorName !== null) {
          const span = declarators.length === 1 ? statement : declarator;
          pushSymbol(ctx, 'function', declaratorName, ctx.module, span, docstring);
        }
      }
    }
  }

  // A file-level doc comment is the first node, followed by a blank line
  const first = root.namedChildren[0];
  const second = root.namedChildren[1];
  if (
    first?.type === 'comment' &&
    first.text.startsWith('/**') &&
    (second === undefined || second.startPosition.row > first.endPosition.row + 1)
  ) {
    return jsDocText(first.text);
  }
  return '';
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Extract the symbols of one source text.
 *
 * @param source - file contents
 * @param file - repo-relative POSIX path recorded on each symbol
 * @param module - module qualname (see moduleQualname)
 * @param language - which grammar to parse with
 * @param parser - reused parser; a fresh one is created when omitted
 * @throws SymbolParseError when the tree contains syntax errors
 */
export function extractSymbols(
  source: string,
  file: string,
  module: string,
  language: SourceLanguage,
  parser: Parser = new Parser()
): CodeSymbol[] {
  parser.setLanguage(getParserLanguage(language));
  const tree = parser.parse((index: number) => source.slice(index, index + PARSE_CHUNK));

  if (tree.rootNode.descendantsOfType('ERROR').length > 0) {
    throw new SymbolParseError(file, new Error('syntax error'));
  }

  const lines = splitLines(source);
  const ctx: WalkContext = { file, module, lines, out: [] };
  const moduleDoc = language === 'python' ? walkPython(tree.rootNode, ctx) : walkJs(tree.rootNode, ctx);

  const end = Math.max(lines.length, 1);
  const moduleSymbol: CodeSymbol = {
    symbolId: module,
    kind: 'module',
    file,
    qualname: module,
    parent: null,
    start: 1,
    end,
    docstring: moduleDoc,
    hash: hashSpan(lines, 1, end),
  };

  return [moduleSymbol, ...ctx.out];
}

/**
 * Reads files from disk and extracts their symbols with tree-sitter.
 */
export class TreeSitterSymbolExtractor implements SymbolExtractor {
  private readonly parser = new Parser();

  /**
   * @param repoRoot - absolute repository root; files are relative to it
   * @param packageRoot - directory module names are computed against
   */
  constructor(
    private readonly repoRoot: string,
    private readonly packageRoot: string
  ) {}

  extractFile(file: string): CodeSymbol[] {
    const language = languageForFile(file);
    if (language === null) {
      throw new SymbolParseError(file, new Error(`unsupported extension ${extname(file) || '(none)'}`));
    }

    const absolute = join(this.repoRoot, file);
    let source: string;
    try {
      source = readFileSync(absolute, 'utf-8');
    } catch (error) {
      throw new SymbolParseError(file, error instanceof Error ? error : new Error(String(error)));
    }

    return extractSymbols(source, file, moduleQualname(absolute, this.packageRoot), language, this.parser);
  }
}
