/**
 * Documentation Sections
 *
 * Reads a document as a list of sections and pairs them with the symbols
 * of its source files. Marker blocks are matched by symbol id; documents
 * without markers fall back to `---` separated sections in source order.
 */

import type { DocumentStore } from '../docs/document-store.js';
import type { CodeSymbol } from '../indexer/types.js';
import type { DocSection, MatchStrategy } from './types.js';

// ============================================================================
// PARSING
// ============================================================================

/** A line holding only three or more dashes */
const SEPARATOR_LINE = /^-{3,}[ \t]*$/gm;

/** A lone top-level heading, e.g. `# API Documentation: pkg_util` */
const TITLE_ONLY = /^#\s[^\n]*$/;

/**
 * Split untagged Markdown on separator lines. Blank parts are dropped, and
 * so is a leading part that is nothing but the document title.
 */
export function splitSections(text: string): DocSection[] {
  const parts = text
    .split(SEPARATOR_LINE)
    .map((part) => part.trim())
    .filter((part) => part !== '');
  if (parts.length > 0 && TITLE_ONLY.test(parts[0] ?? '')) {
    parts.shift();
  }
  return parts.map((content) => ({ symbolId: null, content }));
}

/**
 * Sections of one document: its marker blocks when it has any, otherwise
 * its `---` separated parts. A missing document has no sections.
 */
export function readDocSections(documents: DocumentStore, docPath: string): DocSection[] {
  const ids = documents.listSectionIds(docPath);
  if (ids.length > 0) {
    return ids.map((symbolId) => ({
      symbolId,
      content: (documents.readSectionContent(docPath, symbolId) ?? '').trim(),
    }));
  }
  const text = documents.readDocument(docPath);
  return text === null ? [] : splitSections(text);
}

// ============================================================================
// MATCHING
// ============================================================================

export interface MatchedPair {
  symbol: CodeSymbol | null;
  section: DocSection | null;
}

export interface SectionMatch {
  strategy: MatchStrategy;
  pairs: MatchedPair[];
}

function simpleName(symbol: CodeSymbol): string {
  return symbol.qualname.split('.').pop() ?? symbol.qualname;
}

/**
 * Pair symbols with sections by id. Exact ids (symbol id or qualname) are
 * claimed first; the rest fall back to a section whose id ends in the
 * symbol's simple name. Unclaimed sections come last as extras.
 */
function matchByName(symbols: readonly CodeSymbol[], sections: readonly DocSection[]): MatchedPair[] {
  const named = new Map<string, DocSection>();
  for (const section of sections) {
    if (section.symbolId !== null && !named.has(section.symbolId)) {
      named.set(section.symbolId, section);
    }
  }

  const claimed = new Set<string>();
  const bySymbol = new Map<CodeSymbol, DocSection>();
  for (const symbol of symbols) {
    for (const id of [symbol.symbolId, symbol.qualname]) {
      const section = named.get(id);
      if (section && !claimed.has(id)) {
        claimed.add(id);
        bySymbol.set(symbol, section);
        break;
      }
    }
  }

  for (const symbol of symbols) {
    if (bySymbol.has(symbol)) continue;
    const name = simpleName(symbol);
    for (const [id, section] of named) {
      if (!claimed.has(id) && (id === name || id.endsWith(`.${name}`))) {
        claimed.add(id);
        bySymbol.set(symbol, section);
        break;
      }
    }
  }

  const pairs: MatchedPair[] = symbols.map((symbol) => ({ symbol, section: bySymbol.get(symbol) ?? null }));
  for (const [id, section] of named) {
    if (!claimed.has(id)) pairs.push({ symbol: null, section });
  }
  return pairs;
}

function matchByOrder(symbols: readonly CodeSymbol[], sections: readonly DocSection[]): MatchedPair[] {
  const pairs: MatchedPair[] = [];
  for (let i = 0; i < Math.max(symbols.length, sections.length); i++) {
    pairs.push({ symbol: symbols[i] ?? null, section: sections[i] ?? null });
  }
  return pairs;
}

/**
 * @param symbols in document order (source file, then start line)
 */
export function matchSections(symbols: readonly CodeSymbol[], sections: readonly DocSection[]): SectionMatch {
  if (sections.some((section) => section.symbolId !== null)) {
    return { strategy: 'name', pairs: matchByName(symbols, sections) };
  }
  return { strategy: 'order', pairs: matchByOrder(symbols, sections) };
}
