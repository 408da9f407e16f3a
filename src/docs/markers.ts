/**
 * Section Markers
 *
 * Every generated block is bounded by a marker pair unique to its symbol:
 *
 *   <!-- BEGIN: auto:pkg.Foo.bar -->
 *   ...content...
 *   <!-- END: auto:pkg.Foo.bar -->
 *
 * Markers are matched literally and non-greedily, so a symbol id must not
 * contain marker syntax itself.
 */

import { InvalidSymbolIdError } from '../errors/index.js';

export interface SectionMarkers {
  start: string;
  end: string;
}

/**
 * Reject ids that would make a marker ambiguous.
 *
 * @throws InvalidSymbolIdError
 */
export function assertValidSymbolId(symbolId: string): void {
  if (symbolId.trim() === '') {
    throw new InvalidSymbolIdError(symbolId, 'must not be empty');
  }
  if (/[\r\n]/.test(symbolId)) {
    throw new InvalidSymbolIdError(symbolId, 'must not contain line breaks');
  }
  if (symbolId.includes('<!--') || symbolId.includes('-->')) {
    throw new InvalidSymbolIdError(symbolId, 'must not contain HTML comment delimiters');
  }
}

export function sectionMarkers(symbolId: string): SectionMarkers {
  assertValidSymbolId(symbolId);
  return {
    start: `<!-- BEGIN: auto:${symbolId} -->`,
    end: `<!-- END: auto:${symbolId} -->`,
  };
}

/** Marker pair around the content, no surrounding whitespace */
export function renderBlock(symbolId: string, content: string): string {
  const { start, end } = sectionMarkers(symbolId);
  return `${start}\n${content}\n${end}`;
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Matches one symbol's block, markers included. A fresh RegExp per call:
 * global regexes carry lastIndex state.
 */
export function sectionPattern(symbolId: string, flags = ''): RegExp {
  const { start, end } = sectionMarkers(symbolId);
  return new RegExp(`${escapeRegExp(start)}[\\s\\S]*?${escapeRegExp(end)}`, flags);
}

export interface ParsedBlock {
  symbolId: string;
  /** Block text, markers included */
  text: string;
  /** Offset of the start marker */
  index: number;
}

/**
 * Every well-formed block in a document, in document order.
 * A start marker without its matching end marker is not a block.
 */
export function parseBlocks(text: string): ParsedBlock[] {
  const pattern = /<!-- BEGIN: auto:(.+?) -->[\s\S]*?<!-- END: auto:\1 -->/g;
  const blocks: ParsedBlock[] = [];
  for (const match of text.matchAll(pattern)) {
    const symbolId = match[1];
    if (symbolId === undefined || match.index === undefined) continue;
    blocks.push({ symbolId, text: match[0], index: match.index });
  }
  return blocks;
}
