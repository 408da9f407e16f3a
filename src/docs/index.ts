export {
  DocumentStore,
  defaultHeader,
  type DocumentStoreOptions,
  type FoundSection,
  type WriteOutcome,
} from './document-store.js';
export {
  assertValidSymbolId,
  sectionMarkers,
  sectionPattern,
  renderBlock,
  parseBlocks,
  escapeRegExp,
  type ParsedBlock,
  type SectionMarkers,
} from './markers.js';
export { docFileNameForSource } from './naming.js';
