export {
  extractSymbols,
  moduleQualname,
  TreeSitterSymbolExtractor,
  type SymbolExtractor,
} from './extractor.js';
export { cleanDocstring, pythonDocstring, jsDocText } from './docstrings.js';
export { splitLines, spanText, hashSpan, sha256Hex } from './span.js';
