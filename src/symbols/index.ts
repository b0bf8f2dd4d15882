// src/symbols/index.ts

export {
  DEFAULT_SYMBOLS,
  LANGUAGES,
  SYMBOL_KEYS,
  type Language,
  type SymbolKey,
  type SymbolValues,
} from './default-symbols.js';
export { SymbolTable } from './symbol-table.js';
export { SentenceBoundary } from './sentence-boundary.js';
