// src/symbols/symbol-table.ts

import { DEFAULT_SYMBOLS, SYMBOL_KEYS, type Language, type SymbolKey, type SymbolValues } from './default-symbols.js';

/**
 * Symbols configured for one run, on top of the defaults of its language.
 */
export class SymbolTable {
  private readonly overrides: ReadonlyMap<SymbolKey, string>;

  constructor(
    readonly lang: Language,
    overrides: Partial<Record<SymbolKey, string>> = {}
  ) {
    const entries = new Map<SymbolKey, string>();
    for (const key of SYMBOL_KEYS) {
      const value = overrides[key];
      if (value !== undefined) {
        entries.set(key, value);
      }
    }
    this.overrides = entries;
  }

  /** True only for symbols the configuration sets explicitly. */
  containsSymbol(key: SymbolKey): boolean {
    return this.overrides.has(key);
  }

  getSymbol(key: SymbolKey): string {
    return this.overrides.get(key) ?? this.getDefaults()[key];
  }

  getDefaults(): SymbolValues {
    return DEFAULT_SYMBOLS[this.lang];
  }

  getConfiguredSymbols(): Array<[SymbolKey, string]> {
    return Array.from(this.overrides.entries());
  }
}
