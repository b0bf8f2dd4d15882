// src/symbols/sentence-boundary.ts

import { Logger } from '../utils/logger.js';
import type { SymbolKey, SymbolValues } from './default-symbols.js';
import type { SymbolTable } from './symbol-table.js';

const PERIOD_KEYS: readonly SymbolKey[] = ['FULL_STOP', 'QUESTION_MARK', 'EXCLAMATION_MARK'];
const RIGHT_QUOTATION_KEYS: readonly SymbolKey[] = [
  'RIGHT_SINGLE_QUOTATION_MARK',
  'RIGHT_DOUBLE_QUOTATION_MARK',
];

/**
 * Sentence terminators and closing quotations handed to a document parser.
 * Symbols the table does not define fall back to `defaults`, which are the
 * defaults of the table's language unless given.
 */
export class SentenceBoundary {
  readonly periods: readonly string[];
  readonly rightQuotations: readonly string[];

  constructor(symbolTable: SymbolTable, defaults: SymbolValues = symbolTable.getDefaults()) {
    const pick = (key: SymbolKey): string =>
      symbolTable.containsSymbol(key) ? symbolTable.getSymbol(key) : defaults[key];

    this.periods = Object.freeze(PERIOD_KEYS.map(pick));
    this.rightQuotations = Object.freeze(RIGHT_QUOTATION_KEYS.map(pick));

    for (const period of this.periods) {
      Logger.debug(`"${period}" is added as an end of sentence character`);
    }
    for (const quotation of this.rightQuotations) {
      Logger.debug(`"${quotation}" is added as an end of right quotation character`);
    }

    Object.freeze(this);
  }
}
