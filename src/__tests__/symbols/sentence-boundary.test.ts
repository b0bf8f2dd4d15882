// src/__tests__/symbols/sentence-boundary.test.ts

import { describe, it, expect } from 'vitest';
import { SentenceBoundary } from '../../symbols/sentence-boundary.js';
import { SymbolTable } from '../../symbols/symbol-table.js';
import { DEFAULT_SYMBOLS } from '../../symbols/default-symbols.js';
import { Logger, LogLevel } from '../../utils/logger.js';

describe('SentenceBoundary', () => {
  it('should use English defaults when nothing is configured', () => {
    const boundary = new SentenceBoundary(new SymbolTable('en'));

    expect(boundary.periods).toEqual(['.', '?', '!']);
    expect(boundary.rightQuotations).toEqual(["'", '"']);
  });

  it('should use Japanese defaults for a Japanese table', () => {
    const boundary = new SentenceBoundary(new SymbolTable('ja'));

    expect(boundary.periods).toEqual(['。', '？', '！']);
    expect(boundary.rightQuotations).toEqual(['』', '」']);
  });

  it('should prefer configured symbols over defaults', () => {
    const boundary = new SentenceBoundary(
      new SymbolTable('en', { FULL_STOP: '。', RIGHT_DOUBLE_QUOTATION_MARK: '»' })
    );

    expect(boundary.periods).toEqual(['。', '?', '!']);
    expect(boundary.rightQuotations).toEqual(["'", '»']);
  });

  it('should take unset symbols from explicit defaults', () => {
    const boundary = new SentenceBoundary(new SymbolTable('en', { QUESTION_MARK: '¿' }), DEFAULT_SYMBOLS.ja);

    expect(boundary.periods).toEqual(['。', '¿', '！']);
    expect(boundary.rightQuotations).toEqual(['』', '」']);
  });

  it('should be immutable', () => {
    const boundary = new SentenceBoundary(new SymbolTable('en'));

    expect(Object.isFrozen(boundary)).toBe(true);
    expect(Object.isFrozen(boundary.periods)).toBe(true);
    expect(Object.isFrozen(boundary.rightQuotations)).toBe(true);
  });

  it('should log each resolved symbol at debug level', () => {
    Logger.setLevel(LogLevel.DEBUG);

    new SentenceBoundary(new SymbolTable('en'));

    expect(console.debug).toHaveBeenCalledTimes(5);
    expect(console.debug).toHaveBeenNthCalledWith(1, '🔍 "." is added as an end of sentence character');
    expect(console.debug).toHaveBeenNthCalledWith(5, '🔍 """ is added as an end of right quotation character');
  });
});

describe('SymbolTable', () => {
  it('should report only configured symbols as contained', () => {
    const table = new SymbolTable('en', { COMMA: ';' });

    expect(table.containsSymbol('COMMA')).toBe(true);
    expect(table.containsSymbol('FULL_STOP')).toBe(false);
    expect(table.getSymbol('COMMA')).toBe(';');
    expect(table.getSymbol('FULL_STOP')).toBe('.');
    expect(table.getConfiguredSymbols()).toEqual([['COMMA', ';']]);
  });
});
