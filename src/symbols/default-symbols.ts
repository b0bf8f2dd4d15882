// src/symbols/default-symbols.ts

export const SYMBOL_KEYS = [
  'FULL_STOP',
  'QUESTION_MARK',
  'EXCLAMATION_MARK',
  'COMMA',
  'COLON',
  'SEMICOLON',
  'SPACE',
  'LEFT_SINGLE_QUOTATION_MARK',
  'RIGHT_SINGLE_QUOTATION_MARK',
  'LEFT_DOUBLE_QUOTATION_MARK',
  'RIGHT_DOUBLE_QUOTATION_MARK',
] as const;

export type SymbolKey = (typeof SYMBOL_KEYS)[number];

export const LANGUAGES = ['en', 'ja'] as const;

export type Language = (typeof LANGUAGES)[number];

export type SymbolValues = Readonly<Record<SymbolKey, string>>;

/**
 * Language defaults used for any symbol a configuration leaves unset.
 */
export const DEFAULT_SYMBOLS: Readonly<Record<Language, SymbolValues>> = Object.freeze({
  en: Object.freeze({
    FULL_STOP: '.',
    QUESTION_MARK: '?',
    EXCLAMATION_MARK: '!',
    COMMA: ',',
    COLON: ':',
    SEMICOLON: ';',
    SPACE: ' ',
    LEFT_SINGLE_QUOTATION_MARK: "'",
    RIGHT_SINGLE_QUOTATION_MARK: "'",
    LEFT_DOUBLE_QUOTATION_MARK: '"',
    RIGHT_DOUBLE_QUOTATION_MARK: '"',
  }),
  ja: Object.freeze({
    FULL_STOP: '。',
    QUESTION_MARK: '？',
    EXCLAMATION_MARK: '！',
    COMMA: '、',
    COLON: '：',
    SEMICOLON: '；',
    SPACE: '　',
    LEFT_SINGLE_QUOTATION_MARK: '『',
    RIGHT_SINGLE_QUOTATION_MARK: '』',
    LEFT_DOUBLE_QUOTATION_MARK: '「',
    RIGHT_DOUBLE_QUOTATION_MARK: '」',
  }),
});
