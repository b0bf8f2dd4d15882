// src/config/defaults.ts

import type { Language } from '../symbols/default-symbols.js';
import type { Configuration } from './schema.js';

/**
 * Rule set used when no configuration file is given.
 */
export function defaultConfiguration(lang: Language = 'en'): Configuration {
  return {
    lang,
    symbols: {},
    validators: [
      { name: 'SectionCount', options: {} },
      { name: 'SectionLength', options: {} },
      { name: 'ParagraphNumber', options: {} },
      { name: 'SentenceLength', options: { max_len: lang === 'ja' ? '100' : '120' } },
      { name: 'CommaNumber', options: {} },
      { name: 'DoubledWord', options: {} },
    ],
  };
}
