// src/cli/commands/validate.ts

import * as fs from 'fs/promises';
import * as path from 'path';
import chalk from 'chalk';
import { ValidationEngine } from '../../core/validation-engine.js';
import type { ParserSource } from '../../parser/types.js';
import { TreeDocumentParser } from '../../parser/tree-document-parser.js';
import { ConsoleSink, type OutputFormat } from '../../sinks/console-sink.js';
import type { Language } from '../../symbols/default-symbols.js';
import { ErrorFactory } from '../../utils/error-factory.js';

export interface ValidateCommandOptions {
  config?: string;
  format?: OutputFormat;
  limit?: number;     // Findings allowed before the exit code turns to 1 (default: 1)
  lang?: Language;    // Language of the built-in configuration when --config is absent
}

/**
 * Validate document tree files and stream findings to stdout.
 * Returns the process exit code.
 */
export async function validateCommand(
  files: string[],
  options: ValidateCommandOptions = {}
): Promise<number> {
  const format = options.format ?? 'plain';
  const limit = options.limit ?? 1;

  try {
    const sink = new ConsoleSink(process.stdout, {
      format,
      color: format === 'plain' && process.stdout.isTTY === true,
    });
    const engine = await ValidationEngine.fromConfigPath(options.config, { sink, lang: options.lang });

    const sources: ParserSource[] = [];
    for (const file of files) {
      sources.push({ content: await fs.readFile(file, 'utf-8'), fileName: path.normalize(file) });
    }

    const collection = engine.parseAll(new TreeDocumentParser(), sources);
    const results = engine.validate(collection);

    let total = 0;
    for (const errors of results.values()) {
      total += errors.length;
    }

    if (format === 'plain') {
      const summary = `${total} finding(s) in ${results.size} document(s)`;
      console.log(total > 0 ? chalk.yellow(summary) : chalk.green(summary));
    }

    if (total > limit) {
      console.error(`❌ The number of findings (${total}) exceeds the limit of ${limit}`);
      return 1;
    }
    return 0;
  } catch (error) {
    const details = ErrorFactory.createRunError(error);
    console.error(`❌ ${details.kind}: ${details.message}`);
    if (details.suggestion) {
      console.error(`   ${details.suggestion}`);
    }
    return 1;
  }
}
