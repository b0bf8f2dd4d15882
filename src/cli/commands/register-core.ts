// src/cli/commands/register-core.ts - Core command registrations

import type { Command } from 'commander';
import { InvalidArgumentError } from 'commander';

import { validateCommand } from './validate.js';
import { rulesCommand } from './rules.js';
import { checkConfigCommand } from './check-config.js';
import { LANGUAGES, type Language } from '../../symbols/default-symbols.js';
import type { OutputFormat } from '../../sinks/console-sink.js';

function parseLimit(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Limit must be a non-negative integer.');
  }
  return parseInt(value, 10);
}

function parseFormat(value: string): OutputFormat {
  if (value !== 'plain' && value !== 'json') {
    throw new InvalidArgumentError('Format must be "plain" or "json".');
  }
  return value;
}

function parseLanguage(value: string): Language {
  const lang = LANGUAGES.find((candidate) => candidate === value);
  if (!lang) {
    throw new InvalidArgumentError(`Language must be one of: ${LANGUAGES.join(', ')}.`);
  }
  return lang;
}

export function registerCoreCommands(program: Command): void {
  program
    .command('validate')
    .description('Validate document tree files (YAML or JSON)')
    .argument('<files...>', 'Document tree files to validate')
    .option('-c, --config <file>', 'Rule configuration file (YAML)')
    .option('-f, --format <format>', 'Output format: plain or json', parseFormat, 'plain')
    .option('-l, --limit <n>', 'Findings allowed before exiting with 1', parseLimit, 1)
    .option('--lang <lang>', 'Language of the built-in configuration', parseLanguage)
    .action(async (files: string[], opts: {
      config?: string;
      format: OutputFormat;
      limit: number;
      lang?: Language;
    }) => {
      process.exitCode = await validateCommand(files, opts);
    });

  program
    .command('rules')
    .description('List the validators that can be configured')
    .action(() => {
      process.exitCode = rulesCommand();
    });

  program
    .command('check-config')
    .description('Resolve every rule of a configuration file')
    .argument('<file>', 'Rule configuration file (YAML)')
    .action(async (file: string) => {
      process.exitCode = await checkConfigCommand(file);
    });
}
