// src/cli/program.ts - Commander program factory

import { Command, CommanderError } from 'commander';
import * as fs from 'fs/promises';

import { Logger, LogLevel } from '../utils/logger.js';
import { registerCoreCommands } from './commands/register-core.js';

interface PackageInfo {
  version: string;
}

async function readPackageInfo(): Promise<PackageInfo> {
  const pkgPath = new URL('../../package.json', import.meta.url);
  const parsed: unknown = JSON.parse(await fs.readFile(pkgPath, 'utf-8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return { version: parsed.version };
  }
  return { version: '0.0.0' };
}

export async function createProgram(): Promise<Command> {
  const pkg = await readPackageInfo();

  const program = new Command();

  program
    .name('prosecheck')
    .version(`prosecheck v${pkg.version}`, '-v, --version')
    .description('Rule-based validation of parsed documents')
    .option('--debug', 'Show debug logging')
    .exitOverride();

  program.hook('preAction', () => {
    const { debug } = program.opts<{ debug?: boolean }>();
    if (debug || process.env.DEBUG) {
      Logger.setLevel(LogLevel.DEBUG);
    }
  });

  registerCoreCommands(program);

  return program;
}

export { CommanderError };
