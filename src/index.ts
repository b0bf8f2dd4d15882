#!/usr/bin/env node

// src/index.ts - CLI entry point

import { createProgram, CommanderError } from './cli/program.js';
import { Logger } from './utils/logger.js';

const REQUIRED_NODE_MAJOR = 20;

async function main(): Promise<void> {
  const majorVersion = parseInt(process.version.slice(1).split('.')[0] ?? '0', 10);
  if (majorVersion < REQUIRED_NODE_MAJOR) {
    console.error(`❌ Node.js ${REQUIRED_NODE_MAJOR}+ required. Current: ${process.version}`);
    process.exitCode = 1;
    return;
  }

  const program = await createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      process.exitCode = error.exitCode;
      return;
    }
    throw error;
  }
}

main().catch((error: unknown) => {
  Logger.error(error instanceof Error ? error.message : String(error));
  if (process.env.DEBUG) {
    console.error(error);
  }
  process.exitCode = 1;
});
