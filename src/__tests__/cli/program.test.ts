// src/__tests__/cli/program.test.ts

import { describe, it, expect, vi } from 'vitest';
import { createProgram, CommanderError } from '../../cli/program.js';
import { Logger, LogLevel } from '../../utils/logger.js';

describe('createProgram', () => {
  it('should register the core commands', async () => {
    const program = await createProgram();

    expect(program.name()).toBe('prosecheck');
    expect(program.commands.map((command) => command.name())).toEqual(['validate', 'rules', 'check-config']);
  });

  it('should print the package version', async () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const program = await createProgram();

    await expect(program.parseAsync(['node', 'prosecheck', '--version'])).rejects.toBeInstanceOf(CommanderError);
    expect(write).toHaveBeenCalledWith('prosecheck v0.3.0\n');
  });

  it('should enable debug logging with --debug', async () => {
    const program = await createProgram();

    await program.parseAsync(['node', 'prosecheck', '--debug', 'rules']);

    expect(Logger.getLevel()).toBe(LogLevel.DEBUG);
  });

  it('should reject a malformed limit', async () => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const program = await createProgram();

    await expect(
      program.parseAsync(['node', 'prosecheck', 'validate', 'doc.yml', '--limit', 'many'])
    ).rejects.toThrow("option '-l, --limit <n>' argument 'many' is invalid. Limit must be a non-negative integer.");
  });

  it('should reject a limit with trailing characters', async () => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const program = await createProgram();

    await expect(
      program.parseAsync(['node', 'prosecheck', 'validate', 'doc.yml', '--limit', '3abc'])
    ).rejects.toThrow("option '-l, --limit <n>' argument '3abc' is invalid. Limit must be a non-negative integer.");
  });
});
