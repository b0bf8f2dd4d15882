// src/__tests__/cli/commands/check-config.test.ts

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { checkConfigCommand } from '../../../cli/commands/check-config.js';
import { createTempDir, cleanupTempDir } from '../../setup.js';

describe('checkConfigCommand', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir('check-config-test-');
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  async function writeConfig(content: string): Promise<string> {
    const configPath = path.join(tempDir, 'prosecheck.yml');
    await fs.writeFile(configPath, content);
    return configPath;
  }

  it('should list each resolved rule and the sentence boundary', async () => {
    const configPath = await writeConfig(`
lang: ja
validators:
  - name: SentenceLength
  - name: SectionCount
`);

    const code = await checkConfigCommand(configPath);

    expect(code).toBe(0);
    expect(console.log).toHaveBeenCalledWith(`ℹ️  Checking configuration: ${configPath}`);
    expect(console.log).toHaveBeenCalledWith('  ✅ SentenceLength (sentence)');
    expect(console.log).toHaveBeenCalledWith('  ✅ SectionCount (document)');
    expect(console.log).toHaveBeenCalledWith('\nLanguage: ja');
    expect(console.log).toHaveBeenCalledWith('Sentence terminators: 。 ？ ！');
    expect(console.log).toHaveBeenCalledWith('Closing quotations: 』 」');
    expect(console.log).toHaveBeenCalledWith('✅ Configuration is valid!');
  });

  it('should report a rule that fails to initialize', async () => {
    const configPath = await writeConfig(`
validators:
  - name: SentenceLength
    options:
      max_len: x
`);

    const code = await checkConfigCommand(configPath);

    expect(code).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      '❌ ConstructionError: [SentenceLength] Failed to initialize validator: SentenceLength: option "max_len" must be an integer, got "x"'
    );
    expect(console.error).toHaveBeenCalledWith(
      '   Check the options given to SentenceLength in the configuration file.'
    );
  });

  it('should report a missing configuration file', async () => {
    const configPath = path.join(tempDir, 'absent.yml');

    const code = await checkConfigCommand(configPath);

    expect(code).toBe(1);
    expect(console.error).toHaveBeenCalledWith(`❌ ConfigurationError: Configuration file not found: ${configPath}`);
    expect(console.error).toHaveBeenCalledWith(
      '   Run "prosecheck check-config <file>" to inspect the configuration.'
    );
  });
});
