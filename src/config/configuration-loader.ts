// src/config/configuration-loader.ts

import * as fs from 'fs/promises';
import * as path from 'path';
import * as YAML from 'yaml';
import type { ZodError } from 'zod';
import { configurationSchema, type Configuration } from './schema.js';
import { ConfigurationError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

export interface ConfigurationLoadResult {
  configuration: Configuration;
  sourcePath: string;   // Absolute path, or '<inline>' for string input
  loadedAt: string;     // ISO timestamp
}

export class ConfigurationLoader {
  async loadConfiguration(filePath: string): Promise<ConfigurationLoadResult> {
    const sourcePath = path.resolve(filePath);

    let content: string;
    try {
      content = await fs.readFile(sourcePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        throw new ConfigurationError(`Configuration file not found: ${filePath}`);
      }
      throw error;
    }

    Logger.debug(`Loading configuration from "${sourcePath}"`);
    return {
      configuration: this.parseConfiguration(content, sourcePath),
      sourcePath,
      loadedAt: new Date().toISOString(),
    };
  }

  /**
   * Parses YAML (or JSON, which YAML accepts) into a validated configuration.
   */
  parseConfiguration(content: string, source: string = '<inline>'): Configuration {
    let raw: unknown;
    try {
      raw = YAML.parse(content);
    } catch (error) {
      throw new ConfigurationError(`Invalid YAML in ${source}: ${(error as Error).message}`);
    }

    if (raw === null || raw === undefined) {
      throw new ConfigurationError(`Configuration ${source} is empty`);
    }

    const result = configurationSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigurationError(
        `Invalid configuration in ${source}: ${formatIssues(result.error)}`
      );
    }

    if (result.data.validators.length === 0) {
      Logger.warn(`No validators configured in ${source}`);
    }
    return result.data;
  }
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${field}: ${issue.message}`;
    })
    .join('; ');
}
