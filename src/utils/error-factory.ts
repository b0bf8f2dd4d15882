// src/utils/error-factory.ts

import { ConfigurationError, ConstructionError } from './errors.js';

export interface RunErrorDetails {
  kind: string;
  message: string;
  stack?: string;
  suggestion?: string;
}

export class ErrorFactory {
  static createRunError(error: unknown): RunErrorDetails {
    const details: RunErrorDetails = {
      kind: error instanceof Error ? error.name : 'Error',
      message: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    };

    const suggestion = this.getSuggestion(error, details.message);
    if (suggestion) {
      details.suggestion = suggestion;
    }

    return details;
  }

  private static getSuggestion(error: unknown, message: string): string | undefined {
    if (message.includes('There is no such validator')) {
      return 'Run "prosecheck rules" to list the validators that can be configured.';
    }

    if (error instanceof ConstructionError) {
      return `Check the options given to ${error.ruleName} in the configuration file.`;
    }

    if (error instanceof ConfigurationError) {
      return 'Run "prosecheck check-config <file>" to inspect the configuration.';
    }

    if (message.includes('ENOENT')) {
      return 'Input file not found. Check the path.';
    }

    if (message.includes('YAML') || message.includes('JSON')) {
      return 'Check the syntax of the input file.';
    }

    return undefined;
  }
}
