// src/utils/errors.ts

/**
 * Raised while building an engine: unknown rule name, a rule class outside
 * the flat plugin hierarchy, an unrecognized target, or malformed options.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ConstructionError extends Error {
  constructor(
    public ruleName: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`[${ruleName}] ${message}`, options);
    this.name = 'ConstructionError';
  }
}

/**
 * Raised by a result sink that cannot emit a finding. The engine treats it
 * as recoverable.
 */
export class SinkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SinkError';
  }
}

export class DocumentParseError extends Error {
  constructor(
    public source: string,
    message: string
  ) {
    super(`[${source}] ${message}`);
    this.name = 'DocumentParseError';
  }
}
