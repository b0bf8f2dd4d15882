// src/validators/validator.ts

import type { SourcePosition, Sentence, ValidationError } from '../model/types.js';
import type { ValidatorConfiguration } from '../config/schema.js';
import type { Language, SymbolKey } from '../symbols/default-symbols.js';
import type { SymbolTable } from '../symbols/symbol-table.js';
import { ConfigurationError } from '../utils/errors.js';
import type { TargetEntities, ValidationTarget } from './types.js';

/**
 * Base class of every rule.
 *
 * Rules extend this class directly (the registry rejects deeper chains),
 * declare the entity they check through `target`, and read their options in
 * `init()`, which runs once inside `preInit` before the first `validate`.
 */
export abstract class Validator<K extends ValidationTarget = ValidationTarget> {
  abstract readonly target: K;

  private configuration: ValidatorConfiguration | undefined;
  private symbolTable: SymbolTable | undefined;

  preInit(configuration: ValidatorConfiguration, symbolTable: SymbolTable): void {
    this.configuration = configuration;
    this.symbolTable = symbolTable;
    this.init();
  }

  /**
   * Hook for reading options and symbols. Throwing here fails construction.
   */
  protected init(): void {}

  abstract validate(entity: TargetEntities[K]): ValidationError[];

  get name(): string {
    return this.requireConfiguration().name;
  }

  protected getString(option: string, defaultValue: string): string {
    return this.requireConfiguration().options[option] ?? defaultValue;
  }

  protected getInt(option: string, defaultValue: number): number {
    const raw = this.requireConfiguration().options[option];
    if (raw === undefined) {
      return defaultValue;
    }
    if (!/^-?\d+$/.test(raw.trim())) {
      throw new ConfigurationError(
        `${this.name}: option "${option}" must be an integer, got "${raw}"`
      );
    }
    return parseInt(raw, 10);
  }

  protected getBoolean(option: string, defaultValue: boolean): boolean {
    const raw = this.requireConfiguration().options[option];
    if (raw === undefined) {
      return defaultValue;
    }
    const normalized = raw.trim().toLowerCase();
    if (normalized !== 'true' && normalized !== 'false') {
      throw new ConfigurationError(
        `${this.name}: option "${option}" must be true or false, got "${raw}"`
      );
    }
    return normalized === 'true';
  }

  /** Comma separated option, trimmed, empty entries dropped. */
  protected getList(option: string): string[] {
    const raw = this.requireConfiguration().options[option];
    if (raw === undefined) {
      return [];
    }
    return raw
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0);
  }

  protected getSymbol(key: SymbolKey): string {
    return this.requireSymbolTable().getSymbol(key);
  }

  /** Language of the run, as configured. */
  protected getLanguage(): Language {
    return this.requireSymbolTable().lang;
  }

  protected createError(message: string, position: SourcePosition): ValidationError {
    return { validatorName: this.name, message, position };
  }

  protected createSentenceError(
    sentence: Sentence,
    message: string,
    range: { startPosition?: number; endPosition?: number } = {}
  ): ValidationError {
    return {
      validatorName: this.name,
      message,
      position: {
        lineNumber: sentence.lineNumber,
        startPosition: range.startPosition ?? sentence.startPositionOffset,
        ...(range.endPosition !== undefined ? { endPosition: range.endPosition } : {}),
      },
      sentence: sentence.content,
    };
  }

  private requireSymbolTable(): SymbolTable {
    if (!this.symbolTable) {
      throw new Error('Validator used before preInit');
    }
    return this.symbolTable;
  }

  private requireConfiguration(): ValidatorConfiguration {
    if (!this.configuration) {
      throw new Error('Validator used before preInit');
    }
    return this.configuration;
  }
}
