// src/validators/validator-registry.ts

import type { ValidatorConfiguration } from '../config/schema.js';
import type { SymbolTable } from '../symbols/symbol-table.js';
import { ConfigurationError, ConstructionError } from '../utils/errors.js';
import type { AnyValidator, ValidationTarget, ValidatorClass } from './types.js';
import { Validator } from './validator.js';

interface ValidatorNamespace {
  readonly name: string;
  readonly validators: Map<string, ValidatorClass>;
}

export interface RegisteredRule {
  namespace: string;
  ruleName: string;
  target: ValidationTarget;
}

/**
 * Resolves configured rule names into ready validators.
 *
 * Namespaces are searched in the order they were added and the first one
 * holding the name wins. Each call to `resolve` builds a fresh instance.
 *
 * @example
 * ```typescript
 * const registry = new ValidatorRegistry()
 *   .addNamespace('sentence')
 *   .register('sentence', 'SentenceLength', SentenceLengthValidator);
 *
 * const validator = registry.resolve({ name: 'SentenceLength', options: {} }, symbolTable);
 * ```
 */
export class ValidatorRegistry {
  private readonly namespaces: ValidatorNamespace[] = [];
  private readonly targets = new Map<ValidatorClass, ValidationTarget>();

  /**
   * Append a namespace after the existing ones.
   *
   * @throws Error if the namespace already exists
   */
  addNamespace(name: string): this {
    if (this.namespaces.some((ns) => ns.name === name)) {
      throw new Error(`Validator namespace '${name}' is already declared`);
    }
    this.namespaces.push({ name, validators: new Map() });
    return this;
  }

  /**
   * Register a rule class under a name inside one namespace.
   *
   * @throws Error if the namespace is unknown or already holds the name
   */
  register(namespace: string, ruleName: string, validatorClass: ValidatorClass): this {
    const target = this.namespaces.find((ns) => ns.name === namespace);
    if (!target) {
      throw new Error(
        `Validator namespace '${namespace}' not found. ` +
        `Available namespaces: ${this.getNamespaces().join(', ') || 'none'}`
      );
    }
    if (target.validators.has(ruleName)) {
      throw new Error(`Validator '${ruleName}' is already registered in namespace '${namespace}'`);
    }
    target.validators.set(ruleName, validatorClass);
    return this;
  }

  getNamespaces(): string[] {
    return this.namespaces.map((ns) => ns.name);
  }

  has(ruleName: string): boolean {
    return this.find(ruleName) !== undefined;
  }

  /**
   * All registered rules, in namespace order then registration order.
   * Names shadowed by an earlier namespace are listed too. The target is
   * read from an instance built once per class and kept.
   *
   * @throws ConstructionError if a rule cannot be constructed
   */
  listRules(): RegisteredRule[] {
    const rules: RegisteredRule[] = [];
    for (const ns of this.namespaces) {
      for (const [ruleName, validatorClass] of ns.validators) {
        rules.push({ namespace: ns.name, ruleName, target: this.targetOf(ruleName, validatorClass) });
      }
    }
    return rules;
  }

  /**
   * Build and initialize the validator configured by `configuration`.
   *
   * @throws ConfigurationError if no namespace holds the name, or the class
   *   does not extend Validator directly
   * @throws ConstructionError if construction or preInit throws
   */
  resolve(configuration: ValidatorConfiguration, symbolTable: SymbolTable): AnyValidator {
    const ruleName = configuration.name;
    const found = this.find(ruleName);
    if (!found) {
      throw new ConfigurationError(`There is no such validator: ${ruleName}`);
    }

    const { namespace, validatorClass } = found;
    if (Object.getPrototypeOf(validatorClass) !== Validator) {
      throw new ConfigurationError(
        `${namespace}.${ruleName} must extend Validator directly`
      );
    }

    const validator = construct(ruleName, validatorClass);
    try {
      validator.preInit(configuration, symbolTable);
    } catch (error) {
      throw new ConstructionError(ruleName, `Failed to initialize validator: ${errorMessage(error)}`, { cause: error });
    }

    return validator;
  }

  private targetOf(ruleName: string, validatorClass: ValidatorClass): ValidationTarget {
    let target = this.targets.get(validatorClass);
    if (target === undefined) {
      target = construct(ruleName, validatorClass).target;
      this.targets.set(validatorClass, target);
    }
    return target;
  }

  private find(ruleName: string): { namespace: string; validatorClass: ValidatorClass } | undefined {
    for (const ns of this.namespaces) {
      const validatorClass = ns.validators.get(ruleName);
      if (validatorClass) {
        return { namespace: ns.name, validatorClass };
      }
    }
    return undefined;
  }
}

function construct(ruleName: string, validatorClass: ValidatorClass): AnyValidator {
  try {
    return new validatorClass();
  } catch (error) {
    throw new ConstructionError(ruleName, `Failed to construct validator: ${errorMessage(error)}`, { cause: error });
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
