// src/__tests__/validators/validator-registry.test.ts

import { describe, it, expect } from 'vitest';
import { ValidatorRegistry } from '../../validators/validator-registry.js';
import { Validator } from '../../validators/validator.js';
import { createDefaultRegistry } from '../../validators/builtin-validators.js';
import { SentenceLengthValidator } from '../../validators/sentence/sentence-length-validator.js';
import { SymbolTable } from '../../symbols/symbol-table.js';
import { ConfigurationError, ConstructionError } from '../../utils/errors.js';
import type { Sentence, ValidationError } from '../../model/types.js';
import {
  DocumentFlagValidator,
  SentenceFlagValidator,
  createTestRegistry,
} from '../fixtures/test-validators.js';

const symbolTable = new SymbolTable('en');

class ShadowingValidator extends Validator<'sentence'> {
  readonly target = 'sentence';

  validate(sentence: Sentence): ValidationError[] {
    return [this.createSentenceError(sentence, 'shadow')];
  }
}

describe('ValidatorRegistry', () => {
  describe('addNamespace', () => {
    it('should keep namespaces in declaration order', () => {
      const registry = new ValidatorRegistry().addNamespace('b').addNamespace('a');

      expect(registry.getNamespaces()).toEqual(['b', 'a']);
    });

    it('should reject a duplicate namespace', () => {
      const registry = new ValidatorRegistry().addNamespace('core');

      expect(() => registry.addNamespace('core')).toThrow("Validator namespace 'core' is already declared");
    });
  });

  describe('register', () => {
    it('should reject an unknown namespace', () => {
      const registry = new ValidatorRegistry().addNamespace('core');

      expect(() => registry.register('extra', 'SentenceFlag', SentenceFlagValidator)).toThrow(
        "Validator namespace 'extra' not found. Available namespaces: core"
      );
    });

    it('should reject a duplicate name within one namespace', () => {
      const registry = new ValidatorRegistry()
        .addNamespace('core')
        .register('core', 'SentenceFlag', SentenceFlagValidator);

      expect(() => registry.register('core', 'SentenceFlag', ShadowingValidator)).toThrow(
        "Validator 'SentenceFlag' is already registered in namespace 'core'"
      );
    });

    it('should allow the same name in different namespaces', () => {
      const registry = new ValidatorRegistry()
        .addNamespace('first')
        .addNamespace('second')
        .register('first', 'Rule', SentenceFlagValidator)
        .register('second', 'Rule', ShadowingValidator);

      expect(registry.has('Rule')).toBe(true);
    });
  });

  describe('resolve', () => {
    it('should return an initialized validator carrying its configured name', () => {
      const registry = createTestRegistry();

      const validator = registry.resolve({ name: 'DocumentFlag', options: {} }, symbolTable);

      expect(validator).toBeInstanceOf(DocumentFlagValidator);
      expect(validator.name).toBe('DocumentFlag');
      expect(validator.target).toBe('document');
    });

    it('should build a fresh instance on every call', () => {
      const registry = createTestRegistry();
      const config = { name: 'SentenceFlag', options: {} };

      const first = registry.resolve(config, symbolTable);
      const second = registry.resolve(config, symbolTable);

      expect(first).not.toBe(second);
    });

    it('should pick the first namespace holding the name', () => {
      const registry = new ValidatorRegistry()
        .addNamespace('first')
        .addNamespace('second')
        .register('second', 'Rule', SentenceFlagValidator)
        .register('first', 'Rule', ShadowingValidator);

      const validator = registry.resolve({ name: 'Rule', options: {} }, symbolTable);

      expect(validator).toBeInstanceOf(ShadowingValidator);
    });

    it('should report an unknown name as a configuration error', () => {
      const registry = createTestRegistry();

      expect(() => registry.resolve({ name: 'Missing', options: {} }, symbolTable)).toThrow(ConfigurationError);
      expect(() => registry.resolve({ name: 'Missing', options: {} }, symbolTable)).toThrow(
        'There is no such validator: Missing'
      );
    });

    it('should refuse a class that does not extend Validator directly', () => {
      const registry = createTestRegistry();

      expect(() => registry.resolve({ name: 'NestedSentenceFlag', options: {} }, symbolTable)).toThrow(
        'test.NestedSentenceFlag must extend Validator directly'
      );
    });

    it('should wrap a throwing constructor in ConstructionError', () => {
      const registry = createTestRegistry();

      let caught: unknown;
      try {
        registry.resolve({ name: 'BrokenConstructor', options: {} }, symbolTable);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConstructionError);
      if (caught instanceof ConstructionError) {
        expect(caught.ruleName).toBe('BrokenConstructor');
        expect(caught.message).toBe('[BrokenConstructor] Failed to construct validator: cannot build');
      }
    });

    it('should wrap an initialization failure in ConstructionError', () => {
      const registry = new ValidatorRegistry()
        .addNamespace('sentence')
        .register('sentence', 'SentenceLength', SentenceLengthValidator);

      expect(() =>
        registry.resolve({ name: 'SentenceLength', options: { max_len: 'long' } }, symbolTable)
      ).toThrow(
        '[SentenceLength] Failed to initialize validator: SentenceLength: option "max_len" must be an integer, got "long"'
      );
    });
  });

  describe('listRules', () => {
    it('should list built-in rules by namespace with their targets', () => {
      expect(createDefaultRegistry().listRules()).toEqual([
        { namespace: 'core', ruleName: 'SectionCount', target: 'document' },
        { namespace: 'sentence', ruleName: 'SentenceLength', target: 'sentence' },
        { namespace: 'sentence', ruleName: 'CommaNumber', target: 'sentence' },
        { namespace: 'sentence', ruleName: 'DoubledWord', target: 'sentence' },
        { namespace: 'section', ruleName: 'ParagraphNumber', target: 'section' },
        { namespace: 'section', ruleName: 'SectionLength', target: 'section' },
      ]);
    });

    it('should wrap a throwing constructor in ConstructionError', () => {
      expect(() => createTestRegistry().listRules()).toThrow(ConstructionError);
      expect(() => createTestRegistry().listRules()).toThrow(
        '[BrokenConstructor] Failed to construct validator: cannot build'
      );
    });

    it('should construct each class only once across listings', () => {
      let constructed = 0;
      class CountingValidator extends Validator<'section'> {
        readonly target = 'section';

        constructor() {
          super();
          constructed++;
        }

        validate(): ValidationError[] {
          return [];
        }
      }
      const registry = new ValidatorRegistry().addNamespace('test').register('test', 'Counting', CountingValidator);

      registry.listRules();
      const rules = registry.listRules();

      expect(rules).toEqual([{ namespace: 'test', ruleName: 'Counting', target: 'section' }]);
      expect(constructed).toBe(1);
    });
  });
});
