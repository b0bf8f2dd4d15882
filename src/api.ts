// src/api.ts - Library entry point

export * from './model/index.js';
export * from './symbols/index.js';
export * from './parser/index.js';
export * from './sinks/index.js';

export { configurationSchema, validatorConfigurationSchema } from './config/schema.js';
export type { Configuration, ValidatorConfiguration } from './config/schema.js';
export { ConfigurationLoader, type ConfigurationLoadResult } from './config/configuration-loader.js';
export { defaultConfiguration } from './config/defaults.js';

export {
  ValidationEngine,
  ValidationEngineBuilder,
  type ValidationResults,
} from './core/validation-engine.js';

export { Validator } from './validators/validator.js';
export { ValidatorRegistry, type RegisteredRule } from './validators/validator-registry.js';
export {
  createDefaultRegistry,
  CORE_NAMESPACE,
  SENTENCE_NAMESPACE,
  SECTION_NAMESPACE,
} from './validators/builtin-validators.js';
export {
  isPreProcessor,
  type AnyValidator,
  type DocumentValidator,
  type SectionValidator,
  type SentenceValidator,
  type PreProcessor,
  type TargetEntities,
  type ValidationTarget,
  type ValidatorClass,
} from './validators/types.js';

export type { Tokenizer } from './tokenizer/types.js';
export { WhitespaceTokenizer, createTokenizer } from './tokenizer/whitespace-tokenizer.js';

export { ConfigurationError, ConstructionError, SinkError, DocumentParseError } from './utils/errors.js';
export { Logger, LogLevel } from './utils/logger.js';
