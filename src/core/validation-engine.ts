// src/core/validation-engine.ts

import { ConfigurationLoader } from '../config/configuration-loader.js';
import { defaultConfiguration } from '../config/defaults.js';
import type { Configuration } from '../config/schema.js';
import { forEachSentenceContainer } from '../model/builders.js';
import { DocumentCollection } from '../model/document-collection.js';
import type { Document, Section, Sentence, ValidationError } from '../model/types.js';
import type { DocumentParser, ParserSource } from '../parser/types.js';
import { ConsoleSink } from '../sinks/console-sink.js';
import { flushErrorSafely, type ResultSink } from '../sinks/types.js';
import type { Language } from '../symbols/default-symbols.js';
import { SentenceBoundary } from '../symbols/sentence-boundary.js';
import { SymbolTable } from '../symbols/symbol-table.js';
import type { Tokenizer } from '../tokenizer/types.js';
import { createTokenizer } from '../tokenizer/whitespace-tokenizer.js';
import { createDefaultRegistry } from '../validators/builtin-validators.js';
import {
  isPreProcessor,
  type AnyValidator,
  type DocumentValidator,
  type SectionValidator,
  type SentenceValidator,
} from '../validators/types.js';
import type { ValidatorRegistry } from '../validators/validator-registry.js';
import { ConfigurationError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

export type ValidationResults = Map<Document, ValidationError[]>;

/**
 * Runs every configured rule over a document collection.
 *
 * Rules are resolved once, at construction, and split by target. A call to
 * `validate` then makes four passes per collection, in this order:
 * document rules, section rules, sentence preprocessing, sentence rules.
 * Within a pass rules run in configuration order and the tree is walked in
 * declaration order. Each finding goes to the sink as soon as it exists.
 *
 * One run at a time per engine: rules may keep state between calls.
 */
export class ValidationEngine {
  private readonly documentValidators: readonly DocumentValidator[];
  private readonly sectionValidators: readonly SectionValidator[];
  private readonly sentenceValidators: readonly SentenceValidator[];
  private readonly symbolTable: SymbolTable;
  private readonly sentenceBoundary: SentenceBoundary;
  private readonly tokenizer: Tokenizer;

  constructor(
    private readonly configuration: Configuration,
    private readonly sink: ResultSink,
    registry: ValidatorRegistry = createDefaultRegistry()
  ) {
    this.symbolTable = new SymbolTable(configuration.lang, configuration.symbols);
    this.sentenceBoundary = new SentenceBoundary(this.symbolTable);
    this.tokenizer = createTokenizer(configuration.lang);

    const documentValidators: DocumentValidator[] = [];
    const sectionValidators: SectionValidator[] = [];
    const sentenceValidators: SentenceValidator[] = [];

    for (const validatorConfig of configuration.validators) {
      const validator = registry.resolve(validatorConfig, this.symbolTable);
      switch (validator.target) {
        case 'document':
          documentValidators.push(validator);
          break;
        case 'section':
          sectionValidators.push(validator);
          break;
        case 'sentence':
          sentenceValidators.push(validator);
          break;
        default:
          throw new ConfigurationError(
            `No validator for ${describeTarget(validator)} block (rule ${validatorConfig.name})`
          );
      }
      Logger.debug(`Loaded validator ${validatorConfig.name} (${validator.target})`);
    }

    this.documentValidators = Object.freeze(documentValidators);
    this.sectionValidators = Object.freeze(sectionValidators);
    this.sentenceValidators = Object.freeze(sentenceValidators);
  }

  static builder(): ValidationEngineBuilder {
    return new ValidationEngineBuilder();
  }

  /**
   * Engine for the configuration file at `configPath`, or for the built-in
   * rule set of `lang` when no path is given.
   */
  static async fromConfigPath(
    configPath: string | undefined,
    options: { sink?: ResultSink; registry?: ValidatorRegistry; lang?: Language } = {}
  ): Promise<ValidationEngine> {
    const configuration = configPath
      ? (await new ConfigurationLoader().loadConfiguration(configPath)).configuration
      : defaultConfiguration(options.lang ?? 'en');

    const builder = ValidationEngine.builder().setConfiguration(configuration);
    if (options.sink) {
      builder.setSink(options.sink);
    }
    if (options.registry) {
      builder.setRegistry(options.registry);
    }
    return builder.build();
  }

  getConfiguration(): Configuration {
    return this.configuration;
  }

  getSymbolTable(): SymbolTable {
    return this.symbolTable;
  }

  getSentenceBoundary(): SentenceBoundary {
    return this.sentenceBoundary;
  }

  getTokenizer(): Tokenizer {
    return this.tokenizer;
  }

  get validatorCount(): number {
    return this.documentValidators.length + this.sectionValidators.length + this.sentenceValidators.length;
  }

  /**
   * Validate the collection. The returned map holds one entry per document,
   * in collection order, with findings in the order they were produced.
   */
  validate(collection: DocumentCollection): ValidationResults {
    this.sink.flushHeader();

    const results: ValidationResults = new Map();
    for (const document of collection) {
      results.set(document, []);
    }

    this.runDocumentValidators(collection, results);
    this.runSectionValidators(collection, results);
    this.runSentencePreProcessors(collection);
    this.runSentenceValidators(collection, results);

    this.sink.flushFooter();
    return results;
  }

  parse(parser: DocumentParser, source: ParserSource): Document {
    return parser.parse(source, this.sentenceBoundary, this.tokenizer);
  }

  parseAll(parser: DocumentParser, sources: ParserSource[]): DocumentCollection {
    const builder = DocumentCollection.builder();
    for (const source of sources) {
      builder.addDocument(this.parse(parser, source));
    }
    return builder.build();
  }

  private runDocumentValidators(collection: DocumentCollection, results: ValidationResults): void {
    for (const document of collection) {
      for (const validator of this.documentValidators) {
        this.record(document, validator.validate(document), results);
      }
    }
  }

  private runSectionValidators(collection: DocumentCollection, results: ValidationResults): void {
    for (const document of collection) {
      for (const section of document.sections) {
        for (const validator of this.sectionValidators) {
          this.record(document, validator.validate(section), results);
        }
      }
    }
  }

  private runSentencePreProcessors(collection: DocumentCollection): void {
    const preprocessors = this.sentenceValidators.filter(isPreProcessor);
    if (preprocessors.length === 0) {
      return;
    }

    for (const document of collection) {
      for (const section of document.sections) {
        forEachSentenceContainer(section, (sentences) => {
          for (const preprocessor of preprocessors) {
            sentences.forEach((sentence) => preprocessor.preprocess(sentence));
          }
        });
      }
    }
  }

  private runSentenceValidators(collection: DocumentCollection, results: ValidationResults): void {
    for (const document of collection) {
      for (const section of document.sections) {
        this.validateSentencesOf(document, section, results);
      }
    }
  }

  private validateSentencesOf(document: Document, section: Section, results: ValidationResults): void {
    forEachSentenceContainer(section, (sentences: Sentence[]) => {
      for (const validator of this.sentenceValidators) {
        for (const sentence of sentences) {
          this.record(document, validator.validate(sentence), results);
        }
      }
    });
  }

  private record(document: Document, errors: ValidationError[], results: ValidationResults): void {
    const accumulated = results.get(document);
    for (const error of errors) {
      this.forward(document, error);
      accumulated?.push(error);
    }
  }

  /**
   * A sink failure is logged and skipped; the finding stays in the results.
   */
  private forward(document: Document, error: ValidationError): void {
    const result = flushErrorSafely(this.sink, document, error);
    if (!result.ok) {
      Logger.error(`Failed to flush error: ${error.validatorName}: ${error.message}`);
      Logger.error(`Skipping to flush this error... (${result.error.message})`);
    }
  }
}

function describeTarget(validator: unknown): string {
  if (typeof validator === 'object' && validator !== null && 'target' in validator) {
    return `"${String(validator.target)}"`;
  }
  return 'an undeclared';
}

export class ValidationEngineBuilder {
  private configuration: Configuration | undefined;
  private sink: ResultSink | undefined;
  private registry: ValidatorRegistry | undefined;

  setConfiguration(configuration: Configuration): this {
    this.configuration = configuration;
    return this;
  }

  setSink(sink: ResultSink): this {
    this.sink = sink;
    return this;
  }

  setRegistry(registry: ValidatorRegistry): this {
    this.registry = registry;
    return this;
  }

  build(): ValidationEngine {
    if (!this.configuration) {
      throw new Error('Configuration not set.');
    }
    return new ValidationEngine(
      this.configuration,
      this.sink ?? new ConsoleSink(process.stdout),
      this.registry ?? createDefaultRegistry()
    );
  }
}
