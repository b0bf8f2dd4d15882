// src/cli/commands/check-config.ts

import { ConfigurationLoader } from '../../config/configuration-loader.js';
import { SentenceBoundary } from '../../symbols/sentence-boundary.js';
import { SymbolTable } from '../../symbols/symbol-table.js';
import { ErrorFactory } from '../../utils/error-factory.js';
import { Logger } from '../../utils/logger.js';
import { createDefaultRegistry } from '../../validators/builtin-validators.js';
import type { ValidatorRegistry } from '../../validators/validator-registry.js';

/**
 * Resolve every rule of a configuration file without validating anything.
 * Returns the process exit code.
 */
export async function checkConfigCommand(
  configPath: string,
  registry: ValidatorRegistry = createDefaultRegistry()
): Promise<number> {
  try {
    Logger.info(`Checking configuration: ${configPath}`);

    const { configuration } = await new ConfigurationLoader().loadConfiguration(configPath);
    const symbolTable = new SymbolTable(configuration.lang, configuration.symbols);

    for (const validatorConfig of configuration.validators) {
      const validator = registry.resolve(validatorConfig, symbolTable);
      console.log(`  ✅ ${validatorConfig.name} (${validator.target})`);
    }

    const boundary = new SentenceBoundary(symbolTable);
    console.log(`\nLanguage: ${configuration.lang}`);
    console.log(`Sentence terminators: ${boundary.periods.join(' ')}`);
    console.log(`Closing quotations: ${boundary.rightQuotations.join(' ')}`);
    Logger.success('Configuration is valid!');
    return 0;
  } catch (error) {
    const details = ErrorFactory.createRunError(error);
    console.error(`❌ ${details.kind}: ${details.message}`);
    if (details.suggestion) {
      console.error(`   ${details.suggestion}`);
    }
    return 1;
  }
}
