// src/cli/commands/rules.ts

import chalk from 'chalk';
import { ErrorFactory } from '../../utils/error-factory.js';
import { createDefaultRegistry } from '../../validators/builtin-validators.js';
import type { ValidatorRegistry } from '../../validators/validator-registry.js';

export function rulesCommand(registry: ValidatorRegistry = createDefaultRegistry()): number {
  try {
    const rules = registry.listRules();

    if (rules.length === 0) {
      console.log('No validators registered');
      return 0;
    }

    console.log('Available validators:');
    for (const namespace of registry.getNamespaces()) {
      const inNamespace = rules.filter((rule) => rule.namespace === namespace);
      if (inNamespace.length === 0) {
        continue;
      }
      console.log(chalk.bold(`  ${namespace}`));
      for (const rule of inNamespace) {
        console.log(`    - ${rule.ruleName} ${chalk.dim(`(${rule.target})`)}`);
      }
    }
    return 0;
  } catch (error) {
    const details = ErrorFactory.createRunError(error);
    console.error(`❌ ${details.kind}: ${details.message}`);
    return 1;
  }
}
