// src/config/schema.ts

import { z } from 'zod';
import { LANGUAGES, SYMBOL_KEYS } from '../symbols/default-symbols.js';

/**
 * Option values are kept as strings; numbers and booleans written in YAML
 * are stringified so validators read every option the same way.
 */
const optionValueSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

export const validatorConfigurationSchema = z.object({
  name: z.string().min(1, 'validator name must not be empty'),
  options: z.record(z.string(), optionValueSchema).default({}),
});

export const configurationSchema = z.object({
  lang: z.enum(LANGUAGES).default('en'),
  symbols: z.record(z.enum(SYMBOL_KEYS), z.string().min(1)).default({}),
  validators: z.array(validatorConfigurationSchema),
});

/** One rule declaration: name plus its option map. */
export type ValidatorConfiguration = z.infer<typeof validatorConfigurationSchema>;

/** Rule declarations in configuration order, symbol overrides and language. */
export type Configuration = z.infer<typeof configurationSchema>;
