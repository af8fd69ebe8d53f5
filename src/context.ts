import { Faker, base, en } from '@faker-js/faker';
import { Diagnostics, type Logger } from './diagnostics.js';
import { DEFAULT_TEXT_MAPPINGS, type TextMapping } from './generate.js';

export type GenerationContext = {
  faker: Faker;
  textMappings: readonly TextMapping[];
  diagnostics: Diagnostics;
  logger: Logger;
};

export type ContextOptions = {
  seed?: number;
  /** Replaces the default column-name heuristics; first match wins. */
  textMappings?: readonly TextMapping[];
  logger?: Logger;
};

export function createContext(options: ContextOptions = {}): GenerationContext {
  const faker = new Faker({ locale: [en, base] });
  if (options.seed !== undefined) {
    faker.seed(options.seed);
  }
  const logger = options.logger ?? console;
  return {
    faker,
    textMappings: options.textMappings ?? DEFAULT_TEXT_MAPPINGS,
    diagnostics: new Diagnostics(logger),
    logger
  };
}
