import { PROCESSOR_NAME_PATTERN } from '../config/constants';
import { InvalidProcessorNameError } from '../errors/index';
import { extractFunctions } from './extract-functions';
import { redactSecrets } from './redact-secrets';
import { truncate } from './truncate';
import type { Processor } from './types';

/*
 * Maps custom processor names to functions. The action pipeline looks
 * names up here; nothing is ever resolved by reflection.
 */
export class ProcessorRegistry {
  private registry = new Map<string, Processor>();

  register(name: string, processor: Processor): void {
    if (!PROCESSOR_NAME_PATTERN.test(name)) {
      throw new InvalidProcessorNameError(name);
    }
    if (this.registry.has(name)) {
      throw new Error(`Processor '${name}' is already registered`);
    }
    this.registry.set(name, processor);
  }

  get(name: string): Processor | undefined {
    return this.registry.get(name);
  }

  getRegisteredNames(): string[] {
    return Array.from(this.registry.keys()).sort();
  }
}

export function createBuiltinRegistry(): ProcessorRegistry {
  const registry = new ProcessorRegistry();
  registry.register('truncate', truncate);
  registry.register('redact_secrets', redactSecrets);
  registry.register('extract_functions', extractFunctions);
  return registry;
}
