import * as YAML from 'yaml';
import type { z } from 'zod';
import { ConfigError, ValidationError, handleUnknownError, type ErrorContext } from '../errors/index';

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export function parseYamlDocument(yamlContent: string, source: string): unknown {
  try {
    // An empty document is an empty mapping
    return YAML.parse(yamlContent) ?? {};
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'YAML parsing');
    throw new ConfigError(`Failed to parse YAML: ${err.message}`, { source });
  }
}

export function parseWithSchema<T extends z.ZodTypeAny>(
  schema: T,
  raw: unknown,
  what: string,
  context: ErrorContext
): z.output<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(`Invalid ${what}: ${formatZodIssues(result.error)}`, context);
  }
  return result.data;
}
