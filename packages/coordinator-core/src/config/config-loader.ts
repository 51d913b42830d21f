/**
 * Coordinator configuration loading.
 *
 * YAML files are parsed with `yaml` and validated with the zod schema from
 * contracts; every field has a default, so an empty file is a valid config.
 */

import { readFile } from 'node:fs/promises';
import { parse as parseYAML } from 'yaml';
import type { ZodError } from 'zod';
import type { CoordinatorConfig, CoordinatorConfigInput } from '@taskloom/coordinator-contracts';
import { CoordinatorConfigSchema } from '@taskloom/coordinator-contracts';
import { ConfigError, errorMessage } from '@taskloom/coordinator-sdk';

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`);
}

function validate(raw: unknown, origin: string): CoordinatorConfig {
  const result = CoordinatorConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid coordinator configuration in ${origin}`, formatIssues(result.error));
  }
  return result.data;
}

/**
 * Apply defaults to a programmatic configuration.
 *
 * @throws ConfigError listing every invalid field
 */
export function resolveCoordinatorConfig(input: CoordinatorConfigInput = {}): CoordinatorConfig {
  return validate(input, 'options');
}

/**
 * @param origin - name used in error messages
 */
export function parseCoordinatorConfig(source: string, origin = '<inline>'): CoordinatorConfig {
  let raw: unknown;
  try {
    raw = parseYAML(source);
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${origin}`, [errorMessage(error)]);
  }
  if (raw !== null && raw !== undefined && (typeof raw !== 'object' || Array.isArray(raw))) {
    throw new ConfigError(`Invalid coordinator configuration in ${origin}`, ['(root): expected a mapping']);
  }
  return validate(raw, origin);
}

export async function loadCoordinatorConfig(path: string): Promise<CoordinatorConfig> {
  let source: string;
  try {
    source = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read configuration file ${path}`, [errorMessage(error)]);
  }
  return parseCoordinatorConfig(source, path);
}
