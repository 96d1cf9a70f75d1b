/**
 * Configuration Module
 *
 * Loads a YAML disk description, checks it against the schema and builds
 * its backing chain.
 */

import { ConfigError } from '../core/errors.js';
import { loadYamlFile } from './loader.js';
import { resolveConfig } from './resolver.js';
import type { ResolvedDisk } from './types.js';
import { validateConfig } from './validator.js';

export * from './types.js';
export { loadYamlFile } from './loader.js';
export { validateConfig, formatValidationErrors, type ValidationIssue, type ValidationResult } from './validator.js';
export { resolveConfig } from './resolver.js';

/**
 * Load, validate and resolve a disk description in one step.
 *
 * @throws ConfigError when the file cannot be read or parsed, or fails the
 *         schema (with the schema findings in `validationErrors`)
 * @throws ValidationError for bad auth, reservation, cookie or label data
 */
export async function loadDiskDescription(filePath: string): Promise<ResolvedDisk> {
  const raw = await loadYamlFile(filePath);
  const result = validateConfig(raw);

  if (!result.valid) {
    throw new ConfigError(
      `Disk description validation failed: ${filePath}`,
      'CONFIG_VALIDATION_FAILED',
      'Correct the listed fields and run validate again.',
      filePath,
      result.errors.map(({ path, message }) => ({ path, message }))
    );
  }

  return resolveConfig(result.config, filePath);
}
