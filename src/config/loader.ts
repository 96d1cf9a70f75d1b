/**
 * Configuration Loader
 *
 * Reads YAML disk descriptions from the filesystem.
 */

import { readFile } from 'node:fs/promises';
import yaml from 'js-yaml';

import { ConfigError } from '../core/errors.js';

/**
 * Load and parse a YAML disk description.
 *
 * @param filePath - Path to the YAML file
 * @returns Parsed YAML content as unknown (requires validation)
 * @throws ConfigError (CONFIG_NOT_FOUND) if the file cannot be read,
 *         (CONFIG_INVALID_YAML) if it cannot be parsed
 */
export async function loadYamlFile(filePath: string): Promise<unknown> {
  let content: string;

  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    const reason =
      code === 'ENOENT'
        ? 'Disk description not found'
        : code === 'EACCES'
          ? 'Permission denied reading disk description'
          : 'Failed to read disk description';

    throw new ConfigError(
      `${reason}: ${filePath}`,
      'CONFIG_NOT_FOUND',
      'Ensure the disk description file exists and is readable.',
      filePath
    );
  }

  try {
    return yaml.load(content, { filename: filePath });
  } catch (error) {
    const message = error instanceof yaml.YAMLException ? error.message : String(error);
    throw new ConfigError(
      `Invalid YAML syntax in ${filePath}: ${message}`,
      'CONFIG_INVALID_YAML',
      undefined,
      filePath
    );
  }
}
