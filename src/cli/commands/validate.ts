/**
 * Validate Command Handler
 *
 * Validates a YAML disk description against the schema and builds its
 * chain, reporting every schema finding at once.
 */

import { resolve } from 'node:path';

import { loadDiskDescription } from '../../config/index.js';
import { ConfigError } from '../../core/errors.js';
import { logger } from '../../lib/logger.js';
import { createOutput, describeChain, handleError } from '../output.js';

/**
 * Options for the validate command
 */
export interface ValidateCommandOptions {
  json?: boolean;
}

/**
 * Execute the validate command.
 *
 * @param file - Path to the disk description
 * @param options - Command options
 */
export async function validateCommand(
  file: string,
  options: ValidateCommandOptions
): Promise<void> {
  const output = createOutput('validate', options);

  try {
    const configPath = resolve(file);
    output.info(`Validating disk description: ${file}`);

    const disk = await loadDiskDescription(configPath);
    logger.debug(`resolved ${disk.target} from ${disk.configPath}`);

    output.validationSuccess(disk.target, describeChain(disk.source));

    if (disk.warnings.length > 0) {
      output.newline();
      for (const warning of disk.warnings) {
        output.warning(warning);
      }
    }

    output.flush();
    process.exit(0);
  } catch (error) {
    if (error instanceof ConfigError && error.validationErrors) {
      output.validationError(error.validationErrors);
      output.flush();
      process.exit(error.exitCode);
    }
    handleError(output, error);
  }
}
