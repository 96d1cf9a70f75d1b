/**
 * Inspect Command Handler
 *
 * Shows the backing chain of a disk description, either as a table or as
 * markup. `--name vda[2]` starts the listing at that chain element.
 */

import { resolve } from 'node:path';

import { loadDiskDescription } from '../../config/index.js';
import { IndentedBuffer } from '../../document/buffer.js';
import { parseChainIndex } from '../../storage/backing-string.js';
import { formatStorageSource } from '../../storage/format.js';
import { getChainElement, shareStorageSource } from '../../storage/source.js';
import { createOutput, describeChain, handleError } from '../output.js';

/**
 * Options for the inspect command
 */
export interface InspectCommandOptions {
  json?: boolean;
  xml?: boolean;
  name?: string;
  migratable?: boolean;
}

/**
 * Execute the inspect command.
 *
 * @param file - Path to the disk description
 * @param options - Command options
 */
export async function inspectCommand(
  file: string,
  options: InspectCommandOptions
): Promise<void> {
  const output = createOutput('inspect', options);

  try {
    const disk = await loadDiskDescription(resolve(file));
    const chain = shareStorageSource(disk.source);

    const index = parseChainIndex(disk.target, options.name);
    const start = getChainElement(chain, index);
    if (!start) {
      output.error(`Disk '${disk.target}' has no backing image at index ${index}`);
      output.flush();
      process.exit(1);
    }

    for (const warning of disk.warnings) {
      output.warning(warning);
    }

    if (options.xml) {
      const buf = new IndentedBuffer();
      formatStorageSource(buf, start, options.migratable === true);
      output.document(buf.toString());
    } else {
      output.chainTable(disk.target, describeChain(start));
    }

    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
