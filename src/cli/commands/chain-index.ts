/**
 * Chain Index Command Handler
 *
 * Prints the chain index selected by a backing store name such as
 * `vda[2]` on the given disk.
 */

import { parseChainIndex } from '../../storage/backing-string.js';
import { createOutput, handleError } from '../output.js';

/**
 * Options for the chain-index command
 */
export interface ChainIndexCommandOptions {
  json?: boolean;
}

export async function chainIndexCommand(
  target: string,
  name: string,
  options: ChainIndexCommandOptions
): Promise<void> {
  const output = createOutput('chain-index', options);

  try {
    output.chainIndex(name, parseChainIndex(target, name));
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
