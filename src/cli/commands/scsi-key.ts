/**
 * SCSI Key Command Handler
 *
 * Looks up the stable key of a SCSI or NPIV LUN through udev's scsi_id.
 */

import { CommandExecutor } from '../../udev/executor.js';
import { getNpivKey, getScsiKey } from '../../udev/keys.js';
import { createOutput, handleError } from '../output.js';

/**
 * Options for the scsi-key command
 */
export interface ScsiKeyCommandOptions {
  json?: boolean;
  npiv?: boolean;
  verbose?: boolean;
}

export async function scsiKeyCommand(
  device: string,
  options: ScsiKeyCommandOptions
): Promise<void> {
  const output = createOutput('scsi-key', options);

  try {
    const executor = new CommandExecutor({ verbose: options.verbose });
    const key = options.npiv
      ? await getNpivKey(executor, device)
      : await getScsiKey(executor, device);

    output.deviceKey(device, key);
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
