/**
 * Device Key Lookup
 *
 * Asks udev's scsi_id helper for a stable key identifying a SCSI or NPIV
 * LUN. The helper prints one line; an empty answer or a failing status
 * means "no key".
 */

import { SystemError } from '../core/errors.js';
import { CommandError, type CommandExecutor, type CommandResult } from './executor.js';

export const SCSI_ID_PATH = '/lib/udev/scsi_id';

const ID_SERIAL = 'ID_SERIAL=';
const ID_TARGET_PORT = 'ID_TARGET_PORT=';

/**
 * Anything able to run a helper; CommandExecutor in production.
 */
export type HelperRunner = Pick<CommandExecutor, 'run'>;

export function buildScsiKeyArgs(device: string): string[] {
  return ['--replace-whitespace', '--whitelisted', '--device', device];
}

export function buildNpivKeyArgs(device: string): string[] {
  return ['--replace-whitespace', '--whitelisted', '--export', '--device', device];
}

/**
 * Text up to (not including) the first newline.
 */
function firstLine(text: string): string {
  const nl = text.indexOf('\n');
  return nl === -1 ? text : text.slice(0, nl);
}

/**
 * Extract the SCSI key from scsi_id output.
 *
 * @returns The key, or undefined when the helper failed or printed nothing
 */
export function parseScsiKeyOutput(result: CommandResult): string | undefined {
  if (result.status !== 0) return undefined;
  const key = firstLine(result.stdout);
  return key === '' ? undefined : key;
}

/**
 * Build the NPIV key `<serial>_PORT<target port>` from `--export` output.
 * An NPIV LUN is identified by its target port as well as its serial.
 *
 * @returns The key, or undefined unless both values are present
 */
export function parseNpivKeyOutput(result: CommandResult): string | undefined {
  if (result.status !== 0 || result.stdout === '') return undefined;

  const serialAt = result.stdout.indexOf(ID_SERIAL);
  const portAt = result.stdout.indexOf(ID_TARGET_PORT);
  if (serialAt === -1 || portAt === -1) return undefined;

  const serial = firstLine(result.stdout.slice(serialAt + ID_SERIAL.length));
  const port = firstLine(result.stdout.slice(portAt + ID_TARGET_PORT.length));
  if (serial === '' || port === '') return undefined;

  return `${serial}_PORT${port}`;
}

async function runHelper(
  runner: HelperRunner,
  args: string[],
  device: string
): Promise<CommandResult> {
  try {
    return await runner.run(SCSI_ID_PATH, args);
  } catch (error) {
    if (error instanceof CommandError) {
      throw new SystemError(
        `Unable to get key for ${device}: ${error.message}`,
        'KEY_LOOKUP_FAILED',
        error,
        device
      );
    }
    throw error;
  }
}

/**
 * Look up the unique SCSI key of `device`.
 *
 * @throws SystemError (KEY_LOOKUP_FAILED) when the helper cannot be run
 */
export async function getScsiKey(
  runner: HelperRunner,
  device: string
): Promise<string | undefined> {
  const result = await runHelper(runner, buildScsiKeyArgs(device), device);
  return parseScsiKeyOutput(result);
}

/**
 * Look up the unique NPIV key of `device`.
 *
 * @throws SystemError (KEY_LOOKUP_FAILED) when the helper cannot be run
 */
export async function getNpivKey(
  runner: HelperRunner,
  device: string
): Promise<string | undefined> {
  const result = await runHelper(runner, buildNpivKeyArgs(device), device);
  return parseNpivKeyOutput(result);
}
