#!/usr/bin/env node
import { program } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

import { configureLogger } from '../lib/logger.js';
import { validateCommand } from './commands/validate.js';
import { inspectCommand } from './commands/inspect.js';
import { canonicalizeCommand } from './commands/canonicalize.js';
import { chainIndexCommand } from './commands/chain-index.js';
import { scsiKeyCommand } from './commands/scsi-key.js';

// Get version from package.json
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packagePath = join(__dirname, '..', '..', 'package.json');
const packageJson: unknown = JSON.parse(readFileSync(packagePath, 'utf-8'));
const version =
  typeof packageJson === 'object' &&
  packageJson !== null &&
  'version' in packageJson &&
  typeof packageJson.version === 'string'
    ? packageJson.version
    : '0.0.0';

program
  .name('disk-source')
  .description('Inspect VM disk sources and their backing chains')
  .version(version)
  .option('--verbose', 'Print debug messages and helper commands');

/**
 * Merge the global --verbose flag into command-level options.
 * Supports both positions:
 *   disk-source --verbose inspect file    (parent parses --verbose)
 *   disk-source inspect file --verbose    (subcommand parses --verbose)
 */
function withGlobalOpts<T extends { verbose?: boolean }>(opts: T): T & { verbose: boolean } {
  const globalOpts = program.opts<{ verbose?: boolean }>();
  const verbose = opts.verbose === true || globalOpts.verbose === true;
  // debug output goes to stderr, so it is safe next to --json results
  configureLogger({ mode: 'human', verbose });
  return { ...opts, verbose };
}

program
  .command('validate <file>')
  .description('Validate a YAML disk description and build its chain')
  .option('--json', 'Output as JSON')
  .option('--verbose', 'Print debug messages')
  .action((file: string, opts: { json?: boolean; verbose?: boolean }) =>
    validateCommand(file, withGlobalOpts(opts))
  );

program
  .command('inspect <file>')
  .description('Show the backing chain of a disk description')
  .option('--name <name>', 'Start at a chain element, e.g. vda[1]')
  .option('--xml', 'Print the chain as markup')
  .option('--migratable', 'Omit host-local details from markup')
  .option('--json', 'Output as JSON')
  .option('--verbose', 'Print debug messages')
  .action((file: string, opts: { name?: string; xml?: boolean; migratable?: boolean; json?: boolean; verbose?: boolean }) =>
    inspectCommand(file, withGlobalOpts(opts))
  );

program
  .command('canonicalize <path>')
  .description('Resolve symbolic links, "." and ".." in a path')
  .option('--base <dir>', 'Resolve a relative path against this directory')
  .option('--json', 'Output as JSON')
  .option('--verbose', 'Print each link followed')
  .action((path: string, opts: { base?: string; json?: boolean; verbose?: boolean }) =>
    canonicalizeCommand(path, withGlobalOpts(opts))
  );

program
  .command('chain-index <target> <name>')
  .description('Print the chain index a backing store name selects')
  .option('--json', 'Output as JSON')
  .action((target: string, name: string, opts: { json?: boolean; verbose?: boolean }) =>
    chainIndexCommand(target, name, withGlobalOpts(opts))
  );

program
  .command('scsi-key <device>')
  .description('Look up the unique key of a SCSI LUN')
  .option('--npiv', 'Look up an NPIV key (serial and target port)')
  .option('--json', 'Output as JSON')
  .option('--verbose', 'Print helper commands before execution')
  .action((device: string, opts: { npiv?: boolean; json?: boolean; verbose?: boolean }) =>
    scsiKeyCommand(device, withGlobalOpts(opts))
  );

await program.parseAsync();
