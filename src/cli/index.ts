#!/usr/bin/env node

/**
 * attack-correlator CLI: map attacker behaviour to MITRE ATT&CK techniques
 *
 * Usage:
 *   attack-correlator match "phishing email with malicious attachment"
 *   attack-correlator match --top 5 --json "dumped lsass memory with procdump"
 *   attack-correlator interactive --mode queue
 *   attack-correlator sync
 *   attack-correlator info
 */

import 'dotenv/config';

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';

import { registerMatchCommand } from './commands/match.js';
import { registerInteractiveCommand } from './commands/interactive.js';
import { registerSyncCommand } from './commands/sync.js';
import { registerInfoCommand } from './commands/info.js';
import { readPackageVersion } from './version.js';

const program = new Command();

program
  .name('attack-correlator')
  .description('Find the MITRE ATT&CK techniques most similar to a free-text attack description')
  .version(readPackageVersion());

registerMatchCommand(program);
registerInteractiveCommand(program);
registerSyncCommand(program);
registerInfoCommand(program);

// Global error handling
program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (err) {
    if (err instanceof CommanderError) {
      // Help and version output are not failures
      if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
        return;
      }
      process.exit(err.exitCode);
    }

    console.error('');
    console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
    console.error('');
    console.error(chalk.gray('Run "attack-correlator --help" for usage information.'));
    console.error('');
    process.exit(1);
  }
}

await main();
