/**
 * Info command: show what the stored ATT&CK snapshot contains.
 */

import type { Command } from 'commander';
import chalk from 'chalk';

import { loadConfig } from '../../config/index.js';
import { defaultSnapshotPath, loadAttackData } from '../../knowledge/mitre-attack/loader.js';
import { printError } from '../options.js';

interface InfoOptions {
  data?: string;
}

export function registerInfoCommand(program: Command): void {
  program
    .command('info')
    .description('Show metadata of the stored ATT&CK snapshot')
    .option('--data <path>', 'Snapshot or STIX bundle file (default: ATTACK_DATA_PATH or the sync output)')
    .action(async (options: InfoOptions) => {
      await runInfo(options);
    });
}

async function runInfo(options: InfoOptions): Promise<void> {
  const config = loadConfig();
  const path = options.data ?? config.attack.dataPath ?? defaultSnapshotPath(config.attack.dataDir);

  let data;
  try {
    data = await loadAttackData(path);
  } catch (err) {
    printError(
      `Could not read ATT&CK data at ${path}`,
      `${err instanceof Error ? err.message : String(err)} (run "attack-correlator sync" first)`,
    );
    process.exit(1);
  }

  const { metadata } = data;
  console.log('');
  console.log(chalk.bold('  ATT&CK Snapshot'));
  console.log(chalk.gray('  ─────────────────────────────────────────'));
  console.log(`  ${chalk.cyan('File:')}            ${path}`);
  console.log(`  ${chalk.cyan('Version:')}         ${metadata.version}`);
  console.log(`  ${chalk.cyan('Last modified:')}   ${metadata.lastModified}`);
  console.log(`  ${chalk.cyan('Techniques:')}      ${metadata.techniqueCount}`);
  console.log(`  ${chalk.cyan('Subtechniques:')}   ${metadata.subtechniqueCount}`);
  console.log(`  ${chalk.cyan('Tactics:')}         ${metadata.tacticCount}`);
  console.log('');
}
