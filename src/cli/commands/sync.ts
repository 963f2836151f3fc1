/**
 * Sync command: download the Enterprise ATT&CK bundle for offline matching.
 */

import { resolve } from 'path';
import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import { loadConfig } from '../../config/index.js';
import { OnnxEmbeddingProvider } from '../../embedding/onnx.js';
import { downloadAttackData } from '../../knowledge/mitre-attack/download.js';
import { setLogLevel } from '../../utils/logger.js';
import { addVerboseOption, printError, printSuccess } from '../options.js';

interface SyncOptions {
  output?: string;
  url?: string;
  model?: boolean;
  verbose?: boolean;
}

export function registerSyncCommand(program: Command): void {
  const cmd = program
    .command('sync')
    .description('Download the ATT&CK technique corpus for --offline use')
    .option('-o, --output <dir>', 'Data directory (default: ATTACK_DATA_DIR)')
    .option('--url <url>', 'STIX bundle URL (default: ATTACK_STIX_URL)')
    .option('--model', 'Also fetch the embedding model into EMBEDDING_CACHE_DIR');

  addVerboseOption(cmd);

  cmd.action(async (options: SyncOptions) => {
    await runSync(options);
  });
}

async function runSync(options: SyncOptions): Promise<void> {
  const config = loadConfig();
  setLogLevel(options.verbose ? 'debug' : 'warn');

  const url = options.url ?? config.attack.stixUrl;
  const dataDir = options.output ? resolve(options.output) : config.attack.dataDir;

  const spinner = ora(`Downloading ${url}`).start();
  try {
    const result = await downloadAttackData(url, dataDir);
    spinner.succeed(
      chalk.green(
        `ATT&CK ${result.metadata.version}: ${result.metadata.techniqueCount} techniques ` +
          `(+${result.metadata.subtechniqueCount} subtechniques), ${result.metadata.tacticCount} tactics`,
      ),
    );
    printSuccess(`Snapshot written to ${result.snapshotPath}`);
  } catch (err) {
    spinner.fail(chalk.red('Download failed'));
    printError('Could not sync ATT&CK data', err instanceof Error ? err.message : String(err));
    process.exit(1);
  }

  if (!options.model) return;

  const modelSpinner = ora(`Preparing embedding model ${config.embedding.model}`).start();
  try {
    await OnnxEmbeddingProvider.fromConfig({ ...config.embedding, offline: false }).prepare();
    modelSpinner.succeed(chalk.green(`Model cached in ${config.embedding.cacheDir}`));
  } catch (err) {
    modelSpinner.fail(chalk.red('Model download failed'));
    printError('Could not fetch the embedding model', err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}
