/**
 * Match command: top-k ATT&CK techniques for one behaviour description.
 *
 * Encodes the description, fetches the technique corpus, ranks by cosine
 * similarity and prints the best matches as text blocks or a JSON report.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import { CorrelationRunner } from '../../matching/runner.js';
import { buildCorrelationReport, generateJsonReport } from '../../reporting/json-reporter.js';
import type { PipelineStage } from '../../types/technique.js';
import {
  addCorpusOptions,
  addTopOption,
  addVerboseOption,
  parseTopK,
  printError,
  printInfo,
} from '../options.js';
import { createRuntime } from '../runtime.js';
import { readPackageVersion } from '../version.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface MatchOptions {
  top?: string;
  json?: boolean;
  offline?: boolean;
  data?: string;
  verbose?: boolean;
}

export const STAGE_LABELS: Record<PipelineStage, string> = {
  'query-encoded': 'Fetching ATT&CK techniques...',
  'corpus-fetched': 'Encoding technique descriptions...',
  ranked: 'Ranking complete',
};

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerMatchCommand(program: Command): void {
  const cmd = program
    .command('match')
    .description('Find the ATT&CK techniques most similar to a behaviour description')
    .argument('<text...>', 'Free-text description of the attacker behaviour')
    .option('--json', 'Print a JSON report instead of text blocks');

  addTopOption(cmd);
  addCorpusOptions(cmd);
  addVerboseOption(cmd);

  cmd.action(async (words: string[], options: MatchOptions) => {
    await runMatch(words.join(' '), options);
  });
}

// ---------------------------------------------------------------------------
// Main Logic
// ---------------------------------------------------------------------------

export async function runMatch(query: string, options: MatchOptions): Promise<void> {
  if (query.trim().length === 0) {
    printInfo('Please enter a sentence.');
    process.exit(1);
  }

  const { config, providers } = createRuntime(options);
  const topK = options.top !== undefined ? parseTopK(options.top) : config.matching.topK;
  const runner = new CorrelationRunner(providers, { mode: 'latest', topK });

  const spinner = ora('Encoding query... 0%').start();
  const outcome: { failure?: Error } = {};

  runner.subscribe('progress', ({ percent, stage }) => {
    spinner.text = `${STAGE_LABELS[stage]} ${percent}%`;
  });
  runner.subscribe('failed', ({ error }) => {
    outcome.failure = error;
  });

  const result = await runner.submit(query).result;

  if (!result) {
    spinner.fail(chalk.red('Correlation failed'));
    printError(outcome.failure?.message ?? 'Unknown error');
    process.exit(1);
  }

  spinner.succeed(
    chalk.green(
      `Top ${result.matches.length} of ${result.candidateCount} techniques ` +
        `(${(result.durationMs / 1000).toFixed(1)}s)`,
    ),
  );

  if (options.json) {
    console.log(generateJsonReport(buildCorrelationReport(result, readPackageVersion())));
    return;
  }

  console.log('');
  console.log(result.text);
  console.log('');
}
