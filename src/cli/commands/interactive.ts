/**
 * Interactive command: a prompt loop over the background runner.
 *
 * Each line is submitted without waiting; results are printed as they
 * arrive, one blank line between results. `exit`, `quit` or EOF end the
 * session once in-flight work has settled.
 */

import readline from 'readline/promises';
import { stdin, stdout } from 'process';
import type { Command } from 'commander';
import chalk from 'chalk';

import { QueueFullError } from '../../errors.js';
import { CorrelationRunner, type RunnerMode } from '../../matching/runner.js';
import {
  addCorpusOptions,
  addTopOption,
  addVerboseOption,
  parseMode,
  parseTopK,
  printError,
  printInfo,
  printWarning,
} from '../options.js';
import { createRuntime } from '../runtime.js';

export interface InteractiveOptions {
  top?: string;
  mode: string;
  offline?: boolean;
  data?: string;
  verbose?: boolean;
}

export interface PromptStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

const EXIT_WORDS = new Set(['exit', 'quit']);

export function registerInteractiveCommand(program: Command): void {
  const cmd = program
    .command('interactive')
    .description('Type behaviour descriptions at a prompt and see matches as they complete')
    .option('--mode <mode>', 'queue: run every request in order; latest: newest request supersedes', 'queue');

  addTopOption(cmd);
  addCorpusOptions(cmd);
  addVerboseOption(cmd);

  cmd.action(async (options: InteractiveOptions) => {
    await runInteractive(options);
  });
}

export async function runInteractive(
  options: InteractiveOptions,
  streams: PromptStreams = { input: stdin, output: stdout },
): Promise<void> {
  const mode: RunnerMode = parseMode(options.mode);
  const { config, providers } = createRuntime(options);
  const topK = options.top !== undefined ? parseTopK(options.top) : config.matching.topK;
  const runner = new CorrelationRunner(providers, { mode, topK });

  const rl = readline.createInterface(streams);
  let open = true;
  let printedResults = 0;

  const reprompt = (): void => {
    if (open) rl.prompt(true);
  };

  runner.subscribe('progress', ({ taskId, percent }) => {
    if (percent < 100) {
      console.error(chalk.gray(`  [#${taskId}] ${percent}%`));
    }
  });
  runner.subscribe('result', ({ taskId, result }) => {
    if (printedResults > 0) console.log('');
    console.log(chalk.bold(`#${taskId}: ${result.query}`));
    console.log(result.text);
    printedResults++;
    reprompt();
  });
  runner.subscribe('failed', ({ taskId, error }) => {
    printError(`Request #${taskId} failed`, error.message);
    reprompt();
  });
  runner.subscribe('cancelled', ({ taskId, reason }) => {
    if (reason === 'superseded') {
      printWarning(`Request #${taskId} superseded by a newer one`);
    }
  });

  console.log('');
  console.log(chalk.bold.cyan('  ATT&CK Technique Correlation'));
  console.log(chalk.gray(`  Describe an attack; "exit" to quit. Mode: ${mode}, top ${topK}.`));
  console.log('');

  rl.setPrompt('> ');
  rl.prompt();

  for await (const line of rl) {
    const text = line.trim();

    if (EXIT_WORDS.has(text.toLowerCase())) break;

    if (text.length === 0) {
      printInfo('Please enter a sentence.');
    } else {
      try {
        const handle = runner.submit(line);
        console.error(chalk.gray(`  [#${handle.id}] submitted`));
      } catch (err) {
        if (!(err instanceof QueueFullError)) throw err;
        printWarning(`${err.message}; wait for a result and try again.`);
      }
    }

    rl.prompt();
  }

  open = false;
  rl.close();

  if (runner.activeCount > 0 || runner.pendingCount > 0) {
    printInfo('Waiting for running requests...');
  }
  await runner.idle();
}
