#!/usr/bin/env node
/**
 * Terminal front end for the launcher core. Stands in for the popup: the
 * joined positional arguments are submitted as one input line.
 *
 *   quickrun echo hello
 *   quickrun ls -la
 *   quickrun -- --weird-leading-dash
 *   quickrun --recent
 */

import { parseArgs } from 'util';
import { createLauncher } from './index';
import { loadLauncherConfig } from './launcher-config';
import type { SubmissionOutcome } from './launcher';
import { describeExecutionResult, getErrorMessage } from './shell-executor';

const USAGE = 'Usage: quickrun [--config <path>] [--recent [--limit <n>]] [--] <command...>';

export function outcomeToExitCode(outcome: SubmissionOutcome): number {
  switch (outcome.kind) {
    case 'command':
      return describeExecutionResult(outcome.result) === 'success' ? 0 : 1;
    case 'app':
      return outcome.focused ? 0 : 1;
    case 'busy':
    case 'ignored':
      return 1;
  }
}

const VALUE_OPTIONS = new Set(['--config', '--limit']);

/**
 * Splits launcher options from the command: option parsing stops at `--` or
 * at the first bare word, so `quickrun ls -la` keeps `-la` for the command.
 */
export function splitCommandArgs(argv: string[]): { optionArgs: string[]; commandArgs: string[] } {
  const optionArgs: string[] = [];
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === '--') return { optionArgs, commandArgs: argv.slice(i + 1) };
    if (!arg.startsWith('-')) return { optionArgs, commandArgs: argv.slice(i) };
    optionArgs.push(arg);
    if (VALUE_OPTIONS.has(arg) && i + 1 < argv.length) {
      optionArgs.push(argv[i + 1]);
      i += 1;
    }
  }
  return { optionArgs, commandArgs: [] };
}

function parseLauncherArgs(optionArgs: string[]) {
  return parseArgs({
    args: optionArgs,
    options: {
      config: { type: 'string' },
      recent: { type: 'boolean', default: false },
      limit: { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
    allowPositionals: false,
  }).values;
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const { optionArgs, commandArgs } = splitCommandArgs(argv);

  let values: ReturnType<typeof parseLauncherArgs>;
  try {
    values = parseLauncherArgs(optionArgs);
  } catch (error) {
    console.error(`[Launcher] ${getErrorMessage(error)}\n${USAGE}`);
    return 1;
  }

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const config = loadLauncherConfig({ configPath: values.config });
  const { launcher } = createLauncher(config);

  if (values.recent) {
    const limit = Number(values.limit ?? 10);
    for (const item of launcher.getRecentCommandMenuItems(Number.isFinite(limit) ? limit : 10)) {
      console.log(item.label);
    }
    return 0;
  }

  const input = commandArgs.join(' ').trim();
  if (!input) {
    console.error(USAGE);
    return 1;
  }

  const outcome = await launcher.submit(input);
  if (outcome.kind === 'command') {
    if (outcome.result.stdout) process.stdout.write(outcome.result.stdout);
    if (outcome.result.stderr) process.stderr.write(outcome.result.stderr);
  }
  return outcomeToExitCode(outcome);
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(`[Launcher] ${getErrorMessage(error)}`);
      process.exitCode = 1;
    }
  );
}
