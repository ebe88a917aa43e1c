#!/usr/bin/env node

/**
 * Pipewright CLI — Declarative Pipelines on the Local Host
 *
 * Usage:
 *   pipewright check <pipeline>   Validate parameters and stages
 *   pipewright run <pipeline>     Run the pipeline
 *   pipewright params <pipeline>  Print the parameter set as JSON
 */

import { VERSION, consoleSink, loadRunnerConfig } from '@pipewright/core';
import { check } from './commands/check.js';
import { run } from './commands/run.js';
import { params } from './commands/params.js';
import { parseArgs } from './utils.js';

const USAGE = `
Pipewright — Declarative Stage/Action Pipelines

Usage:
  pipewright check <pipeline>     Validate parameters and stages
  pipewright run <pipeline>       Run the pipeline
  pipewright params <pipeline>    Print the parameter set as JSON
  pipewright help                 Show this help message

<pipeline> is a settings file (.yaml, .yml, .json) or a pipeline name
looked up in $PIPEWRIGHT_SETTINGS_DIR (default: settings).

Options:
  -p, --param NAME=VALUE   Set a parameter for this run (repeatable)
  --dry-run                Check everything, skip every action
  --debug                  Print debug diagnostics

Version: ${VERSION}
`;

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv.slice(2));
  if (!parsed.ok) {
    console.error(parsed.error);
    console.log(USAGE);
    process.exit(1);
  }

  const { command, target, dryRun } = parsed.args;
  const debug = parsed.args.debug || parsed.args.params.DEBUG_MODE === 'true';
  const sink = consoleSink({ debug });
  const config = loadRunnerConfig();

  if (command === undefined || command === 'help') {
    console.log(USAGE);
    return;
  }
  if (!['check', 'run', 'params'].includes(command)) {
    console.error(`Unknown command: ${command}`);
    console.log(USAGE);
    process.exit(1);
  }
  if (target === undefined) {
    console.error(`Missing <pipeline> for '${command}'`);
    console.log(USAGE);
    process.exit(1);
  }

  const opts = { target, params: parsed.args.params, dryRun, config, sink };

  switch (command) {
    case 'check': {
      const result = await check(opts);
      console.log(result.report);
      process.exitCode = result.ok ? 0 : 1;
      break;
    }

    case 'run': {
      const result = await run(opts);
      console.log(`\nRun ID:      ${result.result.runId}`);
      console.log(result.report);
      process.exitCode = result.ok ? 0 : 1;
      break;
    }

    case 'params': {
      const result = await params(opts);
      console.log(result.report);
      break;
    }
  }
}

main().catch((err: unknown) => {
  console.error('Pipewright error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
