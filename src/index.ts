#!/usr/bin/env node

import { program } from 'commander';
import { runHarness, VERSION } from './harness.js';
import { collectEnv, resolveConfig, type CliOptions } from './utils/config.js';
import { errorMessage } from './errors.js';

// Piped stdout and stderr may still hold the failing run's output
function exitAfterFlush(code: number): void {
  process.exitCode = code;
  process.stdout.write('', () => {
    process.stderr.write('', () => {
      process.exit(code);
    });
  });
}

program
  .name('stress-loop')
  .description(
    'Run a test command over and over until it fails or you press a key',
  )
  .version(VERSION)
  .argument('<command>', 'Test command to run')
  .argument('[args...]', 'Arguments passed to the test command')
  .passThroughOptions()
  .option('--cwd <dir>', 'Working directory for the test command')
  .option('--max-runs <n>', 'Stop cleanly after n passing runs')
  .option(
    '--env <KEY=VALUE>',
    'Extra environment variable for the test command (repeatable)',
    collectEnv,
    [],
  )
  .option('--image <image>', 'Run each invocation in a Docker container')
  .option('--keep-containers', 'Keep containers after each run for debugging')
  .option('--no-listen', 'Do not read stdin for a stop request')
  .option('--no-color', 'Disable colored output')
  .option('-o, --output <file>', 'Output JSON report to file')
  .action(async (command: string, args: string[], options: CliOptions) => {
    try {
      const config = resolveConfig(options, process.env);
      const exitCode = await runHarness([command, ...args], config);
      exitAfterFlush(exitCode);
    } catch (error) {
      console.error('Error:', errorMessage(error));
      exitAfterFlush(1);
    }
  });

await program.parseAsync();
