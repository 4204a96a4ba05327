import { setImmediate as yieldToEventLoop } from 'timers/promises';
import type { CommandResult, RunOutcome, RunResult } from '../types.js';
import type { Executor } from '../executor/executor.js';
import type { Reporter } from '../reporter/reporter.js';
import type { StopFlag } from './stop-flag.js';
import { SetupError, errorMessage } from '../errors.js';

const SUCCESS_EXIT_CODE = 0;

export interface StressLoopOptions {
  /** Stop cleanly once this many runs have passed. */
  maxRuns?: number;
}

function fatalReason(error: unknown): string {
  return error instanceof SetupError
    ? error.message
    : `Unexpected error: ${errorMessage(error)}`;
}

/**
 * Invokes the executor one run at a time until a run fails, a stop is
 * requested, or `maxRuns` runs have passed.
 *
 * A stop request never interrupts the run in progress: the flag is only read
 * between runs, after the previous result has been reported.
 */
export async function runStressLoop(
  executor: Executor | undefined,
  flag: StopFlag,
  reporter: Reporter,
  options: StressLoopOptions = {},
): Promise<RunOutcome> {
  if (!executor) {
    const reason = 'No test command to run';
    reporter.runErrored(reason);
    return { kind: 'fatal-error', passed: 0, reason };
  }

  if (executor.verify) {
    try {
      await executor.verify();
    } catch (error) {
      const reason = fatalReason(error);
      reporter.runErrored(reason);
      return { kind: 'fatal-error', passed: 0, reason };
    }
  }

  let passed = 0;
  let sequence = 0;

  for (;;) {
    // Lets pending input events reach the listener before the flag is read
    await yieldToEventLoop();

    if (flag.isRequested) {
      return { kind: 'all-passed', passed };
    }

    if (options.maxRuns !== undefined && passed >= options.maxRuns) {
      return { kind: 'all-passed', passed };
    }

    sequence += 1;
    reporter.runStarted(sequence);

    const startTime = Date.now();
    let commandResult: CommandResult;

    try {
      commandResult = await executor.invoke();
    } catch (error) {
      const reason = fatalReason(error);
      reporter.runErrored(reason);
      return { kind: 'fatal-error', passed, reason, sequence };
    }

    const result: RunResult = {
      sequence,
      exitCode: commandResult.exitCode,
      stdout: commandResult.stdout,
      stderr: commandResult.stderr,
      durationMs: Date.now() - startTime,
    };

    if (result.exitCode !== SUCCESS_EXIT_CODE) {
      reporter.runFailed(result);
      return { kind: 'failure-detected', passed, result };
    }

    passed += 1;
    reporter.runPassed(result);
  }
}
