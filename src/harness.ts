import * as fs from 'fs';
import type { RunOptions } from './types.js';
import type { Executor } from './executor/executor.js';
import { ProcessExecutor } from './executor/process-executor.js';
import { ContainerManager } from './docker/container.js';
import {
  ContainerExecutor,
  type ContainerRunner,
} from './docker/container-executor.js';
import {
  startStopListener,
  stopHint,
  type OperatorInput,
} from './listener/stop-listener.js';
import {
  Reporter,
  buildReport,
  exitCodeFor,
  type ReporterOutput,
} from './reporter/reporter.js';
import { runStressLoop } from './runner/stress-runner.js';
import { StopFlag } from './runner/stop-flag.js';

export const VERSION = '1.0.0';

export interface HarnessDeps {
  /** Where stop requests are read from; process.stdin by default. */
  input?: OperatorInput;
  output?: ReporterOutput;
  containerRunner?: ContainerRunner;
}

export function createExecutor(
  command: string[],
  options: RunOptions,
  containerRunner?: ContainerRunner,
): Executor | undefined {
  const [program, ...args] = command;
  if (!program) return undefined;

  if (options.image) {
    return new ContainerExecutor(
      containerRunner ?? new ContainerManager(),
      command,
      {
        image: options.image,
        hostDir: options.cwd,
        keepContainers: options.keepContainers,
        env: options.env,
      },
    );
  }

  return new ProcessExecutor(program, args, {
    cwd: options.cwd,
    env: options.env,
  });
}

/**
 * Runs the stress loop end to end and returns the process exit status.
 */
export async function runHarness(
  command: string[],
  options: RunOptions,
  deps: HarnessDeps = {},
): Promise<number> {
  const reporter = new Reporter(deps.output ?? console, {
    color: options.color,
  });
  const executor = createExecutor(command, options, deps.containerRunner);
  const commandLine = executor ? executor.describe() : '(none)';

  const flag = new StopFlag();
  const listener = startStopListener(
    options.listen ? (deps.input ?? process.stdin) : undefined,
    flag,
    { log: (message) => reporter.notice(message) },
  );

  reporter.header(VERSION, commandLine, stopHint(listener.mode));

  const startTime = Date.now();
  const outcome = await runStressLoop(executor, flag, reporter, {
    maxRuns: options.maxRuns,
  }).finally(() => listener.close());
  const durationMs = Date.now() - startTime;

  reporter.summary(outcome, durationMs);

  if (options.outputFile) {
    const report = buildReport(commandLine, outcome, durationMs);
    fs.writeFileSync(options.outputFile, JSON.stringify(report, null, 2));
    reporter.notice(`\nReport written to: ${options.outputFile}`);
  }

  return exitCodeFor(outcome);
}
