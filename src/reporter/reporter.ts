import type {
  ReportStatus,
  RunOutcome,
  RunResult,
  StressReport,
} from '../types.js';

// ANSI color codes
const COLORS = {
  reset: '\x1b[0m',
  cyan: '\x1b[36m',
  yellow: '\x1b[33m',
  green: '\x1b[32m',
  red: '\x1b[31m',
  dim: '\x1b[2m',
};

type Color = Exclude<keyof typeof COLORS, 'reset'>;

export interface ReporterOutput {
  log(line: string): void;
  error(line: string): void;
}

export interface ReporterOptions {
  color?: boolean;
}

export const FAILURE_EXIT_CODE = 1;

export function exitCodeFor(outcome: RunOutcome): number {
  return outcome.kind === 'all-passed' ? 0 : FAILURE_EXIT_CODE;
}

export function totalRuns(outcome: RunOutcome): number {
  switch (outcome.kind) {
    case 'all-passed':
      return outcome.passed;
    case 'failure-detected':
      return outcome.result.sequence;
    case 'fatal-error':
      return outcome.sequence ?? outcome.passed;
  }
}

export function buildReport(
  command: string,
  outcome: RunOutcome,
  durationMs: number,
): StressReport {
  const status: ReportStatus =
    outcome.kind === 'all-passed'
      ? 'passed'
      : outcome.kind === 'failure-detected'
        ? 'failed'
        : 'error';

  const report: StressReport = {
    command,
    status,
    passed: outcome.passed,
    totalRuns: totalRuns(outcome),
    durationMs,
  };

  if (outcome.kind === 'failure-detected') {
    report.failure = outcome.result;
  } else if (outcome.kind === 'fatal-error') {
    report.error = outcome.reason;
  }

  return report;
}

/**
 * Human-facing output for a stress run: per-run progress, the captured output
 * of the failing run, and the final summary.
 */
export class Reporter {
  private readonly color: boolean;

  constructor(
    private readonly output: ReporterOutput = console,
    options: ReporterOptions = {},
  ) {
    this.color = options.color ?? true;
  }

  header(version: string, command: string, stopHint: string): void {
    this.output.log(`\nstress-loop v${version}`);
    this.output.log('================');
    this.output.log(`Command: ${command}`);
    this.output.log(this.paint('dim', stopHint));
  }

  notice(message: string): void {
    this.output.log(this.paint('yellow', message));
  }

  runStarted(sequence: number): void {
    this.output.log(`\n[Run ${sequence}] Running...`);
  }

  runPassed(result: RunResult): void {
    this.output.log(this.paint('green', `  ✓ PASSED (${result.durationMs}ms)`));
  }

  /** Prints the captured streams verbatim. */
  runFailed(result: RunResult): void {
    this.output.log(
      this.paint(
        'red',
        `  ✗ FAILED (exit code ${result.exitCode}, ${result.durationMs}ms)`,
      ),
    );
    this.stream('\n', 'STDOUT', result.sequence, result.stdout);
    this.stream('', 'STDERR', result.sequence, result.stderr);
  }

  // An empty stream is marked in its header so the body is always verbatim
  private stream(
    prefix: string,
    name: string,
    sequence: number,
    content: string,
  ): void {
    const label =
      content === ''
        ? `${name} (run ${sequence}): empty`
        : `${name} (run ${sequence})`;
    this.output.log(this.paint('cyan', `${prefix}--- ${label} ---`));
    if (content !== '') this.output.log(content);
  }

  runErrored(reason: string): void {
    this.output.error(this.paint('red', `  ✗ ERROR: ${reason}`));
  }

  summary(outcome: RunOutcome, durationMs: number): void {
    this.output.log('\n================');
    this.output.log('Summary');
    this.output.log('================');

    switch (outcome.kind) {
      case 'all-passed':
        this.output.log(this.paint('green', `All ${outcome.passed} runs passed.`));
        break;
      case 'failure-detected':
        this.output.log(
          this.paint(
            'red',
            `Run ${outcome.result.sequence} failed with exit code ${outcome.result.exitCode}.`,
          ),
        );
        break;
      case 'fatal-error':
        this.output.error(this.paint('red', `Fatal error: ${outcome.reason}`));
        break;
    }

    this.output.log(`Runs:   ${totalRuns(outcome)}`);
    this.output.log(`Passed: ${outcome.passed}`);
    this.output.log(`Time:   ${durationMs}ms`);
  }

  private paint(color: Color, text: string): string {
    return this.color ? `${COLORS[color]}${text}${COLORS.reset}` : text;
  }
}
