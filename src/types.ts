export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunResult extends CommandResult {
  sequence: number;
  durationMs: number;
}

export type RunOutcome =
  | { kind: 'all-passed'; passed: number }
  | { kind: 'failure-detected'; passed: number; result: RunResult }
  | { kind: 'fatal-error'; passed: number; reason: string; sequence?: number };

export type ReportStatus = 'passed' | 'failed' | 'error';

export interface StressReport {
  command: string;
  status: ReportStatus;
  passed: number;
  totalRuns: number;
  durationMs: number;
  failure?: RunResult;
  error?: string;
}

export interface RunOptions {
  cwd: string;
  maxRuns?: number;
  image?: string;
  keepContainers?: boolean;
  env?: Record<string, string>;
  listen: boolean;
  color: boolean;
  outputFile?: string;
}
