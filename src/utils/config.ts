import * as path from 'path';
import type { RunOptions } from '../types.js';
import { ConfigError } from '../errors.js';

export interface CliOptions {
  cwd?: string;
  maxRuns?: string;
  image?: string;
  keepContainers?: boolean;
  listen?: boolean;
  color?: boolean;
  output?: string;
  env?: string[];
}

export type Env = Record<string, string | undefined>;

/** commander collector for the repeatable `--env` flag. */
export function collectEnv(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function parseEnvPairs(pairs: string[]): Record<string, string> {
  const env: Record<string, string> = {};

  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    const key = separator === -1 ? '' : pair.slice(0, separator);

    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(key)) {
      throw new ConfigError(
        `Invalid env: "${pair}". Must be KEY=VALUE`,
      );
    }

    env[key] = pair.slice(separator + 1);
  }

  return env;
}

export function parsePositiveInteger(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigError(
      `Invalid ${name}: "${value}". Must be a positive integer`,
    );
  }

  const parsed = Number(trimmed);
  if (parsed < 1 || !Number.isSafeInteger(parsed)) {
    throw new ConfigError(
      `Invalid ${name}: "${value}". Must be a positive integer`,
    );
  }

  return parsed;
}

/**
 * Merges command-line options with environment fallbacks. Flags win over
 * the environment.
 */
export function resolveConfig(options: CliOptions, env: Env = {}): RunOptions {
  const cwd = path.resolve(options.cwd ?? process.cwd());

  const maxRunsValue = options.maxRuns ?? env.STRESS_LOOP_MAX_RUNS;
  const maxRuns =
    maxRunsValue !== undefined && maxRunsValue !== ''
      ? parsePositiveInteger(maxRunsValue, 'max runs')
      : undefined;

  const image = options.image ?? (env.STRESS_LOOP_IMAGE || undefined);

  if (options.keepContainers && !image) {
    throw new ConfigError('--keep-containers requires --image');
  }

  const config: RunOptions = {
    cwd,
    listen: options.listen !== false,
    // https://no-color.org: any non-empty value disables colour
    color: options.color !== false && !env.NO_COLOR,
  };

  if (maxRuns !== undefined) config.maxRuns = maxRuns;
  if (image) config.image = image;
  if (options.keepContainers) config.keepContainers = true;
  if (options.output) config.outputFile = path.resolve(options.output);
  if (options.env && options.env.length > 0) {
    config.env = parseEnvPairs(options.env);
  }

  return config;
}
