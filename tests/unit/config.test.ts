import { describe, it, expect } from 'vitest';
import * as path from 'path';
import {
  collectEnv,
  parseEnvPairs,
  parsePositiveInteger,
  resolveConfig,
} from '../../src/utils/config.js';
import { ConfigError } from '../../src/errors.js';

describe('parsePositiveInteger', () => {
  it('parses a positive integer', () => {
    expect(parsePositiveInteger('25', 'max runs')).toBe(25);
  });

  it('accepts surrounding whitespace', () => {
    expect(parsePositiveInteger(' 3 ', 'max runs')).toBe(3);
  });

  it.each(['0', '-1', '1.5', 'abc', ''])('rejects "%s"', (value) => {
    expect(() => parsePositiveInteger(value, 'max runs')).toThrow(ConfigError);
  });

  it('names the setting in the error', () => {
    expect(() => parsePositiveInteger('ten', 'max runs')).toThrow(
      'Invalid max runs: "ten". Must be a positive integer',
    );
  });
});

describe('parseEnvPairs', () => {
  it('splits each pair on the first equals sign', () => {
    expect(parseEnvPairs(['SEED=42', 'OPTS=a=b', 'EMPTY='])).toEqual({
      SEED: '42',
      OPTS: 'a=b',
      EMPTY: '',
    });
  });

  it('lets a later pair override an earlier one', () => {
    expect(parseEnvPairs(['SEED=1', 'SEED=2'])).toEqual({ SEED: '2' });
  });

  it.each(['SEED', '=42', '1SEED=42', 'MY VAR=1'])('rejects "%s"', (pair) => {
    expect(() => parseEnvPairs([pair])).toThrow(
      `Invalid env: "${pair}". Must be KEY=VALUE`,
    );
  });
});

describe('collectEnv', () => {
  it('appends each occurrence of the flag', () => {
    expect(collectEnv('B=2', collectEnv('A=1', []))).toEqual(['A=1', 'B=2']);
  });
});

describe('resolveConfig', () => {
  it('uses defaults when nothing is set', () => {
    expect(resolveConfig({}, {})).toEqual({
      cwd: process.cwd(),
      listen: true,
      color: true,
    });
  });

  it('resolves the working directory and output file', () => {
    const config = resolveConfig({ cwd: 'build', output: 'report.json' }, {});

    expect(config.cwd).toBe(path.resolve('build'));
    expect(config.outputFile).toBe(path.resolve('report.json'));
  });

  it('reads max runs from the flag', () => {
    expect(resolveConfig({ maxRuns: '5' }, {}).maxRuns).toBe(5);
  });

  it('falls back to STRESS_LOOP_MAX_RUNS', () => {
    expect(resolveConfig({}, { STRESS_LOOP_MAX_RUNS: '3' }).maxRuns).toBe(3);
  });

  it('prefers the flag over the environment', () => {
    expect(
      resolveConfig({ maxRuns: '7' }, { STRESS_LOOP_MAX_RUNS: '3' }).maxRuns,
    ).toBe(7);
  });

  it('rejects an invalid max runs value', () => {
    expect(() => resolveConfig({ maxRuns: '0' }, {})).toThrow(ConfigError);
  });

  it('disables color with --no-color', () => {
    expect(resolveConfig({ color: false }, {}).color).toBe(false);
  });

  it('disables color when NO_COLOR is set', () => {
    expect(resolveConfig({}, { NO_COLOR: '1' }).color).toBe(false);
  });

  it('disables the listener with --no-listen', () => {
    expect(resolveConfig({ listen: false }, {}).listen).toBe(false);
  });

  it('reads the image from STRESS_LOOP_IMAGE', () => {
    expect(resolveConfig({}, { STRESS_LOOP_IMAGE: 'node:20-slim' }).image).toBe(
      'node:20-slim',
    );
  });

  it('requires an image for --keep-containers', () => {
    expect(() => resolveConfig({ keepContainers: true }, {})).toThrow(
      '--keep-containers requires --image',
    );
  });

  it('keeps containers when an image is given', () => {
    const config = resolveConfig(
      { keepContainers: true, image: 'node:20-slim' },
      {},
    );

    expect(config.keepContainers).toBe(true);
    expect(config.image).toBe('node:20-slim');
  });

  it('parses --env pairs for the test command', () => {
    expect(resolveConfig({ env: ['SEED=42', 'LOG=debug'] }, {}).env).toEqual({
      SEED: '42',
      LOG: 'debug',
    });
  });

  it('leaves env unset when no --env is given', () => {
    expect(resolveConfig({ env: [] }, {})).not.toHaveProperty('env');
  });

  it('rejects a malformed --env pair', () => {
    expect(() => resolveConfig({ env: ['SEED'] }, {})).toThrow(ConfigError);
  });
});
