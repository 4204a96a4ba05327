import * as readline from 'readline';
import type { StopFlag } from '../runner/stop-flag.js';
import { errorMessage } from '../errors.js';

export const STOP_ACKNOWLEDGEMENT =
  'Stop requested. Finishing the current run...';

export const INPUT_CLOSED_NOTICE =
  'Input closed before a stop request; running until a run fails.';

/** process.stdin, or any readable stream standing in for it. */
export interface OperatorInput extends NodeJS.ReadableStream {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  unref?(): unknown;
}

export type ListenerMode = 'keypress' | 'line' | 'none';

export interface StopListener {
  readonly mode: ListenerMode;
  start(flag: StopFlag): void;
  close(): void;
}

export interface StopListenerOptions {
  log?: (message: string) => void;
}

function acknowledge(flag: StopFlag, log: (message: string) => void): void {
  if (flag.request()) {
    log(STOP_ACKNOWLEDGEMENT);
  }
}

/** Any single key on a raw-mode terminal. */
export class KeypressListener implements StopListener {
  readonly mode = 'keypress';
  private onData: (() => void) | null = null;

  constructor(
    private readonly input: OperatorInput,
    private readonly log: (message: string) => void,
  ) {}

  start(flag: StopFlag): void {
    if (!this.input.setRawMode) {
      throw new Error('Input does not support raw mode');
    }
    this.input.setRawMode(true);

    this.onData = () => {
      this.close();
      acknowledge(flag, this.log);
    };
    this.input.once('data', this.onData);
    this.input.resume();
    this.input.unref?.();
  }

  close(): void {
    if (!this.onData) return;

    this.input.removeListener('data', this.onData);
    this.onData = null;
    this.input.setRawMode?.(false);
    this.input.pause();
  }
}

/** First full line of input, for pipes and terminals without raw mode. */
export class LineListener implements StopListener {
  readonly mode = 'line';
  private rl: readline.Interface | null = null;

  constructor(
    private readonly input: OperatorInput,
    private readonly log: (message: string) => void,
  ) {}

  start(flag: StopFlag): void {
    const rl = readline.createInterface({ input: this.input, terminal: false });
    this.rl = rl;

    rl.once('line', () => {
      this.close();
      acknowledge(flag, this.log);
    });

    // EOF without a line: there is no operator to listen to
    rl.once('close', () => {
      if (this.rl === null) return;
      this.rl = null;
      this.log(INPUT_CLOSED_NOTICE);
    });

    this.input.unref?.();
  }

  close(): void {
    const rl = this.rl;
    if (!rl) return;

    this.rl = null;
    rl.close();
  }
}

/** Degraded mode: cancellation is unreachable. */
export class NoopListener implements StopListener {
  readonly mode = 'none';

  start(_flag: StopFlag): void {}

  close(): void {}
}

export function selectStopListener(
  input: OperatorInput | undefined,
  options: StopListenerOptions = {},
): StopListener {
  const log = options.log ?? console.log;

  if (!input || !input.readable) {
    return new NoopListener();
  }

  if (input.isTTY && typeof input.setRawMode === 'function') {
    return new KeypressListener(input, log);
  }

  return new LineListener(input, log);
}

/**
 * Starts the best listener the input supports. A terminal that refuses raw
 * mode falls back to line input.
 */
export function startStopListener(
  input: OperatorInput | undefined,
  flag: StopFlag,
  options: StopListenerOptions = {},
): StopListener {
  const log = options.log ?? console.log;
  const listener = selectStopListener(input, options);

  if (listener.mode !== 'keypress' || !input) {
    listener.start(flag);
    return listener;
  }

  try {
    listener.start(flag);
    return listener;
  } catch (error) {
    log(`Raw keyboard input unavailable (${errorMessage(error)}); press Enter to stop.`);
    const fallback = new LineListener(input, log);
    fallback.start(flag);
    return fallback;
  }
}

export function stopHint(mode: ListenerMode): string {
  switch (mode) {
    case 'keypress':
      return 'Press any key to stop after the current run.';
    case 'line':
      return 'Press Enter to stop after the current run.';
    case 'none':
      return 'Stop listener disabled; running until a run fails.';
  }
}
