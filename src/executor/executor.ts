import type { CommandResult } from '../types.js';

/**
 * Runs the test command once.
 *
 * `invoke` resolves for every exit status, zero or not. It rejects with a
 * `SetupError` when the command cannot be started at all, and with any other
 * error for failures while running or capturing output.
 */
export interface Executor {
  describe(): string;
  verify?(): Promise<void>;
  invoke(): Promise<CommandResult>;
}
