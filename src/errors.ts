export class StressLoopError extends Error {
  constructor(
    message: string,
    public code: string,
  ) {
    super(message);
    this.name = 'StressLoopError';
  }
}

export const ErrorCodes = {
  COMMAND_NOT_FOUND: 'COMMAND_NOT_FOUND',
  COMMAND_NOT_EXECUTABLE: 'COMMAND_NOT_EXECUTABLE',
  INVALID_CWD: 'INVALID_CWD',
  DOCKER_UNAVAILABLE: 'DOCKER_UNAVAILABLE',
  IMAGE_NOT_FOUND: 'IMAGE_NOT_FOUND',
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * The test command could not be located or started. Distinct from a run that
 * started and exited non-zero, which is an ordinary result.
 */
export class SetupError extends StressLoopError {
  constructor(message: string, code: ErrorCode) {
    super(message, code);
    this.name = 'SetupError';
  }
}

export class ConfigError extends StressLoopError {
  constructor(message: string) {
    super(message, ErrorCodes.INVALID_CONFIG);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
