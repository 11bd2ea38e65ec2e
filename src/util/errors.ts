export type TrainerErrorCode = 'invalid_config' | 'insufficient_credits' | 'wrong_phase';

export class TrainerError extends Error {
  constructor(readonly code: TrainerErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidConfigError extends TrainerError {
  constructor(message: string, readonly issues: string[] = []) {
    super('invalid_config', issues.length ? `${message}: ${issues.join('; ')}` : message);
  }
}

export class TableError extends TrainerError {}

export function normalizeError(err: unknown) {
  if (err instanceof Error) {
    return {
      name: err.name || 'Error',
      message: err.message || 'unknown',
      code: err instanceof TrainerError ? err.code : undefined,
      stack: err.stack || '',
    };
  }
  return {
    name: typeof err,
    message: String(err),
    code: undefined,
    stack: '',
  };
}
