export type CrosswordEngineErrorCode =
  | 'engine.invalid-configuration'
  | 'engine.invalid-execution'
  | 'engine.invalid-words';

export class CrosswordEngineDomainError extends Error {
  readonly code: CrosswordEngineErrorCode;
  readonly retryable: false;
  readonly context: Readonly<Record<string, unknown>>;

  constructor(
    code: CrosswordEngineErrorCode,
    message: string,
    context: Readonly<Record<string, unknown>> = {},
  ) {
    super(`[crossword-engine] ${message}`);
    this.name = 'CrosswordEngineDomainError';
    this.code = code;
    this.retryable = false;
    this.context = context;
  }
}

export function engineError(
  code: CrosswordEngineErrorCode,
  message: string,
  context: Readonly<Record<string, unknown>> = {},
): CrosswordEngineDomainError {
  return new CrosswordEngineDomainError(code, message, context);
}
