/**
 * The schema or a resolver broke its contract with the executor, e.g. a leaf
 * value that cannot be serialized or an abstract type that resolves to an
 * impossible object type. Never recovered.
 */
export class ContractViolationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ContractViolationError';
  }
}

/**
 * The executor was asked for something its configuration cannot do.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ExecutionAbortedError extends Error {
  constructor(message = 'Execution aborted') {
    super(message);
    this.name = 'ExecutionAbortedError';
  }
}

export class ExecutionTimeoutError extends ExecutionAbortedError {
  readonly timeout: number;

  constructor(timeout: number) {
    super(`Execution timed out after ${timeout}ms`);
    this.name = 'ExecutionTimeoutError';
    this.timeout = timeout;
  }
}
