import type { ParseError } from '@crisp/syntax';

export class EvalError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EvalError';
  }
}

/** Wrong number or type of arguments for an operation. */
export class ArgsMismatchError extends EvalError {
  constructor(
    public operation: string,
    public reason: string,
  ) {
    super(`${operation}: ${reason}`);
    this.name = 'ArgsMismatchError';
  }
}

export class VoidVariableError extends EvalError {
  constructor(public symbolName: string) {
    super(`Symbol's value as variable is void: ${symbolName}`);
    this.name = 'VoidVariableError';
  }
}

export class VoidFunctionError extends EvalError {
  constructor(public symbolName: string) {
    super(`Symbol's function definition is void: ${symbolName}`);
    this.name = 'VoidFunctionError';
  }
}

export class ReadError extends EvalError {
  constructor(public parseError: ParseError) {
    super(parseError.message, { cause: parseError });
    this.name = 'ReadError';
  }
}

export class FileReadError extends EvalError {
  constructor(
    public path: string,
    cause: unknown,
  ) {
    super(`cannot read ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
    this.name = 'FileReadError';
  }
}

export class DepthLimitError extends EvalError {
  constructor(
    public limit: number,
    public label: string,
  ) {
    super(`call depth limit of ${limit} frames exceeded while calling ${label}`);
    this.name = 'DepthLimitError';
  }
}
