/**
 * VM execution error.
 */
export class VMError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "VMError";
  }
}

/**
 * A fatal runtime failure with its traceback, innermost frame first.
 */
export interface RuntimeFailure {
  message: string;
  trace: string[];
}
