/**
 * Error types raised by the motor model
 */

/**
 * Base class for every error the library raises
 */
export class MotorModelError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A nameplate value violates its physical constraint.
 * Raised at construction; no model is created.
 */
export class InvalidParameterError extends MotorModelError {
  /** First offending field, if the issue is tied to one */
  readonly parameter: string | undefined;
  /** Every issue found, formatted as `field: message` */
  readonly issues: readonly string[];

  constructor(parameter: string | undefined, issues: readonly string[]) {
    const summary = issues.length > 0 ? issues.join('; ') : 'invalid motor parameters';
    super(parameter ? `Invalid motor parameter "${parameter}": ${summary}` : summary);
    this.parameter = parameter;
    this.issues = issues;
  }
}

/**
 * A query needs a derived quantity that is zero, so its formula is undefined
 */
export class DegenerateModelError extends MotorModelError {
  readonly operation: string;

  constructor(operation: string, reason: string) {
    super(`${operation}: ${reason}`);
    this.operation = operation;
  }
}

/**
 * Environment configuration could not be parsed
 */
export class ConfigurationError extends MotorModelError {}
