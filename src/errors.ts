// Error taxonomy for the guard engine.
// Aggregation and escalation logic never throws in steady state; these cover
// the sensing path, the response generator and construction-time config.

export class SensingFailure extends Error {
  /** True once the loop has given up after too many consecutive failures. */
  readonly fatal: boolean;
  readonly consecutiveFailures: number;

  constructor(message: string, options: { fatal?: boolean; consecutiveFailures?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "SensingFailure";
    this.fatal = options.fatal ?? false;
    this.consecutiveFailures = options.consecutiveFailures ?? 0;
  }
}

export class GenerationFailure extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "GenerationFailure";
  }
}

export class ConfigurationError extends Error {
  readonly option: string;

  constructor(option: string, message: string) {
    super(`Invalid configuration for "${option}": ${message}`);
    this.name = "ConfigurationError";
    this.option = option;
  }
}
