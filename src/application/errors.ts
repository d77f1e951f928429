/** The initial `download_config_specs` call failed; the client cannot start. */
export class InitializationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InitializationError';
  }
}

/** An operation was issued while the coordinator was not running. */
export class CoordinatorStateError extends Error {
  readonly operation: string;
  readonly phase: string;

  constructor(operation: string, phase: string) {
    super(`Cannot ${operation} while coordinator is ${phase}`);
    this.name = 'CoordinatorStateError';
    this.operation = operation;
    this.phase = phase;
  }
}

/** Environment configuration failed validation. */
export class ConfigurationError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}
