/**
 * The rule document is missing, unreadable or structurally invalid.
 * Raised while the application bootstraps; the process cannot continue.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Caller input was rejected before reaching the decision engine.
 */
export class ValidationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}
