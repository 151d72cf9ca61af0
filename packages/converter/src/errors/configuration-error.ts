/**
 * ConfigurationError
 *
 * Raised when the environment does not describe a usable converter setup.
 */
export class ConfigurationError extends Error {
  /**
   * One line per problem, `VARIABLE: message`
   */
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}
