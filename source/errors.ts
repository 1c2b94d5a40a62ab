/**
 * Error classes for the context budget manager.
 */

/**
 * Base error class for budget-manager errors.
 * @extends Error
 */
export class BudgetError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "BudgetError";
  }
}

/**
 * A caller explicitly asked for a profile name the registry does not know.
 */
export class UnknownProfileError extends BudgetError {
  readonly profileName: string;

  constructor(profileName: string, known: readonly string[]) {
    super(
      `Unknown profile '${profileName}'. Known profiles: ${known.join(", ")}`,
    );
    this.name = "UnknownProfileError";
    this.profileName = profileName;
  }
}

/**
 * A profile definition with a non-positive capacity or an out-of-range
 * target percentage.
 */
export class InvalidProfileDefinitionError extends BudgetError {
  readonly issues: string[];

  constructor(profileName: string, issues: string[]) {
    super(`Invalid profile '${profileName}': ${issues.join("; ")}`);
    this.name = "InvalidProfileDefinitionError";
    this.issues = issues;
  }
}

/**
 * A component file exists but could not be read. Recorded alongside the
 * estimate, never thrown out of a budget calculation.
 */
export class IOReadError extends BudgetError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to read ${path}: ${reason}`, { cause });
    this.name = "IOReadError";
    this.path = path;
  }
}

/**
 * A configuration file failed validation.
 */
export class ConfigError extends BudgetError {
  constructor(configPath: string, message: string) {
    super(`Invalid configuration in ${configPath}: ${message}`);
    this.name = "ConfigError";
  }
}

/**
 * The command line was inconsistent, e.g. an executor check without a
 * phase directory.
 */
export class UsageError extends BudgetError {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}
