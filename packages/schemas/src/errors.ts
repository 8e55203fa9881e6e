/** A world definition that cannot be played. Fatal at startup. */
export class WorldIntegrityError extends Error {
  readonly issues: string[];

  constructor(issues: string[], source?: string) {
    const where = source ? ` in "${source}"` : "";
    super(`Invalid world${where}: ${issues.join("; ")}`);
    this.name = "WorldIntegrityError";
    this.issues = issues;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
