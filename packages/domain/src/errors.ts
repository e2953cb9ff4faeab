export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/** Raised before a run starts when the configuration cannot be simulated. */
export class ConfigurationError extends Error {
  readonly issues: readonly string[];

  constructor(issues: string[]) {
    super(
      issues.length === 1
        ? `Invalid configuration: ${issues[0]}`
        : `Invalid configuration (${issues.length} issues):\n${issues.map((issue) => `  - ${issue}`).join("\n")}`,
    );
    this.name = "ConfigurationError";
    this.issues = [...issues];
  }
}
