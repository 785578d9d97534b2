import type { ZodError } from "zod";

/**
 * Thrown for programmer errors: invalid thresholds, inverted duration bounds
 * and the like. Missing or degenerate data is never reported this way.
 */
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigurationError";
    this.issues = issues;
  }

  static fromZod(context: string, error: ZodError): ConfigurationError {
    const issues = error.issues.map((issue) => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    return new ConfigurationError(`Invalid ${context}`, issues);
  }
}
