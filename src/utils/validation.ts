export class ValidationError extends Error {
  readonly code = "ValidationError";
  readonly issues: string[];

  constructor(message: string, issues: string[] = [message]) {
    super(message);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

/**
 * Collects validation problems so a caller sees every bad field at once
 * instead of fixing them one request at a time.
 */
export class ValidationHelper {
  private readonly issues: string[] = [];

  static nonEmpty(value: unknown, fieldName: string): string | undefined {
    if (value === undefined || value === null) {
      return `${fieldName} is required`;
    }
    if (typeof value !== "string") {
      return `${fieldName} must be a string`;
    }
    if (value.trim().length === 0) {
      return `${fieldName} cannot be empty`;
    }
    return undefined;
  }

  check(issue: string | undefined): this {
    if (issue) {
      this.issues.push(issue);
    }
    return this;
  }

  get valid(): boolean {
    return this.issues.length === 0;
  }

  throwIfInvalid(summary = "Invalid input"): void {
    if (this.issues.length === 0) {
      return;
    }
    const message =
      this.issues.length === 1 ? this.issues[0] ?? summary : `${summary}: ${this.issues.join("; ")}`;
    throw new ValidationError(message, [...this.issues]);
  }
}

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const firstValue = (value: unknown): unknown =>
  Array.isArray(value) ? value[0] : value;
