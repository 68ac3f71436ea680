import type { ZodError } from "zod";

/**
 * Raised when a caller hands the engine (or the store) input that breaks
 * its contract: a malformed window, a non-positive budget limit, a
 * non-finite amount. Never retried.
 */
export class ValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string | string[]) {
    const list = Array.isArray(issues) ? issues : [issues];
    super(list.join("; "));
    this.name = "ValidationError";
    this.issues = list;
  }

  static fromZod(error: ZodError, prefix?: string): ValidationError {
    return new ValidationError(
      error.issues.map((issue) => {
        const path = [prefix, ...issue.path.map(String)]
          .filter((p) => p !== undefined && p !== "")
          .join(".");
        return path ? `${path}: ${issue.message}` : issue.message;
      }),
    );
  }
}

/** A lookup by id found nothing for this user. */
export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}
