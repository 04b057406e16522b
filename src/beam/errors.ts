export interface InputIssue {
  field: string;
  value: unknown;
  message: string;
}

/**
 * Raised when a section input cannot be computed: a non-positive magnitude,
 * a negative or fractional bar count, or a value that is not a number.
 * No partial result accompanies it.
 */
export class InvalidGeometryError extends Error {
  readonly issues: InputIssue[];

  constructor(issues: InputIssue[]) {
    const [first] = issues;
    super(
      issues.length === 1 && first
        ? first.message
        : `Invalid section input:\n${issues.map((i) => `  - ${i.message}`).join("\n")}`,
    );
    this.name = "InvalidGeometryError";
    this.issues = issues;
  }
}
