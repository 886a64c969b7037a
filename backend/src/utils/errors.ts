/**
 * Error types shared by the loader, the analysis core and the outer surfaces.
 *
 * An unresolved callee or an unknown libfunc is not an error: those call
 * sites are left uncategorised.
 */

export class ScannerError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = "ScannerError";
  }

  toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }
}

/**
 * A whole-program invariant was broken by the caller: a role read before it
 * was assigned, a branch target outside the function, a pass run twice.
 * Never recovered from.
 */
export class InvariantViolationError extends ScannerError {
  constructor(message: string) {
    super(message, "INVARIANT_VIOLATION");
    this.name = "InvariantViolationError";
  }
}

export class ProgramLoadError extends ScannerError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message, "PROGRAM_LOAD_ERROR");
    this.name = "ProgramLoadError";
  }
}

export function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string[] {
  return issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message));
}

export class ConfigError extends ScannerError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR");
    this.name = "ConfigError";
  }
}
