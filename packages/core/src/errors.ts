export class CidrError extends Error {
  readonly input: string;

  constructor(input: string, message: string) {
    super(`Invalid CIDR "${input}": ${message}`);
    this.name = "CidrError";
    this.input = input;
  }
}

export class PortSpecError extends Error {
  readonly input: string;

  constructor(input: string, message: string) {
    super(`Invalid port specification "${input}": ${message}`);
    this.name = "PortSpecError";
    this.input = input;
  }
}

export class ConfigError extends Error {
  readonly code = "CONFIG_INVALID";
  readonly issues: string[];

  constructor(issues: string[]) {
    super(issues.length === 1 ? (issues[0] ?? "invalid configuration") : `${issues.length} configuration problems`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

// Stringify anything thrown, preferring Error messages.
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
