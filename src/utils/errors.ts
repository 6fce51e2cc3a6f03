export class TimeoutError extends Error {
  constructor(
    public readonly label: string,
    public readonly timeoutMs: number
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export class ConfigError extends Error {
  constructor(
    public readonly variable: string,
    message: string
  ) {
    super(`${variable}: ${message}`);
    this.name = "ConfigError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
