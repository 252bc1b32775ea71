export class PulseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Missing or invalid configuration on disk or in the environment. */
export class ConfigError extends PulseError {}

/** Not logged in, expired session, or a rejected token exchange. */
export class AuthError extends PulseError {}

/** Bad user input (day counts, dates, setting values). */
export class ValidationError extends PulseError {}

export class HttpError extends PulseError {
  constructor(
    readonly status: number,
    readonly method: string,
    readonly path: string,
    readonly body: string,
  ) {
    super(`HTTP ${status} ${method} ${path}: ${body}`);
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
