/**
 * CLI error taxonomy
 * Every failure surfaced to the user is one of these; cli.ts maps them to exit code 1.
 */

export class CliError extends Error {
  readonly exitCode: number = 1;

  constructor(message: string) {
    super(message);
    this.name = 'CliError';
  }
}

/** Missing or invalid environment configuration */
export class ConfigError extends CliError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** No usable refresh token on disk */
export class NotLoggedInError extends CliError {
  constructor(message = 'Not logged in. Run `macrofactor-cli login` first.') {
    super(message);
    this.name = 'NotLoggedInError';
  }
}

/** Bad flag or argument value */
export class ValidationError extends CliError {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class IndexOutOfRangeError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'IndexOutOfRangeError';
  }
}

/** Credentials or tokens rejected by the service */
export class AuthError extends CliError {
  constructor(message: string) {
    super(message);
    this.name = 'AuthError';
  }
}

/** Network failure, HTTP error or unexpected response shape */
export class ApiError extends CliError {
  constructor(
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = 'ApiError';
  }
}
