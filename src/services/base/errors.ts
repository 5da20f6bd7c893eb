export class DataSourceError extends Error {
  constructor(
    message: string,
    public code: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'DataSourceError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends DataSourceError {
  constructor(message: string, public problems: string[] = []) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class AuthenticationError extends DataSourceError {
  constructor(message: string, cause?: Error) {
    super(message, 'AUTH_ERROR', cause);
    this.name = 'AuthenticationError';
  }
}

export class DirectoryError extends DataSourceError {
  constructor(message: string, cause?: Error) {
    super(message, 'DIRECTORY_ERROR', cause);
    this.name = 'DirectoryError';
  }
}

/**
 * Authentication methods of a single user could not be read.
 * Never fatal: the user is left out of the report.
 */
export class PerUserError extends DataSourceError {
  constructor(message: string, public userPrincipalName: string, cause?: Error) {
    super(message, 'USER_LOOKUP_ERROR', cause);
    this.name = 'PerUserError';
  }
}

export class ExportError extends DataSourceError {
  constructor(message: string, public outputPath: string, cause?: Error) {
    super(message, 'EXPORT_ERROR', cause);
    this.name = 'ExportError';
  }
}

/**
 * Normalise anything thrown into an Error so it can travel as a `cause`.
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  if (typeof error === 'string') {
    return new Error(error);
  }
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return new Error(error.message);
  }
  return new Error(String(error));
}
