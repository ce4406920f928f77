export abstract class AppError extends Error {
  abstract readonly statusCode: number;
  abstract readonly isOperational: boolean;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends AppError {
  readonly statusCode = 500;
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Configuration Error: ${message}`, context);
  }
}

export class SpotifyAPIError extends AppError {
  readonly statusCode = 503;
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Spotify API Error: ${message}`, context);
  }
}

export class AuthenticationError extends AppError {
  readonly statusCode = 401;
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Authentication Error: ${message}`, context);
  }
}

export class InputFileError extends AppError {
  readonly statusCode = 400;
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Input Error: ${message}`, context);
  }
}

/** A single input line that is not in `Artist - Title` form. Reported, never fatal. */
export class MalformedLineError extends AppError {
  readonly statusCode = 422;
  readonly isOperational = true;

  constructor(
    readonly lineNumber: number,
    readonly line: string
  ) {
    super(`Line ${lineNumber} is not in "Artist - Title" format: ${line}`, { lineNumber, line });
  }
}

export class ValidationError extends AppError {
  readonly statusCode = 400;
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Validation Error: ${message}`, context);
  }
}
