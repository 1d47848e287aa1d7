export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;

  constructor(message: string, statusCode: number, code: string) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
  }
}

export class AuthenticationError extends AppError {
  /** `status` and `content` are set when a token endpoint rejected the request. */
  constructor(
    message = 'Authentication failed',
    public readonly status?: number,
    public readonly content?: string,
  ) {
    super(message, 401, 'AUTHENTICATION_ERROR');
    this.name = 'AuthenticationError';
  }
}

export class ValidationError extends AppError {
  constructor(message = 'Validation failed') {
    super(message, 400, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class UpstreamError extends AppError {
  constructor(message: string, public readonly upstream: string) {
    super(message, 502, 'UPSTREAM_ERROR');
    this.name = 'UpstreamError';
  }
}

/**
 * A Data Cloud endpoint answered with a status the operation does not accept.
 * The response body is kept verbatim in `content`.
 */
export class DataCloudError extends AppError {
  constructor(
    public readonly operation: string,
    public readonly url: string,
    public readonly status: number,
    public readonly content: string,
  ) {
    super(
      `Salesforce Data Cloud error during '${operation}' on ${url} (${status}): ${content}`,
      status,
      'DATACLOUD_ERROR',
    );
    this.name = 'DataCloudError';
  }
}

export class JobTimeoutError extends AppError {
  constructor(
    public readonly jobId: string,
    public readonly lastState: string,
  ) {
    super(`Job ${jobId} still ${lastState} when the wait timed out`, 504, 'JOB_TIMEOUT');
    this.name = 'JobTimeoutError';
  }
}
