/**
 * Errors raised by the PMS client. Every failure carries a message, an
 * HTTP-like status and an optional details map; the tool layer is the only
 * place that turns them into user-facing responses.
 */
export class PmsApiError extends Error {
  readonly status?: number;
  readonly details: Record<string, unknown>;

  constructor(message: string, status?: number, details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'PmsApiError';
    this.status = status;
    this.details = details;

    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): { error: string; status?: number; details?: Record<string, unknown> } {
    return {
      error: this.message,
      status: this.status,
      ...(Object.keys(this.details).length > 0 ? { details: this.details } : {}),
    };
  }
}

/** Real mode was requested without a client id/secret. */
export class AuthConfigurationError extends PmsApiError {
  constructor(message = 'PMS client credentials are not configured') {
    super(message, 401);
    this.name = 'AuthConfigurationError';
  }
}

/** The token endpoint rejected the client-credentials exchange. */
export class AuthenticationError extends PmsApiError {
  constructor(message: string, status = 401, details: Record<string, unknown> = {}) {
    super(message, status, details);
    this.name = 'AuthenticationError';
  }
}

/** A 2xx response whose body is unusable or incomplete. */
export class UpstreamContractError extends PmsApiError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 500, details);
    this.name = 'UpstreamContractError';
  }
}

/** Non-2xx response that survived every retry. */
export class UpstreamRequestError extends PmsApiError {
  constructor(message: string, status: number, details: Record<string, unknown> = {}) {
    super(message, status, details);
    this.name = 'UpstreamRequestError';
  }
}

/** Transport failure on the last attempt, or the retry budget ran out. */
export class ServiceUnavailableError extends PmsApiError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 503, details);
    this.name = 'ServiceUnavailableError';
  }
}

export function isPmsApiError(err: unknown): err is PmsApiError {
  return err instanceof PmsApiError;
}
