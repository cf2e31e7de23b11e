export type ErrorBody = {
  error: string;
  code: string;
  details?: unknown;
};

export class AppError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code: string,
    readonly details?: unknown,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'request.invalid', details);
  }
}

export class ConfigurationError extends AppError {
  constructor(message = 'OpenAI API key not configured') {
    super(message, 500, 'config.missing_credential');
  }
}

/** Failures reported by (or on the way to) the completion service. */
export abstract class UpstreamError extends AppError {
  constructor(
    message: string,
    status: number,
    code: string,
    readonly upstreamMessage: string,
  ) {
    super(message, status, code, upstreamMessage);
  }
}

export class AuthenticationFailure extends UpstreamError {
  constructor(upstreamMessage: string) {
    super('Invalid OpenAI API key', 401, 'upstream.authentication', upstreamMessage);
  }
}

export class RateLimited extends UpstreamError {
  constructor(upstreamMessage: string) {
    super('OpenAI rate limit exceeded', 429, 'upstream.rate_limited', upstreamMessage);
  }
}

export class UpstreamServiceError extends UpstreamError {
  constructor(upstreamMessage: string) {
    super(`OpenAI API error: ${upstreamMessage}`, 500, 'upstream.error', upstreamMessage);
  }
}

export class UpstreamUnavailable extends UpstreamError {
  constructor(upstreamMessage: string) {
    super('OpenAI service unavailable', 500, 'upstream.unavailable', upstreamMessage);
  }
}

// Any Fastify reply, whatever its route generics.
type StatusReply = {
  status(statusCode: number): unknown;
};

export function sendError(
  reply: StatusReply,
  status: number,
  code: string,
  message: string,
  details?: unknown,
): ErrorBody {
  reply.status(status);
  const payload: ErrorBody = { error: message, code };
  if (details !== undefined) payload.details = details;
  return payload;
}

export function sendAppError(reply: StatusReply, error: AppError): ErrorBody {
  return sendError(reply, error.status, error.code, error.message, error.details);
}
