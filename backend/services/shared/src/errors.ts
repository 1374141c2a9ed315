// backend/services/shared/src/errors.ts

/**
 * Purpose:
 * - Error taxonomy shared by services.
 * - HttpError subclasses are per-request failures; the problem+json error
 *   handler turns them into responses. They never escape the request.
 * - ConfigError / BindError are startup failures; the entrypoint logs them
 *   and exits non-zero.
 */

export class HttpError extends Error {
  readonly status: number;
  readonly title: string;
  readonly headers: Readonly<Record<string, string>>;

  constructor(
    status: number,
    title: string,
    detail: string,
    headers: Record<string, string> = {}
  ) {
    super(detail);
    this.name = new.target.name;
    this.status = status;
    this.title = title;
    this.headers = headers;
  }
}

export class BadRequestError extends HttpError {
  constructor(detail: string) {
    super(400, "Bad Request", detail);
  }
}

export class UnauthorizedError extends HttpError {
  constructor(detail: string, headers: Record<string, string> = {}) {
    super(401, "Unauthorized", detail, headers);
  }
}

export class ForbiddenOriginError extends HttpError {
  readonly origin: string;

  constructor(origin: string) {
    super(403, "Forbidden", `Origin "${origin}" is not allowed`);
    this.origin = origin;
  }
}

export class BadGatewayError extends HttpError {
  constructor(detail: string) {
    super(502, "Bad Gateway", detail);
  }
}

export class GatewayTimeoutError extends HttpError {
  constructor(detail: string) {
    super(504, "Gateway Timeout", detail);
  }
}

export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export class BindError extends Error {
  readonly port: number;
  readonly code: string | undefined;

  constructor(port: number, cause: NodeJS.ErrnoException) {
    super(`Cannot bind port ${port}: ${cause.code ?? cause.message}`, {
      cause,
    });
    this.name = "BindError";
    this.port = port;
    this.code = cause.code;
  }
}
