interface RequestErrorOptions {
  operationId: string;
  url: string;
  cause?: unknown;
}

/**
 * The request never produced a response: DNS, connection, TLS or timeout failure.
 */
export class NetworkError extends Error {
  readonly operationId: string;
  readonly url: string;

  constructor(message: string, options: RequestErrorOptions) {
    super(message, { cause: options.cause });
    this.name = 'NetworkError';
    this.operationId = options.operationId;
    this.url = options.url;
  }
}

export class HttpError extends Error {
  readonly statusCode: number;
  readonly operationId: string;
  readonly url: string;
  readonly responseBody?: unknown;

  constructor(
    message: string,
    options: { statusCode: number; operationId: string; url: string; responseBody?: unknown },
  ) {
    super(message);
    this.name = 'HttpError';
    this.statusCode = options.statusCode;
    this.operationId = options.operationId;
    this.url = options.url;
    this.responseBody = options.responseBody;
  }
}

export class UnauthorizedAPIToken extends HttpError {
  constructor(
    message: string,
    options: { statusCode: number; operationId: string; url: string; responseBody?: unknown },
  ) {
    super(message, options);
    this.name = 'UnauthorizedAPIToken';
  }
}

/**
 * The response arrived but its body was not the JSON shape the caller expects.
 */
export class DecodeError extends Error {
  readonly operationId: string;
  readonly url: string;

  constructor(message: string, options: RequestErrorOptions) {
    super(message, { cause: options.cause });
    this.name = 'DecodeError';
    this.operationId = options.operationId;
    this.url = options.url;
  }
}
