/**
 * An access token failed signature, issuer, audience, expiry or subject checks,
 * or the signing keys could not be loaded to check it.
 */
export class TokenValidationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'TokenValidationError';
  }
}

export class StateMismatchError extends Error {
  constructor(message = 'OAuth state does not match the issued nonce') {
    super(message);
    this.name = 'StateMismatchError';
  }
}
