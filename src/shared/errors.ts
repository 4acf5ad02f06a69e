/**
 * Failure taxonomy shared by the guards, the token codec and the persistence
 * gateway. The error middleware maps each class to one HTTP outcome.
 */

/** Bad login or password. */
export class AuthenticationFailure extends Error {
  constructor(message = 'Invalid login or password') {
    super(message);
    this.name = 'AuthenticationFailure';
  }
}

/** Identity is known but the required capability is not granted. */
export class AuthorizationFailure extends Error {
  constructor(message = 'Forbidden') {
    super(message);
    this.name = 'AuthorizationFailure';
  }
}

/**
 * Token missing, malformed, unsigned or failing verification. The reason is
 * kept for logs only; clients always see a bare 401.
 */
export class TokenInvalid extends Error {
  constructor(readonly reason: string) {
    super('Invalid token');
    this.name = 'TokenInvalid';
  }
}

/** A backend (connection pool, session store, credential store) could not be reached. */
export class ResourceAcquisitionFailure extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ResourceAcquisitionFailure';
  }
}

export type OperationFailureStatus = 404 | 409 | 500;

/** A well-formed persistence operation that failed for data reasons. */
export class OperationFailure extends Error {
  constructor(
    message: string,
    readonly status: OperationFailureStatus = 500,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'OperationFailure';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
