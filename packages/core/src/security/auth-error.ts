import { AuthErrorKind } from '@keygate/shared';

const DEFAULT_MESSAGES: Record<AuthErrorKind, string> = {
  InvalidToken: 'Invalid token',
  ExpiredToken: 'Token has expired',
  UnknownKey: 'Token signed by an unknown key',
  InvalidSignature: 'Invalid token signature',
  IssuerMismatch: 'Token issuer mismatch',
  AudienceMismatch: 'Token audience mismatch',
  Unauthenticated: 'Missing authentication credentials',
  InsufficientRole: 'Insufficient role',
  KeyFetchFailure: 'Unable to verify token: signing keys unavailable',
};

/** HTTP status for an auth failure kind. Only authorization failures are 403. */
export function statusForKind(kind: AuthErrorKind): number {
  return kind === AuthErrorKind.INSUFFICIENT_ROLE ? 403 : 401;
}

export class AuthError extends Error {
  public readonly kind: AuthErrorKind;
  public readonly statusCode: number;

  constructor(kind: AuthErrorKind, message: string = DEFAULT_MESSAGES[kind], options?: ErrorOptions) {
    super(message, options);
    this.name = 'AuthError';
    this.kind = kind;
    this.statusCode = statusForKind(kind);
  }
}
