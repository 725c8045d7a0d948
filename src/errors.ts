/**
 * Auth protocol errors
 *
 * Every failure raised by the wire layer is an {@link AuthError} tagged with
 * the kind of failure, so callers can decide between dropping the
 * connection and reporting the problem.
 */

/** Failure categories raised by the wire layer */
export type AuthErrorKind = 'io' | 'encoding-overflow' | 'malformed-input' | 'lock' | 'state';

/**
 * Auth protocol error with kind and fatal flag
 */
export class AuthError extends Error {
  readonly kind: AuthErrorKind;
  readonly fatal: boolean;

  constructor(msg: string, kind: AuthErrorKind, fatal = false, options?: { cause?: unknown }) {
    super(msg, options);
    this.name = 'AuthError';
    this.kind = kind;
    this.fatal = fatal;
  }
}

/**
 * Unknown or unexpected packet id on the inbound side
 */
export class MalformedPacketError extends AuthError {
  readonly packetId: number;

  constructor(packetId: number, msg?: string) {
    super(msg ?? `Invalid packet id (0x${hexByte(packetId)})`, 'malformed-input');
    this.name = 'MalformedPacketError';
    this.packetId = packetId;
  }
}

/**
 * Create an auth protocol error
 */
export function makeError(
  msg: string,
  kind: AuthErrorKind,
  fatal?: boolean,
  cause?: unknown,
): AuthError {
  return new AuthError(msg, kind, !!fatal, cause === undefined ? undefined : { cause });
}

/**
 * Check whether a value is an {@link AuthError}, optionally of a given kind
 */
export function isAuthError(err: unknown, kind?: AuthErrorKind): err is AuthError {
  return err instanceof AuthError && (kind === undefined || err.kind === kind);
}

/** Format a byte as two lowercase hex digits */
export function hexByte(value: number): string {
  return (value & 0xff).toString(16).padStart(2, '0');
}
