/**
 * JWT Token Types
 * Access and email-verification tokens share one secret; the type claim
 * keeps either from being accepted in place of the other.
 */
export enum TokenType {
  ACCESS = 'access',
  EMAIL_VERIFICATION = 'email_verification',
}

/**
 * Access token payload.
 * `sub` is the numeric user id rendered as a string.
 */
export interface AccessTokenPayload {
  sub: string;
  email: string;
  type: TokenType.ACCESS;
  iat?: number;
  exp?: number;
}

export interface EmailVerificationPayload {
  sub: string;
  type: TokenType.EMAIL_VERIFICATION;
  iat?: number;
  exp?: number;
}

/** What the credential codec needs to issue an access token. */
export interface AccessTokenSubject {
  userId: number;
  email: string;
}

/**
 * Claims returned by the credential codec after verification.
 * `subject` is left as signed; the session resolver decides whether it
 * names a valid user id.
 */
export interface AccessTokenClaims {
  subject: string;
  email: string;
  issuedAt: number;
  expiresAt: number;
}

/**
 * Password-reset token payload, signed with its own secret.
 * There is no `exp` claim: age is checked against the reset window
 * at validation time using `iat`.
 */
export interface ResetTokenPayload {
  sub: string;
  email: string;
  jti: string;
  iat?: number;
}

/** Fields callers of the reset protocol rely on after validation. */
export interface ResetTokenClaims {
  userId: number;
  email: string;
  jti: string;
  issuedAt: Date;
}
