//src/common/interfaces/auth.interface.ts

/** Claims we rely on from the identity provider's access token. */
export interface JwtPayload {
  sub: string; // Principal id; also the principal's profile id
  email?: string;
  iat?: number;
  exp?: number;
}
