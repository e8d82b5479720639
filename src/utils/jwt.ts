import jwt from 'jsonwebtoken';
import { env } from '../config/env.js';

export interface AccessTokenPayload {
  sub: string;
  email: string;
  role: string;
}

const ACCESS_TOKEN_TTL = '60m';

/**
 * Sign an access token with the given payload.
 * Access tokens expire in 60 minutes and contain { sub, email, role }.
 */
export function signAccessToken(
  payload: AccessTokenPayload,
  expiresIn: jwt.SignOptions['expiresIn'] = ACCESS_TOKEN_TTL,
): string {
  return jwt.sign(
    { sub: payload.sub, email: payload.email, role: payload.role },
    env.JWT_SECRET,
    { algorithm: 'HS256', expiresIn },
  );
}

/**
 * Verify an access token and return its decoded payload.
 * Throws if the token is invalid, expired, or missing required claims.
 */
export function verifyAccessToken(token: string): AccessTokenPayload {
  const decoded = jwt.verify(token, env.JWT_SECRET, {
    algorithms: ['HS256'],
  });

  if (
    typeof decoded === 'string' ||
    typeof decoded.sub !== 'string' ||
    typeof decoded.email !== 'string'
  ) {
    throw new jwt.JsonWebTokenError('Malformed access token payload');
  }

  return {
    sub: decoded.sub,
    email: decoded.email,
    role: typeof decoded.role === 'string' ? decoded.role : 'user',
  };
}
