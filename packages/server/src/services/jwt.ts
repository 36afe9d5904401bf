/**
 * JWT Utilities for Authentication
 *
 * Access tokens are issued by the identity service; this server only
 * verifies them. signAccessToken exists for tests and local tooling.
 */

import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { config } from '../config.js';

const jwtPayloadSchema = z.object({
  userId: z.number().int().positive(),
  type: z.literal('access'),
  iat: z.number().optional(),
  exp: z.number().optional(),
});

export type JwtPayload = z.infer<typeof jwtPayloadSchema>;

/**
 * Sign an access token for the given user ID
 * @returns JWT access token with 1h expiry
 */
export function signAccessToken(userId: number, expiresIn: number = 60 * 60): string {
  const payload: Omit<JwtPayload, 'iat' | 'exp'> = {
    userId,
    type: 'access',
  };

  return jwt.sign(payload, config.jwt.secret, { algorithm: 'HS256', expiresIn });
}

/**
 * Verify an access token and return the decoded payload
 * @throws JsonWebTokenError if invalid, TokenExpiredError if expired
 */
export function verifyAccessToken(token: string): JwtPayload {
  const decoded = jwt.verify(token, config.jwt.secret, { algorithms: ['HS256'] });

  const parsed = jwtPayloadSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new jwt.JsonWebTokenError('Invalid token payload');
  }

  return parsed.data;
}
