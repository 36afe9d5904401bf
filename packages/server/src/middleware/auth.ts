/**
 * Authentication Middleware for Fastify
 *
 * Identifies the learner from the access_token cookie or a Bearer token.
 * - requirePageUser: renders the 401 page when no valid token is present
 * - requireApiUser: returns a JSON 401 when no valid token is present
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import { verifyAccessToken } from '../services/jwt.js';
import { config } from '../config.js';
import { renderErrorPage } from '../views/errorPage.js';

// Extend FastifyRequest to include user property
declare module 'fastify' {
  interface FastifyRequest {
    user?: {
      id: number;
    };
  }
}

/**
 * Extract Bearer token from Authorization header
 * @returns Token string or null if not present/invalid format
 */
function extractBearerToken(request: FastifyRequest): string | null {
  const authHeader = request.headers.authorization;
  if (!authHeader) return null;

  const parts = authHeader.split(' ');
  if (parts.length !== 2 || parts[0].toLowerCase() !== 'bearer') {
    return null;
  }

  return parts[1];
}

function extractToken(request: FastifyRequest): string | null {
  return request.cookies[config.jwt.cookieName] || extractBearerToken(request);
}

/**
 * Verify the request's token and attach the user. Returns false when the
 * token is missing or invalid.
 */
function attachUser(request: FastifyRequest): boolean {
  const token = extractToken(request);
  if (!token) return false;

  try {
    const payload = verifyAccessToken(token);
    request.user = { id: payload.userId };
    return true;
  } catch (error) {
    request.log.debug({ err: error }, 'Rejected access token');
    return false;
  }
}

// Async hooks must return the reply after sending, or the handler still runs
export async function requirePageUser(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<FastifyReply | undefined> {
  if (!attachUser(request)) {
    return reply.status(401).type('text/html; charset=utf-8').send(renderErrorPage(401));
  }
  return undefined;
}

export async function requireApiUser(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<FastifyReply | undefined> {
  if (!attachUser(request)) {
    return reply.status(401).send({ error: 'Unauthorized' });
  }
  return undefined;
}

/**
 * The authenticated user's ID. Only valid behind one of the hooks above.
 */
export function currentUserId(request: FastifyRequest): number {
  if (!request.user) {
    throw new Error('currentUserId called on an unauthenticated request');
  }
  return request.user.id;
}
