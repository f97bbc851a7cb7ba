/**
 * Authentication Middleware
 *
 * JWT bearer authentication for the voice and tools APIs. Tokens are issued
 * by whatever hosts the voice client; this server only verifies them.
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { logger } from '../services/logger';

const JWTPayload = z.object({
  sub: z.string().optional(),
  userId: z.string().optional(),
  role: z.enum(['admin', 'user']).default('user'),
});

export interface AuthenticatedUser {
  userId: string;
  role: 'admin' | 'user';
}

export interface AuthenticatedRequest extends Request {
  user?: AuthenticatedUser;
}

export class AuthError extends Error {
  constructor(message: string, public readonly code: 'TOKEN_MISSING' | 'TOKEN_EXPIRED' | 'TOKEN_INVALID') {
    super(message);
    this.name = 'AuthError';
  }
}

/**
 * Verify a token and return the user it identifies
 */
export function verifyToken(token: string, secret: string): AuthenticatedUser {
  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, secret);
  } catch (error) {
    if (error instanceof jwt.TokenExpiredError) {
      throw new AuthError('Token expired', 'TOKEN_EXPIRED');
    }
    throw new AuthError('Invalid token', 'TOKEN_INVALID');
  }

  const payload = JWTPayload.safeParse(decoded);
  const userId = payload.success ? payload.data.userId ?? payload.data.sub : undefined;
  if (!payload.success || !userId) {
    throw new AuthError('Invalid token', 'TOKEN_INVALID');
  }
  return { userId, role: payload.data.role };
}

export function bearerToken(header: string | undefined): string | null {
  if (!header || !header.startsWith('Bearer ')) return null;
  return header.substring(7);
}

/**
 * Require valid JWT token
 */
export function requireAuth(secret: string): RequestHandler {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    const token = bearerToken(req.headers.authorization);
    if (!token) {
      res.status(401).json({ error: 'Authentication required' });
      return;
    }

    try {
      req.user = verifyToken(token, secret);
      next();
    } catch (error) {
      if (error instanceof AuthError) {
        res.status(401).json({
          error: error.message,
          ...(error.code === 'TOKEN_EXPIRED' ? { code: error.code } : {}),
        });
        return;
      }
      logger.error('Auth middleware error', { error });
      res.status(500).json({ error: 'Authentication failed' });
    }
  };
}
