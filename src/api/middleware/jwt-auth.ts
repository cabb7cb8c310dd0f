/**
 * JWT Authentication Middleware
 *
 * Validates Bearer tokens for the guard endpoints.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import jwt from 'jsonwebtoken';
import { logger } from '../../utils/logger.js';
import { ConfigurationError } from '../../utils/errors.js';

export interface AuthOptions {
  secret?: string;
  issuer: string;
  expiresIn?: string;
}

export interface AuthenticatedUser {
  sub: string;
  iss?: string;
  iat?: number;
  exp?: number;
}

export interface AuthenticatedRequest extends Request {
  user?: AuthenticatedUser;
}

/**
 * JWT Authentication middleware
 * Requires valid Bearer token in Authorization header
 */
export function createJwtAuth(auth: AuthOptions): RequestHandler {
  return function jwtAuth(req: AuthenticatedRequest, res: Response, next: NextFunction): void {
    // Check if JWT is configured
    if (!auth.secret) {
      logger.error('JWT_SECRET not configured - API authentication disabled');
      res.status(500).json({
        error: 'API authentication not configured',
        code: 'AUTH_NOT_CONFIGURED',
      });
      return;
    }

    // Extract token from Authorization header
    const authHeader = req.headers.authorization;
    if (!authHeader?.startsWith('Bearer ')) {
      res.status(401).json({
        error: 'Missing or invalid Authorization header',
        code: 'AUTH_MISSING',
        hint: 'Use: Authorization: Bearer <token>',
      });
      return;
    }

    const token = authHeader.slice(7); // Remove 'Bearer ' prefix

    try {
      const decoded = jwt.verify(token, auth.secret, { issuer: auth.issuer });

      if (typeof decoded === 'string' || typeof decoded.sub !== 'string') {
        res.status(401).json({
          error: 'Invalid token',
          code: 'AUTH_INVALID',
          message: 'Token has no subject',
        });
        return;
      }

      req.user = { sub: decoded.sub, iss: decoded.iss, iat: decoded.iat, exp: decoded.exp };

      logger.debug({ sub: decoded.sub }, 'JWT authentication successful');
      next();
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        res.status(401).json({
          error: 'Token expired',
          code: 'AUTH_EXPIRED',
          expiredAt: error.expiredAt,
        });
        return;
      }

      if (error instanceof jwt.JsonWebTokenError) {
        res.status(401).json({
          error: 'Invalid token',
          code: 'AUTH_INVALID',
          message: error.message,
        });
        return;
      }

      logger.error({ err: error }, 'JWT verification failed');
      res.status(500).json({
        error: 'Authentication failed',
        code: 'AUTH_ERROR',
      });
    }
  };
}

/**
 * Generate a new JWT token for a guard API client
 */
export function generateToken(auth: AuthOptions, subject: string, expiresIn?: string): string {
  if (!auth.secret) {
    throw new ConfigurationError('JWT_SECRET not configured');
  }

  return jwt.sign({ sub: subject }, auth.secret, {
    issuer: auth.issuer,
    expiresIn: (expiresIn || auth.expiresIn || '30d') as jwt.SignOptions['expiresIn'],
  });
}
