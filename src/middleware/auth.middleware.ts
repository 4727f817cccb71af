import { Request, Response, NextFunction } from 'express';
import { authService, AuthService, JobTokenPayload } from '../services/auth/auth.service';

// Extend Express Request to include the token subject
declare global {
  namespace Express {
    interface Request {
      caller?: JobTokenPayload;
    }
  }
}

export function bearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const [scheme, token] = header.split(' ');
  if (scheme?.toLowerCase() !== 'bearer' || !token) return null;
  return token;
}

/**
 * JWT auth middleware.
 * Reads the Authorization: Bearer header, verifies the JWT, sets req.caller.
 * Returns 401 if missing or invalid.
 */
export function createAuthMiddleware(auth: AuthService = authService) {
  return function authMiddleware(req: Request, res: Response, next: NextFunction): void {
    const token = bearerToken(req.headers.authorization);

    if (!token) {
      res.status(401).json({ error: 'Not authenticated' });
      return;
    }

    try {
      req.caller = auth.verifyToken(token);
      next();
    } catch (error) {
      console.warn('⚠️  Rejected job token:', error instanceof Error ? error.message : error);
      res.status(401).json({ error: 'Invalid or expired token' });
    }
  };
}

export const authMiddleware = createAuthMiddleware();
