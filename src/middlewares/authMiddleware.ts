import type { Request, Response, NextFunction, RequestHandler } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { moduleLogger } from '../utils/logger';
import type { Privilege, PrivilegeChecker } from '../services/privilege.service';

const logger = moduleLogger('auth');

const claimsSchema = z.object({
  sub: z.string().min(1),
  role: z.string().min(1)
});

/**
 * Verifies the bearer token and attaches the caller as `req.actor`.
 * User records live in another subsystem; the token claims are trusted as-is.
 */
export const authenticateToken = (jwtSecret: string): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;
    const token = authHeader && authHeader.split(' ')[1]; // Bearer TOKEN

    if (!token) {
      res.status(401).json({ message: 'Access token required' });
      return;
    }

    try {
      const decoded = jwt.verify(token, jwtSecret, { algorithms: ['HS256'] });
      const claims = claimsSchema.safeParse(decoded);
      if (!claims.success) {
        res.status(401).json({ message: 'Invalid token' });
        return;
      }

      req.actor = { id: claims.data.sub, role: claims.data.role };
      logger.debug('Authentication successful', { actorId: claims.data.sub, role: claims.data.role });
      next();
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        res.status(401).json({ message: 'Token expired' });
      } else if (error instanceof jwt.JsonWebTokenError) {
        res.status(401).json({ message: 'Invalid token' });
      } else {
        next(error);
      }
    }
  };
};

// Privilege-based authorization middleware
export const requirePrivilege = (checker: PrivilegeChecker, privilege: Privilege): RequestHandler => {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    if (!req.actor) {
      res.status(401).json({ message: 'Authentication required' });
      return;
    }

    if (!(await checker.hasPrivilege(req.actor, privilege))) {
      logger.warn('Privilege check failed', { actorId: req.actor.id, role: req.actor.role, privilege });
      res.status(403).json({ message: 'Insufficient permissions', privilege });
      return;
    }

    next();
  };
};
