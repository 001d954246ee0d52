import { NextFunction, Request, RequestHandler, Response } from 'express';
import { UnauthorizedError } from '../lib/errors';
import { WasteRepository } from '../repositories/types';
import { Actor } from '../types';
import { TokenService } from '../utils/jwt';

declare global {
  namespace Express {
    interface Request {
      actor?: Actor;
    }
  }
}

export interface AuthMiddleware {
  requireAuth: RequestHandler;
  optionalAuth: RequestHandler;
}

const bearerToken = (req: Request): string | null => {
  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    return null;
  }
  return authHeader.substring(7);
};

/**
 * Resolves the bearer token to an actor loaded from the users table, so
 * role and commune always reflect the stored user.
 */
export const createAuthMiddleware = (tokens: TokenService, repo: WasteRepository): AuthMiddleware => {
  const resolveActor = async (token: string): Promise<Actor | null> => {
    const payload = tokens.verifyAccessToken(token);
    if (!payload) return null;

    const user = await repo.findUser(payload.sub);
    if (!user) return null;
    return { id: user.id, role: user.role, commune: user.commune };
  };

  const requireAuth = async (req: Request, _res: Response, next: NextFunction) => {
    const token = bearerToken(req);
    if (!token) {
      return next(new UnauthorizedError('Missing or invalid authorization header'));
    }

    try {
      const actor = await resolveActor(token);
      if (!actor) {
        return next(new UnauthorizedError('Invalid or expired token'));
      }
      req.actor = actor;
      next();
    } catch (error) {
      next(error);
    }
  };

  const optionalAuth = async (req: Request, _res: Response, next: NextFunction) => {
    const token = bearerToken(req);
    if (!token) {
      return next();
    }

    try {
      const actor = await resolveActor(token);
      if (actor) {
        req.actor = actor;
      }
      next();
    } catch (error) {
      next(error);
    }
  };

  return { requireAuth, optionalAuth };
};

/**
 * The authenticated actor. Only valid behind `requireAuth`.
 */
export const currentActor = (req: Request): Actor => {
  if (!req.actor) {
    throw new UnauthorizedError();
  }
  return req.actor;
};
