// 🔐 Role permission gate for routes that are closed to some roles outright.
// Per-report checks (ownership, commune, assignment) stay in the lifecycle.

import { NextFunction, Request, Response } from 'express';
import { PermissionDeniedError, UnauthorizedError } from '../lib/errors';
import { getRoleLabel, hasPermission, PermissionKey } from '../lib/permissions';

export const requirePermission = (permission: PermissionKey) => {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (!req.actor) {
      return next(new UnauthorizedError());
    }

    if (!hasPermission(req.actor.role, permission)) {
      return next(
        new PermissionDeniedError(`${getRoleLabel(req.actor.role)} role lacks permission ${permission}`)
      );
    }

    next();
  };
};
