import { Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { appConfig } from '../connections/config/app.config';
import { Database } from '../connections/db/store';
import { UserRole } from '../constants';
import { Actor, AuthRequest } from '../types/request.types';
import { AppError, AuthenticationError, PermissionDeniedError } from '../utils/errors';
import { ResponseHandler } from '../utils/response';

const tokenPayloadSchema = z.object({
  userId: z.coerce.number().int().positive(),
});

const resolveActorFromToken = async (db: Database, token: string): Promise<Actor> => {
  const payload = tokenPayloadSchema.safeParse(jwt.verify(token, appConfig.jwtSecret));
  if (!payload.success) {
    throw new AuthenticationError('Invalid token payload');
  }

  const identity = await db.store.users.findIdentity(payload.data.userId);
  if (!identity) {
    throw new AuthenticationError('User does not exist');
  }

  if (!identity.is_active) {
    throw new AuthenticationError('Account is disabled');
  }

  if (identity.role === 'manager') {
    return { userId: identity.id, username: identity.username, role: 'manager' };
  }

  if (identity.driver_id === null) {
    throw new PermissionDeniedError('No driver profile is linked to this account');
  }

  return { userId: identity.id, username: identity.username, role: 'driver', driverId: identity.driver_id };
};

/**
 * Resolve the bearer token into the caller's identity once per request
 */
export const createAuthenticate = (db: Database) => {
  return async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const token = req.headers.authorization?.split(' ')[1];

      if (!token) {
        return ResponseHandler.unauthorized(res, 'Token not provided');
      }

      req.actor = await resolveActorFromToken(db, token);

      next();
    } catch (error) {
      if (error instanceof AppError) {
        return ResponseHandler.error(res, error.message, error.statusCode, { code: error.code });
      }
      if (error instanceof jwt.TokenExpiredError) {
        return ResponseHandler.unauthorized(res, 'Token has expired');
      }
      if (error instanceof jwt.JsonWebTokenError) {
        return ResponseHandler.unauthorized(res, 'Invalid token');
      }
      next(error);
    }
  };
};

export const requireRole = (...roles: UserRole[]) => {
  return (req: AuthRequest, res: Response, next: NextFunction) => {
    if (!req.actor) {
      return ResponseHandler.unauthorized(res, 'Not authenticated');
    }

    if (!roles.includes(req.actor.role)) {
      return ResponseHandler.forbidden(res, 'You do not have access to this resource');
    }

    next();
  };
};

/**
 * The authenticated caller; handlers behind `authenticate` always have one
 */
export const requireActor = (req: AuthRequest): Actor => {
  if (!req.actor) {
    throw new AuthenticationError('Not authenticated');
  }
  return req.actor;
};
