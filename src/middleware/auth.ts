import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { AppDatabase } from '../db/index.js';
import { AuthenticationRequiredError } from '../errors.js';
import { findUserByToken } from '../services/userService.js';
import type { User } from '../types.js';

declare global {
  namespace Express {
    interface Request {
      user?: User;
    }
  }
}

const KEYWORDS = ['token', 'bearer'];

/**
 * Resolve `Authorization: Token <key>` (or `Bearer <key>`) to an active user.
 * Every route mounted after this requires authentication.
 */
export function authenticate(db: AppDatabase): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    const header = req.get('authorization');
    if (!header) {
      return next(new AuthenticationRequiredError());
    }

    const parts = header.trim().split(/\s+/);
    if (!KEYWORDS.includes(parts[0].toLowerCase())) {
      return next(new AuthenticationRequiredError());
    }
    if (parts.length !== 2) {
      return next(new AuthenticationRequiredError('Invalid token header.'));
    }

    findUserByToken(db, parts[1])
      .then(user => {
        if (!user) {
          return next(new AuthenticationRequiredError('Invalid token.'));
        }
        if (!user.isActive) {
          return next(new AuthenticationRequiredError('User inactive or deleted.'));
        }

        req.user = user;
        next();
      })
      .catch(next);
  };
}

/**
 * The authenticated user. Only valid behind `authenticate`.
 */
export function currentUser(req: Request): User {
  if (!req.user) {
    throw new AuthenticationRequiredError();
  }
  return req.user;
}
