import type { RequestHandler } from 'express';
import { AdminPolicy } from '../auth/admin-policy';
import { Authenticator } from '../auth/authenticator';
import { ForbiddenError } from '../errors';
import { asyncHandler } from './handler';
import { flash } from './session';

/**
 * Resolve the session's user (or anonymous) for every request
 */
export function loadCurrentUser(auth: Authenticator, policy: AdminPolicy): RequestHandler {
  return asyncHandler(async (req, res, next) => {
    const user = await auth.resolveCurrentUser(req.session.userId);
    res.locals.currentUser = user;
    res.locals.isAdmin = await policy.isAdmin(user);
    next();
  });
}

/**
 * Anonymous requests are sent to the login page
 */
export function requireLogin(): RequestHandler {
  return (req, res, next) => {
    if (!res.locals.currentUser) {
      flash(req, 'Please log in to access this page.');
      res.redirect('/login');
      return;
    }
    next();
  };
}

/**
 * Authenticated users other than the admin get a 403.
 * Must run after `requireLogin`.
 */
export function requireAdmin(policy: AdminPolicy): RequestHandler {
  return asyncHandler(async (_req, res, next) => {
    if (!(await policy.isAdmin(res.locals.currentUser))) {
      throw new ForbiddenError();
    }
    next();
  });
}

/**
 * Guard chain for post management routes: authentication first, then the admin check
 */
export function adminOnly(policy: AdminPolicy): RequestHandler[] {
  return [requireLogin(), requireAdmin(policy)];
}
