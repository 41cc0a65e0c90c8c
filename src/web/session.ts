import type { Request } from 'express';
import type { UserRow } from '../blog/rows';

declare module 'express-session' {
  interface SessionData {
    /** Id of the authenticated user */
    userId: number;
    /** Messages shown once on the next rendered page */
    flash: string[];
  }
}

declare global {
  namespace Express {
    interface Locals {
      currentUser: UserRow | null;
      isAdmin: boolean;
    }
  }
}

/**
 * Queue a message for the next rendered page
 */
export function flash(req: Request, message: string): void {
  req.session.flash = [...(req.session.flash ?? []), message];
}

/**
 * Take (and clear) all queued messages
 */
export function consumeFlashes(req: Request): string[] {
  const messages = req.session.flash ?? [];
  if (messages.length > 0) {
    delete req.session.flash;
  }
  return messages;
}

/**
 * Bind the session to a user. The session id is regenerated first.
 */
export function bindSession(req: Request, user: UserRow): Promise<void> {
  return new Promise((resolve, reject) => {
    req.session.regenerate(error => {
      if (error) {
        reject(error);
        return;
      }
      req.session.userId = user.id;
      req.session.save(saveError => (saveError ? reject(saveError) : resolve()));
    });
  });
}

/**
 * Drop the session's user binding, whether or not there was one
 */
export function clearSession(req: Request): Promise<void> {
  return new Promise((resolve, reject) => {
    req.session.destroy(error => (error ? reject(error) : resolve()));
  });
}
