import type { Request, Response } from 'express';
import { PageContext } from './views';
import { consumeFlashes } from './session';

/**
 * Page context for the current request. Consumes queued flash messages.
 */
export function pageContext(req: Request, res: Response): PageContext {
  return {
    currentUser: res.locals.currentUser ?? null,
    isAdmin: res.locals.isAdmin ?? false,
    flashes: req.session ? consumeFlashes(req) : [],
  };
}
