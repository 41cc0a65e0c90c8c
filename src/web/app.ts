import express, { ErrorRequestHandler, Express } from 'express';
import session from 'express-session';
import { NotFoundError, isBlogError } from '../errors';
import { AppContext } from './context';
import { loadCurrentUser } from './guards';
import { pageContext } from './render';
import { authRoutes } from './routes/auth-routes';
import { pageRoutes } from './routes/page-routes';
import { postRoutes } from './routes/post-routes';

export interface CreateAppOptions {
  /** Session store; defaults to express-session's in-memory store, which suits tests only */
  sessionStore?: session.Store;
}

/**
 * Render BlogErrors with their status, anything else as a logged 500
 */
export function errorHandler(ctx: AppContext): ErrorRequestHandler {
  return (error: unknown, req, res, _next) => {
    if (isBlogError(error)) {
      res.status(error.status).send(ctx.views.error(pageContext(req, res), error.status, error.message));
      return;
    }
    console.error(`Unhandled error on ${req.method} ${req.originalUrl}:`, error);
    res.status(500).send(ctx.views.error(pageContext(req, res), 500, 'Something went wrong.'));
  };
}

/**
 * Build the Express application around an application context
 */
export function createApp(ctx: AppContext, options: CreateAppOptions = {}): Express {
  const app = express();
  app.disable('x-powered-by');

  app.use(express.urlencoded({ extended: false }));
  app.use(session({
    secret: ctx.config.secretKey,
    store: options.sessionStore,
    resave: false,
    saveUninitialized: false,
    cookie: { httpOnly: true, sameSite: 'lax', maxAge: ctx.config.sessionMaxAgeMs },
  }));
  app.use(loadCurrentUser(ctx.auth, ctx.policy));

  app.use(postRoutes(ctx));
  app.use(authRoutes(ctx));
  app.use(pageRoutes(ctx));

  app.use((_req, _res, next) => next(new NotFoundError('Page')));
  app.use(errorHandler(ctx));

  return app;
}
