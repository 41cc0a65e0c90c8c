import { Router } from 'express';
import { DuplicateEmailError, InvalidPasswordError, UserNotFoundError } from '../../errors';
import { AppContext } from '../context';
import { LoginForm, RegisterForm, emptyForm, parseForm } from '../forms';
import { asyncHandler } from '../handler';
import { pageContext } from '../render';
import { bindSession, clearSession, flash } from '../session';

/**
 * Registration, login and logout
 */
export function authRoutes(ctx: AppContext): Router {
  const router = Router();

  router.get('/register', (req, res) => {
    res.send(ctx.views.register(pageContext(req, res), emptyForm()));
  });

  router.post('/register', asyncHandler(async (req, res) => {
    const form = parseForm(RegisterForm, req.body);
    if (!form.success) {
      res.status(400).send(ctx.views.register(pageContext(req, res), form.state));
      return;
    }

    try {
      const user = await ctx.auth.register(form.data);
      await bindSession(req, user);
      res.redirect('/');
    } catch (error) {
      if (error instanceof DuplicateEmailError) {
        flash(req, error.message);
        res.redirect('/login');
        return;
      }
      throw error;
    }
  }));

  router.get('/login', (req, res) => {
    res.send(ctx.views.login(pageContext(req, res), emptyForm()));
  });

  router.post('/login', asyncHandler(async (req, res) => {
    const form = parseForm(LoginForm, req.body);
    if (!form.success) {
      res.status(400).send(ctx.views.login(pageContext(req, res), form.state));
      return;
    }

    try {
      const user = await ctx.auth.login(form.data);
      await bindSession(req, user);
      res.redirect('/');
    } catch (error) {
      if (error instanceof UserNotFoundError || error instanceof InvalidPasswordError) {
        flash(req, error.message);
        res.send(ctx.views.login(pageContext(req, res), form.state));
        return;
      }
      throw error;
    }
  }));

  router.get('/logout', asyncHandler(async (req, res) => {
    await clearSession(req);
    res.redirect('/');
  }));

  return router;
}
