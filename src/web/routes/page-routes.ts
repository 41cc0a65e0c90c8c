import { Router } from 'express';
import { AppContext } from '../context';
import { pageContext } from '../render';

export function pageRoutes(ctx: AppContext): Router {
  const router = Router();

  router.get('/about', (req, res) => {
    res.send(ctx.views.about(pageContext(req, res)));
  });

  router.get('/contact', (req, res) => {
    res.send(ctx.views.contact(pageContext(req, res)));
  });

  return router;
}
