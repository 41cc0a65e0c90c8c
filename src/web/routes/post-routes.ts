import { Request, Response, Router } from 'express';
import { PostDetail, formatPostDate } from '../../blog/post-service';
import { DuplicateTitleError, NotFoundError } from '../../errors';
import { AppContext } from '../context';
import { CommentForm, CreatePostForm, FormState, emptyForm, parseForm } from '../forms';
import { adminOnly } from '../guards';
import { asyncHandler, parseId } from '../handler';
import { pageContext } from '../render';
import { flash } from '../session';

/**
 * Post listing, post detail with comments, and post management
 */
export function postRoutes(ctx: AppContext): Router {
  const router = Router();

  const renderPost = (req: Request, res: Response, detail: PostDetail, form: FormState): string =>
    ctx.views.post(pageContext(req, res), detail, form, formatPostDate(new Date()));

  const loadDetail = async (id: number): Promise<PostDetail> => {
    const detail = await ctx.posts.getPostDetail(id);
    if (!detail) {
      throw new NotFoundError('Post', id);
    }
    return detail;
  };

  router.get('/', asyncHandler(async (req, res) => {
    const posts = await ctx.posts.listPosts();
    res.send(ctx.views.index(pageContext(req, res), posts));
  }));

  router.get('/post/:id', asyncHandler(async (req, res) => {
    const detail = await loadDetail(parseId(req.params.id, 'Post'));
    res.send(renderPost(req, res, detail, emptyForm()));
  }));

  router.post('/post/:id', asyncHandler(async (req, res) => {
    const id = parseId(req.params.id, 'Post');
    const form = parseForm(CommentForm, req.body);
    if (!form.success) {
      res.status(400).send(renderPost(req, res, await loadDetail(id), form.state));
      return;
    }

    const user = res.locals.currentUser;
    if (!user) {
      flash(req, 'You need to login or register to comment.');
      res.send(renderPost(req, res, await loadDetail(id), form.state));
      return;
    }

    await ctx.posts.addComment(id, user, form.data.comment_text);
    res.redirect(`/post/${id}`);
  }));

  router.get('/new-post', ...adminOnly(ctx.policy), (req, res) => {
    res.send(ctx.views.makePost(pageContext(req, res), emptyForm(), { action: '/new-post', isEdit: false }));
  });

  router.post('/new-post', ...adminOnly(ctx.policy), asyncHandler(async (req, res) => {
    const target = { action: '/new-post', isEdit: false };
    const form = parseForm(CreatePostForm, req.body);
    if (!form.success) {
      res.status(400).send(ctx.views.makePost(pageContext(req, res), form.state, target));
      return;
    }

    const author = res.locals.currentUser;
    if (!author) {
      res.redirect('/login');
      return;
    }

    try {
      await ctx.posts.createPost(author, form.data);
      res.redirect('/');
    } catch (error) {
      if (error instanceof DuplicateTitleError) {
        const state: FormState = { values: form.state.values, errors: { title: [error.message] } };
        res.status(error.status).send(ctx.views.makePost(pageContext(req, res), state, target));
        return;
      }
      throw error;
    }
  }));

  router.get('/edit-post/:id', ...adminOnly(ctx.policy), asyncHandler(async (req, res) => {
    const id = parseId(req.params.id, 'Post');
    const post = await ctx.posts.getPost(id);
    if (!post) {
      throw new NotFoundError('Post', id);
    }

    const form = emptyForm({
      title: post.title,
      subtitle: post.subtitle,
      img_url: post.imgUrl,
      body: post.body,
    });
    res.send(ctx.views.makePost(pageContext(req, res), form, { action: `/edit-post/${id}`, isEdit: true }));
  }));

  router.post('/edit-post/:id', ...adminOnly(ctx.policy), asyncHandler(async (req, res) => {
    const id = parseId(req.params.id, 'Post');
    const target = { action: `/edit-post/${id}`, isEdit: true };
    const form = parseForm(CreatePostForm, req.body);
    if (!form.success) {
      res.status(400).send(ctx.views.makePost(pageContext(req, res), form.state, target));
      return;
    }

    const editor = res.locals.currentUser;
    if (!editor) {
      res.redirect('/login');
      return;
    }

    try {
      await ctx.posts.updatePost(id, editor, form.data);
      res.redirect(`/post/${id}`);
    } catch (error) {
      if (error instanceof DuplicateTitleError) {
        const state: FormState = { values: form.state.values, errors: { title: [error.message] } };
        res.status(error.status).send(ctx.views.makePost(pageContext(req, res), state, target));
        return;
      }
      throw error;
    }
  }));

  router.get('/delete/:id', ...adminOnly(ctx.policy), asyncHandler(async (req, res) => {
    await ctx.posts.deletePost(parseId(req.params.id, 'Post'));
    res.redirect('/');
  }));

  return router;
}
