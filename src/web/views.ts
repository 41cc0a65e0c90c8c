import type { UserRow } from '../blog/rows';
import type { PostDetail, PostSummary } from '../blog/post-service';
import type { FormState } from './forms';
import { gravatarUrl } from './gravatar';

/**
 * Per-request values every page shows (navigation, flashed messages)
 */
export interface PageContext {
  currentUser: UserRow | null;
  isAdmin: boolean;
  flashes: string[];
}

/**
 * Renders the blog's pages to HTML
 */
export interface ViewRenderer {
  index(page: PageContext, posts: PostSummary[]): string;
  register(page: PageContext, form: FormState): string;
  login(page: PageContext, form: FormState): string;
  post(page: PageContext, detail: PostDetail, form: FormState, today: string): string;
  about(page: PageContext): string;
  contact(page: PageContext): string;
  makePost(page: PageContext, form: FormState, target: { action: string; isEdit: boolean }): string;
  error(page: PageContext, status: number, message: string): string;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char);
}

interface FieldSpec {
  name: string;
  label: string;
  type?: 'text' | 'email' | 'password' | 'url' | 'textarea';
}

/**
 * Plain HTML renderer. Post bodies are trusted HTML written by the admin and
 * are inserted unescaped; everything else is escaped.
 */
export class HtmlViewRenderer implements ViewRenderer {
  constructor(private siteName = 'Blog') {}

  index(page: PageContext, posts: PostSummary[]): string {
    const items = posts.map(({ post, authorName }) => {
      const adminLinks = page.isAdmin
        ? ` <a class="delete" href="/delete/${post.id}">✘</a>`
        : '';
      return `<div class="post-preview">
  <a href="/post/${post.id}"><h2 class="post-title">${escapeHtml(post.title)}</h2>
  <h3 class="post-subtitle">${escapeHtml(post.subtitle)}</h3></a>
  <p class="post-meta">Posted by ${escapeHtml(authorName)} on ${escapeHtml(post.date)}${adminLinks}</p>
</div>`;
    });
    const newPost = page.isAdmin ? '<a class="btn" href="/new-post">Create New Post</a>' : '';
    return this.layout(page, this.siteName, `${items.join('\n<hr>\n')}\n${newPost}`);
  }

  register(page: PageContext, form: FormState): string {
    return this.layout(page, 'Register', this.form('/register', form, [
      { name: 'email', label: 'Email', type: 'email' },
      { name: 'password', label: 'Password', type: 'password' },
      { name: 'name', label: 'Name' },
    ], 'Sign Me Up!'));
  }

  login(page: PageContext, form: FormState): string {
    return this.layout(page, 'Log In', this.form('/login', form, [
      { name: 'email', label: 'Email', type: 'email' },
      { name: 'password', label: 'Password', type: 'password' },
    ], "Let Me In!"));
  }

  post(page: PageContext, detail: PostDetail, form: FormState, today: string): string {
    const { post, author, comments } = detail;
    const editLink = page.isAdmin ? `<a class="btn" href="/edit-post/${post.id}">Edit Post</a>` : '';
    const commentItems = comments.map(({ comment, author: commentAuthor }) => `<li>
  <img class="avatar" src="${escapeHtml(gravatarUrl(commentAuthor.email))}" alt="">
  <div class="comment-text">${escapeHtml(comment.text)}</div>
  <span class="comment-author">${escapeHtml(commentAuthor.name)}</span>
</li>`);

    const body = `<header style="background-image: url('${escapeHtml(post.imgUrl)}')">
  <h1>${escapeHtml(post.title)}</h1>
  <h2 class="subheading">${escapeHtml(post.subtitle)}</h2>
  <span class="meta">Posted by ${escapeHtml(author.name)} on ${escapeHtml(post.date)}</span>
</header>
<article>${post.body}</article>
${editLink}
${this.form(`/post/${post.id}`, form, [{ name: 'comment_text', label: 'Comment', type: 'textarea' }], 'Submit Comment')}
<ul class="comments">
${commentItems.join('\n')}
</ul>
<footer><p class="copyright">${escapeHtml(today)}</p></footer>`;
    return this.layout(page, post.title, body);
  }

  about(page: PageContext): string {
    return this.layout(page, 'About Me', '<p>This blog is written by its first registered author.</p>');
  }

  contact(page: PageContext): string {
    return this.layout(page, 'Contact Me', '<p>Have questions? Leave a comment under any post.</p>');
  }

  makePost(page: PageContext, form: FormState, target: { action: string; isEdit: boolean }): string {
    return this.layout(page, target.isEdit ? 'Edit Post' : 'New Post', this.form(target.action, form, [
      { name: 'title', label: 'Blog Post Title' },
      { name: 'subtitle', label: 'Subtitle' },
      { name: 'img_url', label: 'Blog Image URL', type: 'url' },
      { name: 'body', label: 'Blog Content', type: 'textarea' },
    ], 'Submit Post'));
  }

  error(page: PageContext, status: number, message: string): string {
    return this.layout(page, `${status}`, `<p class="error">${escapeHtml(message)}</p>`);
  }

  private form(action: string, form: FormState, fields: FieldSpec[], submit: string): string {
    const generalErrors = (form.errors._form ?? []).map(message => `<p class="error">${escapeHtml(message)}</p>`);
    const controls = fields.map(field => {
      const value = form.values[field.name] ?? '';
      const input = field.type === 'textarea'
        ? `<textarea id="${field.name}" name="${field.name}">${escapeHtml(value)}</textarea>`
        : `<input id="${field.name}" name="${field.name}" type="${field.type ?? 'text'}" value="${escapeHtml(value)}">`;
      const errors = (form.errors[field.name] ?? [])
        .map(message => `<span class="field-error">${escapeHtml(message)}</span>`)
        .join('');
      return `<div class="field"><label for="${field.name}">${field.label}</label>${input}${errors}</div>`;
    });
    return `<form method="post" action="${escapeHtml(action)}">
${[...generalErrors, ...controls].join('\n')}
<button type="submit">${escapeHtml(submit)}</button>
</form>`;
  }

  private layout(page: PageContext, title: string, content: string): string {
    const nav = page.currentUser
      ? '<a href="/">Home</a> <a href="/about">About</a> <a href="/contact">Contact</a> <a href="/logout">Log Out</a>'
      : '<a href="/">Home</a> <a href="/login">Login</a> <a href="/register">Register</a> <a href="/about">About</a> <a href="/contact">Contact</a>';
    const flashes = page.flashes.map(message => `<p class="flash">${escapeHtml(message)}</p>`).join('\n');
    return `<!DOCTYPE html>
<html lang="en">
<head><meta charset="utf-8"><title>${escapeHtml(title)}</title></head>
<body>
<nav>${nav}</nav>
${flashes}
<main>
${content}
</main>
</body>
</html>`;
  }
}
