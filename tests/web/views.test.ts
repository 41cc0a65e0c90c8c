import { describe, test, expect } from '@jest/globals';
import { createHash } from 'crypto';
import { DEFAULT_GRAVATAR_OPTIONS, gravatarUrl } from '../../src/web/gravatar';
import { HtmlViewRenderer, escapeHtml } from '../../src/web/views';
import { emptyForm } from '../../src/web/forms';

const md5 = (value: string) => createHash('md5').update(value).digest('hex');

describe('gravatarUrl', () => {
  test('should build the avatar URL from the normalised email', () => {
    const expected = `http://www.gravatar.com/avatar/${md5('reader@test.com')}?s=100&d=retro&r=g`;

    expect(gravatarUrl('reader@test.com')).toBe(expected);
    expect(gravatarUrl('  Reader@Test.com ')).toBe(expected);
  });

  test('should honour the secure host and forced default', () => {
    const url = gravatarUrl('reader@test.com', { ...DEFAULT_GRAVATAR_OPTIONS, useSsl: true, forceDefault: true });

    expect(url).toBe(`https://secure.gravatar.com/avatar/${md5('reader@test.com')}?s=100&d=retro&r=g&f=y`);
  });
});

describe('HtmlViewRenderer', () => {
  const anonymous = { currentUser: null, isAdmin: false, flashes: [] };

  test('should escape markup', () => {
    expect(escapeHtml(`<a href="x">Tom & 'Jerry'</a>`))
      .toBe('&lt;a href=&quot;x&quot;&gt;Tom &amp; &#39;Jerry&#39;&lt;/a&gt;');
  });

  test('should show flashed messages and field errors', () => {
    const html = new HtmlViewRenderer().login(
      { ...anonymous, flashes: ['No user found! Please try again.'] },
      { values: { email: 'a@b' }, errors: { email: ['Invalid email address.'] } }
    );

    expect(html).toContain('<p class="flash">No user found! Please try again.</p>');
    expect(html).toContain('<input id="email" name="email" type="email" value="a@b"><span class="field-error">Invalid email address.</span>');
  });

  test('should only offer post management to the admin', () => {
    const renderer = new HtmlViewRenderer();
    const posts = [{
      post: {
        id: 1,
        authorId: 1,
        title: 'First Post',
        subtitle: 'Where it all starts',
        date: 'January 15, 2024',
        body: '<p>Hello there.</p>',
        imgUrl: 'https://example.com/first.jpg',
      },
      authorName: 'Ada Admin',
    }];

    const visitor = renderer.index(anonymous, posts);
    const admin = renderer.index({ ...anonymous, isAdmin: true }, posts);

    expect(visitor).toContain('Posted by Ada Admin on January 15, 2024</p>');
    expect(visitor).not.toContain('href="/new-post"');
    expect(admin).toContain('<a class="delete" href="/delete/1">✘</a>');
    expect(admin).toContain('<a class="btn" href="/new-post">Create New Post</a>');
  });

  test('should label the post form for editing', () => {
    const html = new HtmlViewRenderer().makePost(anonymous, emptyForm({ title: 'First Post' }), { action: '/edit-post/1', isEdit: true });

    expect(html).toContain('<title>Edit Post</title>');
    expect(html).toContain('<form method="post" action="/edit-post/1">');
    expect(html).toContain('<input id="title" name="title" type="text" value="First Post">');
  });
});
