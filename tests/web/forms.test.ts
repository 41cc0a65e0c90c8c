import { describe, test, expect } from '@jest/globals';
import { CommentForm, CreatePostForm, LoginForm, RegisterForm, parseForm, submittedValues } from '../../src/web/forms';

describe('forms', () => {
  test('should trim and accept a valid registration', () => {
    const result = parseForm(RegisterForm, { email: 'ada@test.com', password: 'test-password', name: '  ada  ' });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toEqual({ email: 'ada@test.com', password: 'test-password', name: 'ada' });
    }
  });

  test('should collect messages per field and never echo the password', () => {
    const result = parseForm(LoginForm, { email: 'not-an-email', password: '   ' });

    expect(result.success).toBe(false);
    expect(result.state).toEqual({
      values: { email: 'not-an-email' },
      errors: {
        email: ['Invalid email address.'],
        password: ['This field is required.'],
      },
    });
  });

  test('should require missing fields', () => {
    const result = parseForm(CommentForm, {});

    expect(result.success).toBe(false);
    expect(result.state.errors).toEqual({ comment_text: ['This field is required.'] });
  });

  test('should map the post form to post fields', () => {
    const result = parseForm(CreatePostForm, {
      title: 'Title',
      subtitle: 'Subtitle',
      img_url: 'https://example.com/image.png',
      body: '<p>Body</p>',
    });

    expect(result.success && result.data).toEqual({
      title: 'Title',
      subtitle: 'Subtitle',
      imgUrl: 'https://example.com/image.png',
      body: '<p>Body</p>',
    });
  });

  test('should reject an image that is not a URL', () => {
    const result = parseForm(CreatePostForm, { title: 'T', subtitle: 'S', img_url: 'picture', body: 'B' });

    expect(result.state.errors).toEqual({ img_url: ['Invalid URL.'] });
  });

  test('should keep only string values of a body', () => {
    expect(submittedValues({ title: 'T', tags: ['a'], password: 'test-password' })).toEqual({ title: 'T' });
    expect(submittedValues(undefined)).toEqual({});
  });
});
