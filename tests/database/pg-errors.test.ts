import { describe, test, expect } from '@jest/globals';
import { isUniqueViolation, violatedConstraint } from '../../src/database/pg-errors';

function driverError(message: string, fields: Record<string, string>): Error {
  return Object.assign(new Error(message), fields);
}

describe('isUniqueViolation', () => {
  test('should recognise SQLSTATE 23505', () => {
    expect(isUniqueViolation(driverError('boom', { code: '23505' }))).toBe(true);
  });

  test('should recognise the server message when no code is present', () => {
    const error = new Error('duplicate key value violates unique constraint "users_email_key"');
    expect(isUniqueViolation(error)).toBe(true);
  });

  test('should reject other errors and non-errors', () => {
    expect(isUniqueViolation(driverError('fk', { code: '23503' }))).toBe(false);
    expect(isUniqueViolation('23505')).toBe(false);
    expect(isUniqueViolation(null)).toBe(false);
  });
});

describe('violatedConstraint', () => {
  test('should prefer the constraint field', () => {
    expect(violatedConstraint(driverError('x', { constraint: 'blog_posts_title_key' }))).toBe('blog_posts_title_key');
  });

  test('should fall back to the constraint named in the message', () => {
    const error = new Error('duplicate key value violates unique constraint "users_email_key"');
    expect(violatedConstraint(error)).toBe('users_email_key');
  });

  test('should return undefined when unknown', () => {
    expect(violatedConstraint(new Error('something else'))).toBeUndefined();
  });
});
