import { z } from 'zod';
import { FieldErrors } from '../errors';

const REQUIRED = 'This field is required.';

const requiredText = z.string({ required_error: REQUIRED, invalid_type_error: REQUIRED }).trim().min(1, REQUIRED);

export const RegisterForm = z.object({
  email: requiredText.pipe(z.string().email('Invalid email address.')),
  password: requiredText,
  name: requiredText,
});

export const LoginForm = z.object({
  email: requiredText.pipe(z.string().email('Invalid email address.')),
  password: requiredText,
});

export const CreatePostForm = z
  .object({
    title: requiredText,
    subtitle: requiredText,
    img_url: requiredText.pipe(z.string().url('Invalid URL.')),
    body: requiredText,
  })
  .transform(form => ({
    title: form.title,
    subtitle: form.subtitle,
    imgUrl: form.img_url,
    body: form.body,
  }));

export const CommentForm = z.object({
  comment_text: requiredText,
});

/**
 * Submitted values echoed back into a re-rendered form, plus field messages
 */
export interface FormState {
  values: Record<string, string>;
  errors: FieldErrors;
}

export type FormResult<T> =
  | { success: true; data: T; state: FormState }
  | { success: false; state: FormState };

/** Fields never echoed back into a form */
const SECRET_FIELDS = new Set(['password']);

export function emptyForm(values: Record<string, string> = {}): FormState {
  return { values, errors: {} };
}

/**
 * String values of a submitted body, for re-rendering
 */
export function submittedValues(body: unknown): Record<string, string> {
  const values: Record<string, string> = {};
  if (typeof body !== 'object' || body === null) {
    return values;
  }
  for (const [key, value] of Object.entries(body)) {
    if (typeof value === 'string' && !SECRET_FIELDS.has(key)) {
      values[key] = value;
    }
  }
  return values;
}

/**
 * Validate a form-encoded body against a form schema
 */
export function parseForm<TSchema extends z.ZodTypeAny>(schema: TSchema, body: unknown): FormResult<z.output<TSchema>> {
  const values = submittedValues(body);
  const result = schema.safeParse(body ?? {});
  if (result.success) {
    return { success: true, data: result.data, state: emptyForm(values) };
  }

  const errors: FieldErrors = {};
  for (const issue of result.error.issues) {
    const field = issue.path.length > 0 ? String(issue.path[0]) : '_form';
    (errors[field] ??= []).push(issue.message);
  }
  return { success: false, state: { values, errors } };
}
