import { createHash } from 'crypto';

export interface GravatarOptions {
  size: number;
  rating: 'g' | 'pg' | 'r' | 'x';
  defaultImage: string;
  forceDefault: boolean;
  useSsl: boolean;
}

export const DEFAULT_GRAVATAR_OPTIONS: GravatarOptions = {
  size: 100,
  rating: 'g',
  defaultImage: 'retro',
  forceDefault: false,
  useSsl: false,
};

/**
 * Avatar URL for an email address
 */
export function gravatarUrl(email: string, options: GravatarOptions = DEFAULT_GRAVATAR_OPTIONS): string {
  const hash = createHash('md5').update(email.trim().toLowerCase()).digest('hex');
  const base = options.useSsl ? 'https://secure.gravatar.com/avatar/' : 'http://www.gravatar.com/avatar/';
  let url = `${base}${hash}?s=${options.size}&d=${encodeURIComponent(options.defaultImage)}&r=${options.rating}`;
  if (options.forceDefault) {
    url += '&f=y';
  }
  return url;
}
