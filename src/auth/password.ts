import { pbkdf2, randomInt, timingSafeEqual } from 'crypto';
import { promisify } from 'util';
import { PasswordHashOptions } from '../config';

const pbkdf2Async = promisify(pbkdf2);

const SALT_CHARS = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

const DIGESTS = {
  sha256: 32,
  sha512: 64,
} as const;

type Digest = keyof typeof DIGESTS;

export const DEFAULT_PASSWORD_HASH_OPTIONS: PasswordHashOptions = {
  iterations: 600_000,
  saltLength: 8,
};

function isDigest(value: string): value is Digest {
  return Object.prototype.hasOwnProperty.call(DIGESTS, value);
}

/**
 * Random salt drawn from ASCII letters and digits
 */
export function generateSalt(length: number): string {
  let salt = '';
  for (let i = 0; i < length; i++) {
    salt += SALT_CHARS[randomInt(SALT_CHARS.length)];
  }
  return salt;
}

async function derive(password: string, salt: string, digest: Digest, iterations: number): Promise<Buffer> {
  return pbkdf2Async(password, salt, iterations, DIGESTS[digest], digest);
}

/**
 * Hash a password with PBKDF2-HMAC-SHA256 and a random salt.
 *
 * The result reads `pbkdf2:sha256:<iterations>$<salt>$<hex digest>` and holds
 * everything `checkPasswordHash` needs to verify a candidate later.
 */
export async function generatePasswordHash(
  password: string,
  options: PasswordHashOptions = DEFAULT_PASSWORD_HASH_OPTIONS
): Promise<string> {
  const salt = generateSalt(options.saltLength);
  const hash = await derive(password, salt, 'sha256', options.iterations);
  return `pbkdf2:sha256:${options.iterations}$${salt}$${hash.toString('hex')}`;
}

/**
 * Verify a password against a stored hash. Malformed hashes never verify.
 */
export async function checkPasswordHash(passwordHash: string, password: string): Promise<boolean> {
  const parts = passwordHash.split('$');
  if (parts.length !== 3) {
    return false;
  }
  const [method, salt, expectedHex] = parts;

  const [scheme, digest, iterationsText] = method.split(':');
  const iterations = Number(iterationsText);
  if (scheme !== 'pbkdf2' || !isDigest(digest) || !Number.isInteger(iterations) || iterations <= 0) {
    return false;
  }

  const expected = Buffer.from(expectedHex, 'hex');
  if (expected.length !== DIGESTS[digest]) {
    return false;
  }

  const actual = await derive(password, salt, digest, iterations);
  return timingSafeEqual(actual, expected);
}
