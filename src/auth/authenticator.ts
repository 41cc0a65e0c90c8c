import { BlogDatabase } from '../blog/blog-database';
import { UserRow } from '../blog/rows';
import { PasswordHashOptions } from '../config';
import { DuplicateEmailError, InvalidPasswordError, UniqueViolationError, UserNotFoundError } from '../errors';
import { DEFAULT_PASSWORD_HASH_OPTIONS, checkPasswordHash, generatePasswordHash } from './password';

export interface RegistrationInput {
  email: string;
  password: string;
  name: string;
}

export interface Credentials {
  email: string;
  password: string;
}

/**
 * Capitalise the first letter of every word and lower-case the rest
 */
export function toTitleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, boundary: string, letter: string) => boundary + letter.toUpperCase());
}

/**
 * Registration, credential checks and session identity resolution
 */
export class Authenticator {
  constructor(
    private db: BlogDatabase,
    private hashOptions: PasswordHashOptions = DEFAULT_PASSWORD_HASH_OPTIONS
  ) {}

  /**
   * Create a user account. The stored name is title-cased.
   * @throws DuplicateEmailError when the email is already registered
   */
  async register(input: RegistrationInput): Promise<UserRow> {
    const password = await generatePasswordHash(input.password, this.hashOptions);

    return this.db.transaction(async (ctx) => {
      const existing = await ctx.users.where({ email: input.email }).firstOrDefault();
      if (existing) {
        throw new DuplicateEmailError(input.email);
      }

      try {
        return await ctx.users.insert({
          email: input.email,
          password,
          name: toTitleCase(input.name),
        });
      } catch (error) {
        if (error instanceof UniqueViolationError) {
          throw new DuplicateEmailError(input.email, { cause: error });
        }
        throw error;
      }
    });
  }

  /**
   * Check credentials and return the matching user
   * @throws UserNotFoundError when no user has the email
   * @throws InvalidPasswordError when the password does not match
   */
  async login(credentials: Credentials): Promise<UserRow> {
    const user = await this.db.users.where({ email: credentials.email }).firstOrDefault();
    if (!user) {
      throw new UserNotFoundError();
    }

    const valid = await checkPasswordHash(user.password, credentials.password);
    if (!valid) {
      throw new InvalidPasswordError();
    }
    return user;
  }

  /**
   * Load the user bound to a session. Anything that does not resolve to an
   * existing user means the request is anonymous.
   */
  async resolveCurrentUser(sessionUserId: unknown): Promise<UserRow | null> {
    if (typeof sessionUserId !== 'number' || !Number.isInteger(sessionUserId)) {
      return null;
    }
    return this.db.users.findById(sessionUserId);
  }
}
