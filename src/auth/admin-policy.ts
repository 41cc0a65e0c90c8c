import { BlogDatabase } from '../blog/blog-database';
import { UserRow } from '../blog/rows';

/**
 * Decides who may manage posts.
 *
 * The admin is a single sentinel identity: the configured `adminUserId`, or,
 * when none is configured, the first account ever registered (lowest id).
 */
export class AdminPolicy {
  constructor(
    private db: BlogDatabase,
    private adminUserId?: number
  ) {}

  async getAdminId(): Promise<number | null> {
    if (this.adminUserId !== undefined) {
      return this.adminUserId;
    }
    const first = await this.db.users.where({}).firstOrDefault();
    return first ? first.id : null;
  }

  async isAdmin(user: UserRow | null): Promise<boolean> {
    if (!user) {
      return false;
    }
    return user.id === await this.getAdminId();
  }
}
