import { DbColumn, DbEntity } from '../../entity';
import type { Comment } from './comment';
import type { Post } from './post';

export class User extends DbEntity {
  id!: DbColumn<number>;
  email!: DbColumn<string>;
  /** Salted PBKDF2 hash, never the plain password */
  password!: DbColumn<string>;
  name!: DbColumn<string>;

  // Navigation properties
  posts?: Post[];
  comments?: Comment[];
}
