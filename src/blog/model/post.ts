import { DbColumn, DbEntity } from '../../entity';
import type { Comment } from './comment';
import type { User } from './user';

export class Post extends DbEntity {
  id!: DbColumn<number>;
  authorId!: DbColumn<number>;
  title!: DbColumn<string>;
  subtitle!: DbColumn<string>;
  /** Creation day as display text, e.g. "October 19, 2026" */
  date!: DbColumn<string>;
  /** Rich HTML content */
  body!: DbColumn<string>;
  imgUrl!: DbColumn<string>;

  // Navigation properties
  author?: User;
  comments?: Comment[];
}
