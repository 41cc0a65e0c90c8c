import { DbColumn, DbEntity } from '../../entity';
import type { Post } from './post';
import type { User } from './user';

export class Comment extends DbEntity {
  id!: DbColumn<number>;
  authorId!: DbColumn<number>;
  postId!: DbColumn<number>;
  text!: DbColumn<string>;

  // Navigation properties
  commentAuthor?: User;
  parentPost?: Post;
}
