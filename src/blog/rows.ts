import { EntityRow } from '../entity';
import { Comment } from './model/comment';
import { Post } from './model/post';
import { User } from './model/user';

export type UserRow = EntityRow<User>;
export type PostRow = EntityRow<Post>;
export type CommentRow = EntityRow<Comment>;
