import { DbContext, DbModelConfig } from '../entity';
import { DbEntityTable } from '../query/entity-table';
import { integer, serial, text, varchar } from '../types/column-types';
import { Comment } from './model/comment';
import { Post } from './model/post';
import { User } from './model/user';

/**
 * Database context of the blog: users, their posts and the comments on them
 */
export class BlogDatabase extends DbContext {
  get users(): DbEntityTable<User> {
    return this.table(User);
  }

  get posts(): DbEntityTable<Post> {
    return this.table(Post);
  }

  get comments(): DbEntityTable<Comment> {
    return this.table(Comment);
  }

  protected override setupModel(model: DbModelConfig): void {
    model.entity(User, entity => {
      entity.toTable('users');

      entity.property('id').hasType(serial('id').primaryKey());
      entity.property('email').hasType(varchar('email', 250)).isRequired().isUnique();
      entity.property('password').hasType(varchar('password', 250)).isRequired();
      entity.property('name').hasType(varchar('name', 250)).isRequired();
    });

    model.entity(Post, entity => {
      entity.toTable('blog_posts');

      entity.property('id').hasType(serial('id').primaryKey());
      entity.property('authorId').hasType(integer('author_id')).isRequired();
      entity.property('title').hasType(varchar('title', 250)).isRequired().isUnique();
      entity.property('subtitle').hasType(varchar('subtitle', 250)).isRequired();
      entity.property('date').hasType(varchar('date', 250)).isRequired();
      entity.property('body').hasType(text('body')).isRequired();
      entity.property('imgUrl').hasType(varchar('img_url', 250)).isRequired();

      entity.hasOne('author', () => User)
        .withForeignKey('authorId')
        .withPrincipalKey('id')
        .isRequired();
    });

    model.entity(Comment, entity => {
      entity.toTable('comments');

      entity.property('id').hasType(serial('id').primaryKey());
      entity.property('authorId').hasType(integer('author_id')).isRequired();
      entity.property('postId').hasType(integer('post_id')).isRequired();
      entity.property('text').hasType(text('text')).isRequired();

      entity.hasOne('commentAuthor', () => User)
        .withForeignKey('authorId')
        .withPrincipalKey('id')
        .isRequired();

      // Comments go away with their post
      entity.hasOne('parentPost', () => Post)
        .withForeignKey('postId')
        .withPrincipalKey('id')
        .onDelete('cascade')
        .isRequired();
    });
  }
}
