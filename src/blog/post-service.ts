import { DuplicateTitleError, NotFoundError, UniqueViolationError } from '../errors';
import { BlogDatabase } from './blog-database';
import { CommentRow, PostRow, UserRow } from './rows';

/**
 * Post fields editable through the post form
 */
export interface PostInput {
  title: string;
  subtitle: string;
  body: string;
  imgUrl: string;
}

export interface PostSummary {
  post: PostRow;
  authorName: string;
}

export interface CommentWithAuthor {
  comment: CommentRow;
  author: UserRow;
}

export interface PostDetail {
  post: PostRow;
  author: UserRow;
  comments: CommentWithAuthor[];
}

const POST_DATE_FORMAT = new Intl.DateTimeFormat('en-US', {
  month: 'long',
  day: '2-digit',
  year: 'numeric',
});

/**
 * Display form of a post date, e.g. "October 05, 2026"
 */
export function formatPostDate(date: Date): string {
  return POST_DATE_FORMAT.format(date);
}

/**
 * Post and comment operations of the blog
 */
export class PostService {
  constructor(private db: BlogDatabase) {}

  /**
   * Every post with its author's name, oldest first
   */
  async listPosts(): Promise<PostSummary[]> {
    const [posts, users] = await Promise.all([this.db.posts.toList(), this.db.users.toList()]);
    const names = new Map(users.map(user => [user.id, user.name]));
    return posts.map(post => ({ post, authorName: names.get(post.authorId) ?? '' }));
  }

  async getPost(id: number): Promise<PostRow | null> {
    return this.db.posts.findById(id);
  }

  /**
   * A post with its author and its comments (each with its author), or null
   */
  async getPostDetail(id: number): Promise<PostDetail | null> {
    const post = await this.db.posts.findById(id);
    if (!post) {
      return null;
    }

    const [author, comments, users] = await Promise.all([
      this.db.users.findById(post.authorId),
      this.db.comments.where({ postId: post.id }).toList(),
      this.db.users.toList(),
    ]);
    if (!author) {
      throw new NotFoundError('User', post.authorId);
    }

    const usersById = new Map(users.map(user => [user.id, user]));
    const withAuthors: CommentWithAuthor[] = [];
    for (const comment of comments) {
      const commentAuthor = usersById.get(comment.authorId);
      if (commentAuthor) {
        withAuthors.push({ comment, author: commentAuthor });
      }
    }
    return { post, author, comments: withAuthors };
  }

  /**
   * Publish a post authored by `author`, dated `today`
   * @throws DuplicateTitleError when the title is taken
   */
  async createPost(author: UserRow, input: PostInput, today: Date = new Date()): Promise<PostRow> {
    return this.db.transaction(async (ctx) => {
      await this.assertTitleAvailable(ctx, input.title);
      try {
        return await ctx.posts.insert({
          authorId: author.id,
          title: input.title,
          subtitle: input.subtitle,
          date: formatPostDate(today),
          body: input.body,
          imgUrl: input.imgUrl,
        });
      } catch (error) {
        throw this.translateWriteError(error, input.title);
      }
    });
  }

  /**
   * Replace the editable fields of a post.
   * The editor becomes the post's author, so the post displays the editor's name.
   * Id and date are left as they were.
   * @throws NotFoundError when the post does not exist
   * @throws DuplicateTitleError when another post has the title
   */
  async updatePost(id: number, editor: UserRow, input: PostInput): Promise<PostRow> {
    return this.db.transaction(async (ctx) => {
      const post = await ctx.posts.findById(id);
      if (!post) {
        throw new NotFoundError('Post', id);
      }
      if (input.title !== post.title) {
        await this.assertTitleAvailable(ctx, input.title);
      }

      try {
        const updated = await ctx.posts.update(id, {
          title: input.title,
          subtitle: input.subtitle,
          imgUrl: input.imgUrl,
          authorId: editor.id,
          body: input.body,
        });
        if (!updated) {
          throw new NotFoundError('Post', id);
        }
        return updated;
      } catch (error) {
        throw this.translateWriteError(error, input.title);
      }
    });
  }

  /**
   * Delete a post; its comments are removed with it
   * @throws NotFoundError when the post does not exist
   */
  async deletePost(id: number): Promise<void> {
    await this.db.transaction(async (ctx) => {
      const deleted = await ctx.posts.delete(id);
      if (!deleted) {
        throw new NotFoundError('Post', id);
      }
    });
  }

  /**
   * Add a comment by `author` under the post
   * @throws NotFoundError when the post does not exist
   */
  async addComment(postId: number, author: UserRow, text: string): Promise<CommentRow> {
    return this.db.transaction(async (ctx) => {
      const post = await ctx.posts.findById(postId);
      if (!post) {
        throw new NotFoundError('Post', postId);
      }
      return ctx.comments.insert({ authorId: author.id, postId: post.id, text });
    });
  }

  private async assertTitleAvailable(ctx: BlogDatabase, title: string): Promise<void> {
    const existing = await ctx.posts.where({ title }).firstOrDefault();
    if (existing) {
      throw new DuplicateTitleError(title);
    }
  }

  private translateWriteError(error: unknown, title: string): unknown {
    if (error instanceof UniqueViolationError) {
      return new DuplicateTitleError(title, { cause: error });
    }
    return error;
  }
}
