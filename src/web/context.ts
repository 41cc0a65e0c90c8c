import { AdminPolicy } from '../auth/admin-policy';
import { Authenticator } from '../auth/authenticator';
import { BlogDatabase } from '../blog/blog-database';
import { PostService } from '../blog/post-service';
import { AppConfig } from '../config';
import { HtmlViewRenderer, ViewRenderer } from './views';

/**
 * Everything a request handler needs, built once at startup and handed to
 * the route factories explicitly
 */
export interface AppContext {
  config: AppConfig;
  db: BlogDatabase;
  auth: Authenticator;
  policy: AdminPolicy;
  posts: PostService;
  views: ViewRenderer;
}

export function createAppContext(config: AppConfig, db: BlogDatabase, views: ViewRenderer = new HtmlViewRenderer()): AppContext {
  return {
    config,
    db,
    auth: new Authenticator(db, config.passwordHash),
    policy: new AdminPolicy(db, config.adminUserId),
    posts: new PostService(db),
    views,
  };
}
