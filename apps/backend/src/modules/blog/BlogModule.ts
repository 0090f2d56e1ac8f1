/**
 * Blog module implementation.
 *
 * Posts, their tags and categories, and moderated reader comments. Reader
 * endpoints mount at /api/content, management endpoints at /api/admin.
 */

import type { Express, RequestHandler } from 'express';
import type { IDatabaseService, ILogger, IMarkdownService, IModule, IModuleMetadata } from '@portfolio/types';
import { TaxonomyService } from './services/taxonomy.service.js';
import { CommentService } from './services/comment.service.js';
import { PostService } from './services/post.service.js';
import { PostsController } from './api/posts.controller.js';
import { TaxonomyController } from './api/taxonomy.controller.js';
import { CommentsController } from './api/comments.controller.js';
import { createBlogAdminRouter, createPublicBlogRouter } from './api/blog.routes.js';
import type { IBlogControllers } from './api/blog.routes.js';

export interface IBlogModuleDependencies {
    database: IDatabaseService;
    markdown: IMarkdownService;
    requireAdmin: RequestHandler;
    app: Express;
    logger: ILogger;
}

/**
 * Blog module.
 *
 * ## Lifecycle
 *
 * ### init() phase:
 * - Instantiates the taxonomy, comment and post services and their controllers
 *
 * ### run() phase:
 * - Ensures the indexes of `posts`, `tags`, `categories` and `comments`
 * - Mounts the public router at /api/content and the admin router at /api/admin
 */
export class BlogModule implements IModule<IBlogModuleDependencies> {
    readonly metadata: IModuleMetadata = {
        id: 'blog',
        name: 'Blog',
        version: '1.0.0',
        description: 'Posts with tags, categories, archives and moderated comments'
    };

    private app!: Express;
    private requireAdmin!: RequestHandler;
    private logger!: ILogger;

    private taxonomyService!: TaxonomyService;
    private commentService!: CommentService;
    private postService!: PostService;
    private controllers!: IBlogControllers;

    async init(dependencies: IBlogModuleDependencies): Promise<void> {
        this.logger = dependencies.logger.child({ module: 'blog' });
        this.logger.info('Initializing blog module...');

        this.app = dependencies.app;
        this.requireAdmin = dependencies.requireAdmin;

        const { database, markdown } = dependencies;
        this.taxonomyService = new TaxonomyService(database, this.logger);
        this.commentService = new CommentService(database, this.logger);
        this.postService = new PostService(database, this.taxonomyService, this.commentService, this.logger);

        this.controllers = {
            posts: new PostsController(this.postService, this.taxonomyService, this.commentService, markdown),
            taxonomy: new TaxonomyController(this.taxonomyService),
            comments: new CommentsController(this.commentService, this.postService)
        };

        this.logger.info('Blog module initialized');
    }

    async run(): Promise<void> {
        this.logger.info('Running blog module...');

        await this.taxonomyService.ensureIndexes();
        await this.commentService.ensureIndexes();
        await this.postService.ensureIndexes();

        this.app.use('/api/content', createPublicBlogRouter(this.controllers));
        this.app.use('/api/admin', createBlogAdminRouter(this.controllers, this.requireAdmin));
        this.logger.info('Blog routers mounted at /api/content and /api/admin');

        this.logger.info('Blog module running');
    }
}
