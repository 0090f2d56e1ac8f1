export { BlogModule } from './BlogModule.js';
export type { IBlogModuleDependencies } from './BlogModule.js';
export { PostService, POSTS_COLLECTION } from './services/post.service.js';
export { TaxonomyService, TAGS_COLLECTION, CATEGORIES_COLLECTION } from './services/taxonomy.service.js';
export { CommentService, COMMENTS_COLLECTION } from './services/comment.service.js';
