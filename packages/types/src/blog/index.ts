/**
 * Blog type definitions: posts, tags and categories, and comments.
 */

export type { ITaxonomyTerm, TaxonomyKind } from './ITaxonomyTerm.js';
export type { IBlogArchive, IPost, IPostFilter, IPostInput, IPostPatch } from './IPost.js';
export type { IComment, ICommentInput } from './IComment.js';
export type { IPostService } from './IPostService.js';
export type { ITaxonomyService } from './ITaxonomyService.js';
export type { ICommentService } from './ICommentService.js';
