export type { IPostDocument } from './IPostDocument.js';
export type { ITaxonomyTermDocument } from './ITaxonomyTermDocument.js';
export type { ICommentDocument } from './ICommentDocument.js';
