import type { IBlogArchive, IPost, IPostFilter, IPostInput, IPostPatch } from './IPost.js';

/**
 * Blog posts, newest first.
 */
export interface IPostService {
    /**
     * Posts matching the filter by `createdAt` descending.
     */
    listPosts(filter?: IPostFilter): Promise<IPost[]>;

    getPost(id: number): Promise<IPost | null>;

    getPostBySlug(slug: string): Promise<IPost | null>;

    /**
     * @throws {ValidationError} When no slug can be derived from the title
     * @throws {DuplicateKeyError} When the slug is taken
     */
    createPost(input: IPostInput): Promise<IPost>;

    /**
     * @returns The updated post, or null for an unknown id
     */
    updatePost(id: number, patch: IPostPatch): Promise<IPost | null>;

    /**
     * Delete a post together with its comments.
     */
    deletePost(id: number): Promise<boolean>;

    /**
     * Published post counts per month, newest month first.
     */
    getArchives(): Promise<IBlogArchive[]>;
}
