import type { IComment, IMarkdownService, IPost, ITaxonomyTerm } from '@portfolio/types';

export function serializeTerm(term: ITaxonomyTerm) {
    return {
        id: term.id,
        name: term.name,
        slug: term.slug,
        description: term.description
    };
}

/**
 * Listing shape: no body, an excerpt (the stored one or one generated from
 * the content) and the reading time.
 */
export function serializePostSummary(post: IPost, markdown: IMarkdownService) {
    return {
        id: post.id,
        title: post.title,
        slug: post.slug,
        excerpt: post.excerpt || markdown.generateExcerpt(post.content),
        read_time: markdown.estimateReadTime(post.content),
        published: post.published,
        tags: post.tags.map(serializeTerm),
        categories: post.categories.map(serializeTerm),
        created_at: post.createdAt,
        updated_at: post.updatedAt
    };
}

/**
 * Admin shape: every stored field, the excerpt as written.
 */
export function serializePost(post: IPost) {
    return {
        id: post.id,
        title: post.title,
        slug: post.slug,
        content: post.content,
        excerpt: post.excerpt,
        published: post.published,
        tags: post.tags.map(serializeTerm),
        categories: post.categories.map(serializeTerm),
        created_at: post.createdAt,
        updated_at: post.updatedAt
    };
}

/**
 * Public comment shape. The author's email is never published.
 */
export function serializePublicComment(comment: IComment) {
    return {
        id: comment.id,
        author_name: comment.authorName,
        content: comment.content,
        created_at: comment.createdAt
    };
}

export function serializeComment(comment: IComment) {
    return {
        id: comment.id,
        post_id: comment.postId,
        author_name: comment.authorName,
        author_email: comment.authorEmail,
        content: comment.content,
        approved: comment.approved,
        created_at: comment.createdAt
    };
}
