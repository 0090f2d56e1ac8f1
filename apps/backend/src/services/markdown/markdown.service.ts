import { unified } from 'unified';
import remarkParse from 'remark-parse';
import remarkGfm from 'remark-gfm';
import remarkBreaks from 'remark-breaks';
import remarkRehype from 'remark-rehype';
import rehypeSanitize from 'rehype-sanitize';
import rehypeSlug from 'rehype-slug';
import rehypeStringify from 'rehype-stringify';
import type { IMarkdownService } from '@portfolio/types';

/**
 * Average adult reading speed used for read-time estimates.
 */
const WORDS_PER_MINUTE = 200;

/**
 * Default excerpt length in characters.
 */
const DEFAULT_EXCERPT_LENGTH = 200;

const ELLIPSIS = '...';

/**
 * Round to the nearest integer, ties to the even neighbour (2.5 → 2, 3.5 → 4).
 */
function roundHalfEven(value: number): number {
    const floor = Math.floor(value);
    if (value - floor !== 0.5) {
        return Math.round(value);
    }
    return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Shared, frozen processor. Building it once avoids re-attaching plugins on
 * every render.
 *
 * The remark/rehype pipeline:
 * 1. Parse markdown with GitHub Flavored Markdown (tables, fenced code, strikethrough)
 * 2. Turn every soft line break into `<br>`
 * 3. Convert to HTML syntax tree
 * 4. Sanitize to the GitHub schema to prevent XSS
 * 5. Add slug ids to headings for table-of-contents links
 * 6. Stringify to the final HTML
 *
 * Slugs are added after sanitizing so they are not rewritten with the
 * sanitizer's `user-content-` clobber prefix.
 */
const processor = unified()
    .use(remarkParse)
    .use(remarkGfm)
    .use(remarkBreaks)
    .use(remarkRehype)
    .use(rehypeSanitize)
    .use(rehypeSlug)
    .use(rehypeStringify)
    .freeze();

/**
 * Service for rendering markdown and deriving plain-text metadata from it.
 *
 * Rendering is deterministic: the same markdown always yields the same HTML,
 * so callers may cache the output by content.
 */
export class MarkdownService implements IMarkdownService {
    /**
     * Render markdown to sanitized HTML.
     *
     * @param markdown - Markdown source
     * @returns Promise resolving to sanitized HTML, `''` for blank input
     *
     * @throws Error if markdown processing fails
     *
     * @example
     * const html = await markdown.renderMarkdown('# Hello World');
     * // '<h1 id="hello-world">Hello World</h1>'
     */
    async renderMarkdown(markdown: string): Promise<string> {
        if (!markdown.trim()) {
            return '';
        }

        try {
            const file = await processor.process(markdown);
            return String(file);
        } catch (error) {
            throw new Error(
                `Failed to render markdown: ${error instanceof Error ? error.message : 'Unknown error'}`
            );
        }
    }

    /**
     * Estimate reading time in whole minutes.
     *
     * @param text - Markdown or plain text
     * @returns Minutes at 200 words per minute, at least 1. Halves round
     * to even, so 500 words read in 2 minutes and 700 in 4.
     *
     * @example
     * markdown.estimateReadTime(fourHundredWords); // 2
     */
    estimateReadTime(text: string): number {
        const words = text.match(/[\p{L}\p{N}_]+/gu)?.length ?? 0;
        return Math.max(1, roundHalfEven(words / WORDS_PER_MINUTE));
    }

    /**
     * Remove markdown markup, keeping the readable words.
     *
     * Code blocks, code spans and images are dropped entirely. Headings,
     * emphasis and links keep their text. Images go before links because an
     * image is a link with a leading `!`.
     */
    stripMarkdown(content: string): string {
        return content
            .replace(/```[\s\S]*?```/g, '')
            .replace(/`[^`\n]+`/g, '')
            .replace(/^#{1,6}\s+/gm, '')
            .replace(/\*{1,2}([^*]+)\*{1,2}/g, '$1')
            .replace(/(^|[^\w])_{1,2}([^_]+)_{1,2}(?=[^\w]|$)/g, '$1$2')
            .replace(/!\[[^\]]*\]\([^)]*\)/g, '')
            .replace(/\[([^\]]+)\]\([^)]*\)/g, '$1')
            .replace(/\s+/g, ' ')
            .trim();
    }

    /**
     * Build a plain-text excerpt.
     *
     * Text that fits is returned whole. Longer text is cut at the last word
     * boundary that leaves room for `...`, so the result never exceeds
     * `maxLength`. A limit with no room for the ellipsis gets a bare cut.
     *
     * @param content - Markdown source
     * @param maxLength - Maximum excerpt length in characters
     * @returns Plain-text excerpt
     *
     * @example
     * markdown.generateExcerpt('# Title\n\nSome **bold** text with a [link](http://x)');
     * // 'Title Some bold text with a link'
     */
    generateExcerpt(content: string, maxLength = DEFAULT_EXCERPT_LENGTH): string {
        const plain = this.stripMarkdown(content);
        if (plain.length <= maxLength) {
            return plain;
        }

        if (maxLength <= ELLIPSIS.length) {
            return plain.slice(0, Math.max(0, maxLength));
        }

        const limit = maxLength - ELLIPSIS.length;
        let cut = plain.slice(0, limit);

        // A space right after the cut means the last word is already whole
        if (plain.charAt(limit) !== ' ') {
            const lastSpace = cut.lastIndexOf(' ');
            if (lastSpace > 0) {
                cut = cut.slice(0, lastSpace);
            }
        }

        return cut.trimEnd() + ELLIPSIS;
    }
}
