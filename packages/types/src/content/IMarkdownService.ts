/**
 * Markdown rendering contract.
 *
 * Rendering is deterministic and sanitized. Excerpts and read times are
 * computed from plain text with markup stripped.
 */
export interface IMarkdownService {
    /**
     * Render markdown to sanitized HTML.
     *
     * Supports GFM tables and fenced code, a line break for every newline, and
     * `id` attributes on headings for a table of contents. Empty input renders
     * to an empty string.
     */
    renderMarkdown(markdown: string): Promise<string>;

    /**
     * Reading time in whole minutes at 200 words per minute, never below 1.
     */
    estimateReadTime(text: string): number;

    /**
     * Remove markdown markup and collapse whitespace.
     */
    stripMarkdown(content: string): string;

    /**
     * Plain-text excerpt cut at a word boundary, ending in `...` when cut.
     *
     * @param maxLength - Upper bound on the returned length (default 200)
     */
    generateExcerpt(content: string, maxLength?: number): string;
}
