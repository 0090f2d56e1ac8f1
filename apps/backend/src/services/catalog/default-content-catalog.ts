import fs from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type {
    ICatalogPage,
    ICatalogResumeSection,
    ICatalogSection,
    ICatalogSectionDefaults,
    IContentCatalog,
    IContentCatalogData
} from '@portfolio/types';

/**
 * Directory shipped with the backend holding the built-in catalog files.
 */
export const DEFAULT_CATALOG_DIR = fileURLToPath(new URL('../../../data/catalog/', import.meta.url));

const sectionSchema = z.object({
    key: z.string().min(1),
    title: z.string().optional(),
    content: z.string().default('')
});

const catalogSchema = z.object({
    sections: z
        .record(z.array(sectionSchema))
        .superRefine((pages, ctx) => {
            for (const [page, entries] of Object.entries(pages)) {
                const seen = new Set<string>();
                for (const entry of entries) {
                    if (seen.has(entry.key)) {
                        ctx.addIssue({
                            code: z.ZodIssueCode.custom,
                            path: [page],
                            message: `Duplicate section key "${entry.key}"`
                        });
                    }
                    seen.add(entry.key);
                }
            }
        }),
    pages: z.record(
        z.object({
            title: z.string(),
            content: z.string().default(''),
            metaDescription: z.string().default('')
        })
    ),
    settings: z.record(
        z.object({
            value: z.string(),
            description: z.string().optional()
        })
    ),
    resume: z.array(
        z.object({
            key: z.string().min(1),
            sectionType: z.string().min(1),
            title: z.string().default(''),
            content: z.string().default(''),
            order: z.number().int()
        })
    )
});

/**
 * Files making up a catalog directory, keyed by the catalog part they fill.
 */
const CATALOG_FILES = {
    sections: 'sections.json',
    pages: 'pages.json',
    settings: 'settings.json',
    resume: 'resume.json'
} as const;

const EMPTY_ENTRY: ICatalogSectionDefaults = Object.freeze({ content: '' });

/**
 * Built-in default content for sections, pages, settings and the resume.
 *
 * The catalog is validated once at construction and frozen; nothing mutates it
 * afterwards. Section order within a page is the JSON array order, which is
 * also the `order` value a section gets when it is first seeded.
 *
 * ## Lookup misses
 *
 * Unknown pages and keys never throw. Section lookups return empty content
 * with no title, page lookups return null. That keeps ad hoc sections
 * created through the admin API working without catalog entries.
 *
 * @example
 * ```typescript
 * const catalog = await DefaultContentCatalog.load();
 * catalog.getSectionEntries('home').map(entry => entry.key);
 * // ['hero', 'what_i_do', 'cta']
 * ```
 */
export class DefaultContentCatalog implements IContentCatalog {
    private readonly data: IContentCatalogData;

    /**
     * Build a catalog from already-loaded data.
     *
     * Tests pass small inline catalogs here; the application goes through
     * {@link DefaultContentCatalog.load}.
     *
     * @param data - Raw catalog data
     * @throws {ZodError} If the data does not match the catalog shape
     */
    constructor(data: unknown) {
        this.data = deepFreeze(catalogSchema.parse(data));
    }

    /**
     * Read and validate the catalog JSON files from a directory.
     *
     * @param directory - Directory holding the four catalog files
     * @returns Frozen catalog
     * @throws If a file is missing, is not JSON, or fails validation
     */
    static async load(directory: string = DEFAULT_CATALOG_DIR): Promise<DefaultContentCatalog> {
        const parts = await Promise.all(
            Object.entries(CATALOG_FILES).map(async ([part, file]) => {
                const raw = await fs.readFile(path.join(directory, file), 'utf8');
                const parsed: unknown = JSON.parse(raw);
                return [part, parsed] as const;
            })
        );

        return new DefaultContentCatalog(Object.fromEntries(parts));
    }

    getSectionEntries(page: string): readonly ICatalogSection[] {
        return hasOwn(this.data.sections, page) ? this.data.sections[page] : [];
    }

    getSectionEntry(page: string, key: string): ICatalogSectionDefaults {
        const entry = this.getSectionEntries(page).find(candidate => candidate.key === key);
        if (!entry) {
            return EMPTY_ENTRY;
        }
        return entry.title === undefined
            ? { content: entry.content }
            : { title: entry.title, content: entry.content };
    }

    getPageDefaults(slug: string): ICatalogPage | null {
        return hasOwn(this.data.pages, slug) ? this.data.pages[slug] : null;
    }

    getPageSlugs(): string[] {
        return Object.keys(this.data.pages);
    }

    getSettingDefaults(): Record<string, string> {
        return Object.fromEntries(
            Object.entries(this.data.settings).map(([key, setting]) => [key, setting.value])
        );
    }

    getSettingDescription(key: string): string {
        if (!hasOwn(this.data.settings, key)) {
            return '';
        }
        return this.data.settings[key].description ?? '';
    }

    getResumeDefaults(): readonly ICatalogResumeSection[] {
        return this.data.resume;
    }
}

/**
 * Own-property check, so keys like `constructor` never resolve through the
 * prototype chain.
 */
function hasOwn(record: object, key: string): boolean {
    return Object.prototype.hasOwnProperty.call(record, key);
}

/**
 * Recursively freeze plain objects and arrays.
 */
function deepFreeze<T>(value: T): T {
    if (value && typeof value === 'object') {
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
        Object.freeze(value);
    }
    return value;
}
