/**
 * Portfolio project shown on the projects page.
 */
export interface IProject {
    id: number;
    title: string;
    slug: string;

    /**
     * One-line summary for cards and listings.
     */
    shortDescription: string;

    /**
     * Markdown body of the project page.
     */
    description: string;

    techStack: string[];

    /**
     * Free-form outcome figures, e.g. "40% faster builds".
     */
    metrics: string;

    githubUrl: string | null;
    liveUrl: string | null;

    /**
     * Featured projects are shown on the home page.
     */
    featured: boolean;

    order: number;
    createdAt: Date;
    updatedAt: Date;
}

/**
 * Input for creating a project. An empty or missing slug is derived from
 * the title; empty URLs are stored as null.
 */
export interface IProjectInput {
    title: string;
    shortDescription: string;
    description: string;
    slug?: string;
    techStack?: string[];
    metrics?: string;
    githubUrl?: string | null;
    liveUrl?: string | null;
    featured?: boolean;
    order?: number;
}

/**
 * Fields an admin edit may change. Omitted fields keep their stored value.
 */
export type IProjectPatch = Partial<IProjectInput>;
