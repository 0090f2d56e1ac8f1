import type { ObjectId } from 'mongodb';

/**
 * MongoDB document for a portfolio project. Unique on `id` and on `slug`.
 */
export interface IProjectDocument {
    _id?: ObjectId;
    id: number;
    title: string;
    slug: string;
    shortDescription: string;
    description: string;
    techStack: string[];
    metrics: string;
    githubUrl: string | null;
    liveUrl: string | null;
    featured: boolean;
    order: number;
    createdAt: Date;
    updatedAt: Date;
}
