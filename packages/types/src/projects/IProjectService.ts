import type { IProject, IProjectInput, IProjectPatch } from './IProject.js';

/**
 * Portfolio projects, ordered by `order` then newest first.
 */
export interface IProjectService {
    listProjects(options?: { featuredOnly?: boolean; limit?: number }): Promise<IProject[]>;

    getProject(id: number): Promise<IProject | null>;

    getProjectBySlug(slug: string): Promise<IProject | null>;

    /**
     * @throws {ValidationError} When no slug can be derived from the title
     * @throws {DuplicateKeyError} When the slug is taken
     */
    createProject(input: IProjectInput): Promise<IProject>;

    /**
     * @returns The updated project, or null for an unknown id
     */
    updateProject(id: number, patch: IProjectPatch): Promise<IProject | null>;

    deleteProject(id: number): Promise<boolean>;
}
