import type { IResumeSection, IResumeSectionInput, IResumeSectionPatch } from './IResumeSection.js';

/**
 * Resume blocks seeded from the catalog on first read.
 */
export interface IResumeService {
    /**
     * All blocks by `order`, then `id`. Seeds the catalog defaults when the
     * collection is empty.
     */
    listSections(options?: { visibleOnly?: boolean }): Promise<IResumeSection[]>;

    getSection(id: number): Promise<IResumeSection | null>;

    createSection(input: IResumeSectionInput): Promise<IResumeSection>;

    /**
     * @returns The updated block, or null for an unknown id
     */
    updateSection(id: number, patch: IResumeSectionPatch): Promise<IResumeSection | null>;

    deleteSection(id: number): Promise<boolean>;
}
