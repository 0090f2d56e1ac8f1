/**
 * Well-known resume block kinds. Other strings are accepted so admins can add
 * custom blocks.
 */
export type ResumeSectionType = 'header' | 'summary' | 'skills' | 'experience' | 'education' | (string & {});

/**
 * Typed, ordered block of the resume page.
 *
 * `content` is markdown for prose blocks and a JSON object string for
 * structured ones (header, experience, education).
 */
export interface IResumeSection {
    id: number;
    sectionType: ResumeSectionType;
    title: string;
    content: string;
    order: number;
    visible: boolean;
    updatedAt: Date;

    /**
     * Catalog default this row was seeded from. Absent on admin-created rows.
     */
    seedKey?: string;
}

/**
 * Input for creating a resume block.
 */
export interface IResumeSectionInput {
    sectionType: ResumeSectionType;
    title?: string;
    content?: string;
    order?: number;
    visible?: boolean;
}

/**
 * Fields an admin edit may change.
 */
export type IResumeSectionPatch = Partial<IResumeSectionInput>;
