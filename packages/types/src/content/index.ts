/**
 * Content model type definitions: sections, pages, settings, resume blocks,
 * the default catalog and the service contracts over them.
 */

export type { ISection, SectionMap } from './ISection.js';
export type { IContentPage, IContentPagePatch, IContentPageSummary } from './IContentPage.js';
export type { ISiteSetting } from './ISiteSetting.js';
export type {
    IResumeSection,
    IResumeSectionInput,
    IResumeSectionPatch,
    ResumeSectionType
} from './IResumeSection.js';
export type {
    ICatalogEntry,
    ICatalogPage,
    ICatalogResumeSection,
    ICatalogSection,
    ICatalogSectionDefaults,
    ICatalogSetting,
    IContentCatalog,
    IContentCatalogData
} from './IContentCatalog.js';
export type { IMarkdownService } from './IMarkdownService.js';
export type { ISectionService } from './ISectionService.js';
export type { ISettingsService } from './ISettingsService.js';
export type { IContentPageService } from './IContentPageService.js';
export type { IResumeService } from './IResumeService.js';
