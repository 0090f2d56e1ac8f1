export type { ISiteSettingDocument } from './ISiteSettingDocument.js';
export type { IContentPageDocument } from './IContentPageDocument.js';
export type { IResumeSectionDocument } from './IResumeSectionDocument.js';
