export type { ISectionDocument } from './ISectionDocument.js';
