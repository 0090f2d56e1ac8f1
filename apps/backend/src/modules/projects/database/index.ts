export type { IProjectDocument } from './IProjectDocument.js';
