export type { IContactMessageDocument } from './IContactMessageDocument.js';
