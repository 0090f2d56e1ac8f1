export type { IDatabaseService, IIndexOptions, IUpdateResult, SortSpec } from './IDatabaseService.js';
