export type { IProject, IProjectInput, IProjectPatch } from './IProject.js';
export type { IProjectService } from './IProjectService.js';
