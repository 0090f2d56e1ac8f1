export { ProjectsModule } from './ProjectsModule.js';
export type { IProjectsModuleDependencies } from './ProjectsModule.js';
export { ProjectService, PROJECTS_COLLECTION } from './services/project.service.js';
