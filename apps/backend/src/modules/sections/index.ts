export { SectionsModule } from './SectionsModule.js';
export type { ISectionsModuleDependencies } from './SectionsModule.js';
export { SectionService, SECTIONS_COLLECTION } from './services/section.service.js';
export { SectionsController } from './api/sections.controller.js';
