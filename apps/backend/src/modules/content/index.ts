export { ContentModule } from './ContentModule.js';
export type { IContentModuleDependencies } from './ContentModule.js';
export { SettingsService, SETTINGS_COLLECTION } from './services/settings.service.js';
export { ContentPageService, PAGES_COLLECTION } from './services/content-page.service.js';
export { ResumeService, RESUME_COLLECTION, parseStructuredContent } from './services/resume.service.js';
