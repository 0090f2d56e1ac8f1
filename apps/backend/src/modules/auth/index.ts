export { AuthModule } from './AuthModule.js';
export type { IAuthModuleDependencies } from './AuthModule.js';
export { AuthController } from './api/auth.controller.js';
