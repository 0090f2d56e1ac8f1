import type { IModuleMetadata } from './IModuleMetadata.js';

/**
 * Core module interface for backend system components.
 *
 * Modules are permanent backend components that initialize during application
 * bootstrap and stay active for the application's lifetime: sections, content
 * and auth each ship as one.
 *
 * ## Two-Phase Lifecycle
 *
 * ### Phase 1: init(dependencies)
 * - Store injected dependencies and create service instances
 * - Must not mount routes or touch the database
 * - Cannot assume other modules are initialized
 *
 * ### Phase 2: run()
 * - Ensure indexes, then mount routers on the injected Express app
 * - All modules have completed init() by now
 *
 * Failure in either phase is fatal: bootstrap logs it and exits.
 *
 * ## Inversion of Control
 *
 * Modules receive the Express app and attach their own routers rather than
 * returning them for the bootstrap process to mount.
 *
 * ```typescript
 * const sectionsModule = new SectionsModule();
 * await sectionsModule.init({ database, catalog, markdown, adminAuth, app });
 * await sectionsModule.run();
 * ```
 *
 * @template TDependencies - Typed dependencies object specific to this module
 */
export interface IModule<TDependencies extends object = Record<string, unknown>> {
    /**
     * Module metadata for introspection and log attribution.
     */
    readonly metadata: IModuleMetadata;

    /**
     * Initialize the module with injected dependencies.
     *
     * @param dependencies - Typed dependencies object specific to this module
     * @throws {Error} If initialization fails (causes application shutdown)
     */
    init(dependencies: TDependencies): Promise<void>;

    /**
     * Activate the module after every module has initialized.
     *
     * @throws {Error} If runtime setup fails (causes application shutdown)
     */
    run(): Promise<void>;
}
