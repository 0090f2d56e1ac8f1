/**
 * Identifying information for a backend module.
 *
 * Bootstrap logs it when a module fails and the health endpoint lists it.
 */
export interface IModuleMetadata {
    /**
     * Unique identifier for the module.
     *
     * Should be lowercase kebab-case matching the module directory name.
     * Used for programmatic identification and logging contexts.
     *
     * @example 'sections', 'content', 'auth'
     */
    id: string;

    /**
     * Human-readable module name.
     *
     * Shown in logs and the health response.
     *
     * @example 'Sections', 'Content', 'Admin Auth'
     */
    name: string;

    /**
     * Semantic version string.
     *
     * Semver, tracked independently from the application version.
     *
     * @example '1.0.0', '2.1.3'
     */
    version: string;

    /**
     * Optional human-readable description of module purpose.
     *
     * @example 'Inline-editable page sections with catalog seeding'
     */
    description?: string;
}
