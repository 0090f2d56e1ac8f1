/**
 * Structured logging contract shared across backend services.
 *
 * Services receive an ILogger by injection instead of importing the
 * application logger, so tests can pass a spy and modules can hand out
 * scoped children. The shape is the subset of Pino's API the backend calls,
 * which lets a Pino instance satisfy it directly.
 */
export interface ILogger {
    /**
     * Emit an error-level log entry.
     *
     * @param obj - Structured context (usually `{ error, ... }`) or a message string
     * @param msg - Human-readable message when `obj` carries the context
     */
    error(obj: unknown, msg?: string): void;

    /**
     * Emit a warning-level log entry.
     *
     * @param obj - Structured context or a message string
     * @param msg - Human-readable message when `obj` carries the context
     */
    warn(obj: unknown, msg?: string): void;

    /**
     * Emit an info-level log entry.
     *
     * @param obj - Structured context or a message string
     * @param msg - Human-readable message when `obj` carries the context
     */
    info(obj: unknown, msg?: string): void;

    /**
     * Emit a debug-level log entry.
     *
     * @param obj - Structured context or a message string
     * @param msg - Human-readable message when `obj` carries the context
     */
    debug(obj: unknown, msg?: string): void;

    /**
     * Create a scoped child logger whose entries all carry `bindings`.
     *
     * @example
     * const moduleLogger = logger.child({ module: 'sections' });
     */
    child(bindings: Record<string, unknown>): ILogger;
}
