/**
 * Structured logging contract shared by the wiki services.
 *
 * Mirrors the Pino method surface so services can log structured objects
 * without importing the logging library directly. Tests pass a stub that
 * records calls.
 */
export interface ILogger {
    fatal(...args: readonly unknown[]): void;
    error(...args: readonly unknown[]): void;
    warn(...args: readonly unknown[]): void;
    info(...args: readonly unknown[]): void;
    debug(...args: readonly unknown[]): void;
    trace(...args: readonly unknown[]): void;

    /**
     * Create a scoped child logger with predefined bindings.
     *
     * @param bindings - Static key-value pairs merged into each log entry
     * @returns A logger that applies the bindings to every entry
     */
    child(bindings: Record<string, unknown>): ILogger;
}
