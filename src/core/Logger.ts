export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type TelemetryHook = (level: LogLevel, message: string, ...args: unknown[]) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

/**
 * A lightweight logging utility with support for different log levels and telemetry hooks.
 * The simulation core never does I/O itself; everything it wants to report goes through here
 * and hosts decide where it ends up (console, overlay, test spy).
 */
export class Logger {
    private static logLevel: LogLevel = 'info';
    private static telemetryHooks: TelemetryHook[] = [];

    /**
     * Sets the minimum log level. Messages below this level are not written to the console
     * (telemetry hooks still see them).
     */
    public static setLogLevel(level: LogLevel): void {
        Logger.logLevel = level;
    }

    public static getLogLevel(): LogLevel {
        return Logger.logLevel;
    }

    /**
     * Adds a telemetry hook function that will be called for every log message.
     * Returns a function that removes the hook again.
     */
    public static addTelemetryHook(hook: TelemetryHook): () => void {
        Logger.telemetryHooks.push(hook);
        return () => {
            Logger.telemetryHooks = Logger.telemetryHooks.filter(h => h !== hook);
        };
    }

    public static clearTelemetryHooks(): void {
        Logger.telemetryHooks = [];
    }

    private static shouldLog(level: LogLevel): boolean {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[Logger.logLevel];
    }

    private static log(level: LogLevel, message: string, ...args: unknown[]): void {
        if (Logger.shouldLog(level)) {
            console[level](`[${level.toUpperCase()}] ${message}`, ...args);
        }
        Logger.telemetryHooks.forEach(hook => hook(level, message, ...args));
    }

    public static debug(message: string, ...args: unknown[]): void {
        Logger.log('debug', message, ...args);
    }

    public static info(message: string, ...args: unknown[]): void {
        Logger.log('info', message, ...args);
    }

    /**
     * Logs a warning message. Used for requests the core ignores because they make no sense
     * in the current state (e.g. a power-up landing on an eliminated player).
     */
    public static warn(message: string, ...args: unknown[]): void {
        Logger.log('warn', message, ...args);
    }

    public static error(message: string, ...args: unknown[]): void {
        Logger.log('error', message, ...args);
    }
}
