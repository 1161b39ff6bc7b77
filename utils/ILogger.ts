/**
 * Logger Interface
 *
 * Simple logging interface that the ledger, engine and trainer use.
 * Implementations can use Winston, console, or any other logging system.
 */

export type LogMeta = Record<string, unknown>;

export interface ILogger {
    debug(message: string, meta?: LogMeta): void;
    info(message: string, meta?: LogMeta): void;
    warn(message: string, meta?: LogMeta): void;
    error(message: string, meta?: LogMeta): void;
    child?(additionalContext: string): ILogger;
}

/**
 * Console Logger - Default implementation
 */
export class ConsoleLogger implements ILogger {
    constructor(private context: string = 'StakeLedger') { }

    debug(message: string, meta?: LogMeta): void {
        console.debug(`[DEBUG] [${this.context}] ${message}`, meta || '');
    }

    info(message: string, meta?: LogMeta): void {
        console.log(`[INFO] [${this.context}] ${message}`, meta || '');
    }

    warn(message: string, meta?: LogMeta): void {
        console.warn(`[WARN] [${this.context}] ${message}`, meta || '');
    }

    error(message: string, meta?: LogMeta): void {
        console.error(`[ERROR] [${this.context}] ${message}`, meta || '');
    }

    child(additionalContext: string): ILogger {
        return new ConsoleLogger(`${this.context}:${additionalContext}`);
    }
}

/**
 * Scope a logger to a component, falling back to the logger itself when it cannot create children
 */
export function scopedLogger(logger: ILogger | undefined, context: string): ILogger {
    if (!logger) {
        return new ConsoleLogger(context);
    }
    return logger.child ? logger.child(context) : logger;
}
