/**
 * Structured pino logger scoped to a run, a pipeline stage or a search query
 */
import pino from 'pino';
import { config } from '../config/index.js';

export type StageName = 'load' | 'followers' | 'rating' | 'news' | 'tv' | 'stats' | 'save';

export interface LogContext {
    runId?: string;
    stage?: StageName;
    query?: string;
}

type LogData = Record<string, unknown>;

const rootLogger = pino({
    level: config.logLevel,
    base: {
        service: 'media-kit-updater',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
        level: (label) => ({ level: label }),
    },
});

/**
 * Flatten an error for the log line; a `cause` is reduced to its message
 */
function describeError(error: unknown): LogData {
    if (!(error instanceof Error)) {
        return { error: String(error) };
    }

    const described: LogData = {
        name: error.name,
        message: error.message,
        stack: error.stack,
    };
    if (error.cause !== undefined) {
        described.cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
    }
    return { error: described };
}

export class Logger {
    constructor(private readonly target: pino.Logger) {}

    child(context: LogContext): Logger {
        return new Logger(this.target.child(context));
    }

    debug(message: string, data?: LogData): void {
        this.target.debug(data ?? {}, message);
    }

    info(message: string, data?: LogData): void {
        this.target.info(data ?? {}, message);
    }

    warn(message: string, data?: LogData): void {
        this.target.warn(data ?? {}, message);
    }

    error(message: string, error?: unknown, data?: LogData): void {
        this.target.error({ ...(error === undefined ? {} : describeError(error)), ...data }, message);
    }
}

export const logger = new Logger(rootLogger);
export const createLogger = (context: LogContext): Logger => logger.child(context);
