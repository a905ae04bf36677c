/**
 * Error types shared across the pipeline
 */

/**
 * The persisted dataset exists but cannot be read or parsed.
 * This is the only error that halts a run.
 */
export class DatasetLoadError extends Error {
    constructor(
        public readonly filePath: string,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(`Cannot load dataset from ${filePath}: ${message}`, options);
        this.name = 'DatasetLoadError';
    }
}

/**
 * An external command was killed after exceeding its wall-clock budget
 */
export class CommandTimeoutError extends Error {
    constructor(
        public readonly command: string,
        public readonly timeoutMs: number
    ) {
        super(`Command "${command}" timed out after ${timeoutMs}ms`);
        this.name = 'CommandTimeoutError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
