/**
 * Process exit policy: a run always reports success to the scheduler,
 * which diffs the dataset file instead of branching on the exit status.
 */
import { logger } from '../observability/logger.js';

export const RUN_EXIT_CODE = 0;

export type ExitFn = (code: number) => void;

/**
 * Log why the run stopped early and exit with the run exit code
 */
export function abortRun(message: string, error: unknown, exit: ExitFn = (code) => process.exit(code)): void {
    logger.error(message, error);
    exit(RUN_EXIT_CODE);
}
