/**
 * Stage guard: anything a stage throws becomes a `failed` result
 */
import { errorMessage } from '../errors.js';
import { createLogger, type StageName } from '../observability/logger.js';
import type { StageResult } from '../fetchers/types.js';

export async function runStage(name: StageName, fn: () => Promise<StageResult>): Promise<StageResult> {
    const stageLog = createLogger({ stage: name });
    const startedAt = Date.now();

    try {
        const result = await fn();
        stageLog.info('Stage finished', { ...result, durationMs: Date.now() - startedAt });
        return result;
    } catch (error) {
        stageLog.error('Stage threw unexpectedly', error, { durationMs: Date.now() - startedAt });
        return { status: 'failed', reason: errorMessage(error) };
    }
}
