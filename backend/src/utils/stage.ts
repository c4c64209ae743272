import { isPipelineError, safeErrorMessage } from "./errors";
import { logger } from "./logger";

export type StageResult<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Outermost scope of a batch job: logs start and outcome, never throws.
 * Orchestration can rely on the returned flag (and the process exit code
 * set by the entry scripts) instead of scraping log output.
 */
export const runStage = async <T>(name: string, job: () => Promise<T>): Promise<StageResult<T>> => {
  logger.info(`Starting ${name}`);
  try {
    const value = await job();
    logger.info(`${name} complete`);
    return { ok: true, value };
  } catch (error) {
    logger.error(`${name} failed`, {
      kind: isPipelineError(error) ? error.kind : "unexpected",
      message: safeErrorMessage(error),
    });
    return { ok: false, error };
  }
};

export const exitCodeFor = (result: StageResult<unknown>) => (result.ok ? 0 : 1);
