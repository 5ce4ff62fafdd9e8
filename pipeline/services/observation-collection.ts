import { PipelineError, describeError } from "../utils/pipeline-errors.js";
import {
  runObservationPipeline,
  type ObservationPipelineDependencies
} from "./observation-pipeline.js";
import type { ObservationStore } from "./observation-store.js";

export interface CollectionOptions extends Omit<ObservationPipelineDependencies, "store"> {
  openStore: () => ObservationStore;
}

const RULE = "=".repeat(60);

/**
 * One scheduled collection, reduced to a process exit code: 0 when the
 * observation was stored or was already stored, 1 on any failure. The store
 * is opened inside the run so that an unusable database is reported like
 * every other failure, and it is always closed.
 */
export const runCollection = async (options: CollectionOptions): Promise<number> => {
  const { openStore, ...pipelineDependencies } = options;
  const { logger } = pipelineDependencies;
  const startTime = Date.now();

  logger.info(RULE);
  logger.info(`Collecting observation from ${pipelineDependencies.location.sourceUrl}`);
  logger.info(RULE);

  let store: ObservationStore | null = null;

  try {
    store = openStore();
    const result = await runObservationPipeline({ ...pipelineDependencies, store });

    const elapsedSeconds = ((Date.now() - startTime) / 1000).toFixed(1);
    logger.info(
      `✓ Collection complete: ${result.insert.kind}, image ${result.image.kind} (${elapsedSeconds}s)`
    );
    return 0;
  } catch (error) {
    if (error instanceof PipelineError) {
      logger.error(`${error.name}: ${error.message}`);
    } else {
      logger.error(`Unexpected error: ${describeError(error)}`);
      if (error instanceof Error && error.stack) {
        logger.error(error.stack);
      }
    }
    return 1;
  } finally {
    store?.close();
  }
};
