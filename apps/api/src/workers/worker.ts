import { loadPipelineConfig } from "../config";
import { errorMessage, logger } from "../logging";
import { ResourcePipeline } from "../pipeline";
import { createResourceImportWorker } from "./handlers";
import { closeQueues, RESOURCE_IMPORT_QUEUE } from "./queues";

async function start() {
  const pipeline = new ResourcePipeline({ config: loadPipelineConfig(), logger });
  await pipeline.setup();

  const worker = createResourceImportWorker(pipeline);
  logger.info("Resource import worker started", { queue: RESOURCE_IMPORT_QUEUE });

  const shutdown = async () => {
    logger.info("Shutting down background workers");
    await worker.close();
    await pipeline.shutdown();
    await closeQueues();
    process.exit(0);
  };

  const onSignal = () =>
    void shutdown().catch((error: unknown) => {
      logger.error("Worker shutdown failed", { error: errorMessage(error) });
      process.exit(1);
    });

  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
}

void start().catch((error: unknown) => {
  logger.error("Worker bootstrap failed", { error: errorMessage(error) });
  process.exit(1);
});
