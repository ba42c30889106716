import { parseCliArgs, runCli } from "./cli";
import { loadPipelineConfig } from "./config";
import { env } from "./env";
import { errorMessage, logger } from "./logging";
import { ResourcePipeline } from "./pipeline";
import { closeQueues, enqueueResourceImport } from "./workers/queues";

async function bootstrap() {
  const options = parseCliArgs(process.argv.slice(2));
  const pipeline = new ResourcePipeline({ config: loadPipelineConfig(), logger });

  try {
    await runCli(options, { pipeline, enqueue: enqueueResourceImport, logger });
  } finally {
    await closeQueues();
  }

  logger.info("Resource import complete", {
    files: options.files.length,
    enqueued: options.enqueue,
    environment: env.NODE_ENV,
  });
}

void bootstrap().catch((error: unknown) => {
  logger.error("Resource import failed", { error: errorMessage(error) });
  process.exit(1);
});
