import { Worker, type Job } from "bullmq";

import { env } from "../env";
import { logger } from "../logging";
import type { IngestResult, ResourcePipeline } from "../pipeline";
import { getResourceImportDlq, registerFailureHandler, RESOURCE_IMPORT_QUEUE, workerOptions } from "./queues";
import type { ResourceImportJob } from "./types";

export async function processResourceImport(
  pipeline: Pick<ResourcePipeline, "ingest">,
  job: Pick<Job<ResourceImportJob>, "id" | "data">,
): Promise<IngestResult> {
  const { filePath, outputDir, parseMethod, backend } = job.data;
  const result = await pipeline.ingest(filePath, { outputDir, parseMethod, backend });

  logger.event("resource_import.completed", {
    jobId: job.id,
    filePath,
    status: result.parsed.status,
    ...(result.parsed.status === "stored"
      ? { docId: result.parsed.docId, contentItems: result.parsed.contentItems, images: result.parsed.images }
      : { reason: result.parsed.reason }),
  });
  return result;
}

export function createResourceImportWorker(pipeline: ResourcePipeline) {
  const worker = new Worker<ResourceImportJob, IngestResult>(
    RESOURCE_IMPORT_QUEUE,
    (job) => processResourceImport(pipeline, job),
    workerOptions({ concurrency: env.IMPORT_CONCURRENCY }),
  );
  registerFailureHandler(worker, getResourceImportDlq());
  return worker;
}
