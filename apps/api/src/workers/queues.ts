import { Queue, type Job, type JobsOptions, type Worker, type WorkerOptions } from "bullmq";
import IORedis from "ioredis";

import { env } from "../env";
import { errorMessage, logger } from "../logging";
import type { QueueName, ResourceImportJob } from "./types";

export const RESOURCE_IMPORT_QUEUE: QueueName = "resource-import";
export const RESOURCE_IMPORT_DLQ: QueueName = "resource-import:dlq";

export const importJobOptions = {
  attempts: 3,
  backoff: { type: "exponential", delay: 5_000 },
  removeOnComplete: 100,
  removeOnFail: false,
} satisfies JobsOptions;

let connection: IORedis | null = null;
let importQueue: Queue<ResourceImportJob> | null = null;
let importDlq: Queue<ResourceImportJob> | null = null;

// Opened on first use so importing this module never dials Redis.
export const redisConnection = () => {
  connection ??= new IORedis(env.REDIS_URL, { maxRetriesPerRequest: null });
  return connection;
};

const baseOptions = () => ({ connection: redisConnection(), prefix: env.QUEUE_PREFIX });

export const getResourceImportQueue = () => {
  importQueue ??= new Queue<ResourceImportJob>(RESOURCE_IMPORT_QUEUE, {
    ...baseOptions(),
    defaultJobOptions: importJobOptions,
  });
  return importQueue;
};

export const getResourceImportDlq = () => {
  importDlq ??= new Queue<ResourceImportJob>(RESOURCE_IMPORT_DLQ, baseOptions());
  return importDlq;
};

/** A retried job rewrites the same content-addressed keys. */
export async function enqueueResourceImport(job: ResourceImportJob, options: JobsOptions = {}) {
  const queued = await getResourceImportQueue().add(RESOURCE_IMPORT_QUEUE, job, options);
  logger.event("resource_import.enqueued", { jobId: queued.id, filePath: job.filePath });
  return queued;
}

/** True once BullMQ will not retry the job again. */
export const hasExhaustedAttempts = (job: Pick<Job, "attemptsMade" | "opts">) =>
  job.attemptsMade >= (job.opts.attempts ?? 1);

export const registerFailureHandler = (worker: Worker<ResourceImportJob>, dlq: Queue<ResourceImportJob>) => {
  worker.on("failed", (job, err) => {
    if (!job) {
      logger.error("Job failed without job data", { queue: worker.name, error: err.message });
      return;
    }

    logger.error("Job failed", {
      queue: job.queueName,
      jobId: job.id,
      attemptsMade: job.attemptsMade,
      error: err.message,
    });
    if (!hasExhaustedAttempts(job)) return;

    dlq
      .add(RESOURCE_IMPORT_DLQ, job.data, { attempts: 1, removeOnComplete: 500 })
      .catch((dlqError: unknown) =>
        logger.error("Failed to move job to dead-letter queue", { jobId: job.id, error: errorMessage(dlqError) }),
      );
  });
};

export const workerOptions = (overrides: Partial<WorkerOptions> = {}): WorkerOptions => ({
  ...overrides,
  connection: redisConnection(),
  prefix: env.QUEUE_PREFIX,
});

export async function closeQueues() {
  await Promise.all([importQueue?.close(), importDlq?.close()]);
  importQueue = null;
  importDlq = null;
  if (connection) {
    await connection.quit();
    connection = null;
  }
}
