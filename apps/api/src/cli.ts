import type { ImportOptions, Logger } from "@ragvault/resources";

import type { ResourcePipeline } from "./pipeline";
import type { ResourceImportJob } from "./workers/types";

export interface CliOptions extends ImportOptions {
  files: string[];
  enqueue: boolean;
}

export const USAGE =
  "usage: ragvault-import [--enqueue] [--output-dir <dir>] [--method <method>] [--backend <backend>] <file...>";

export class CliUsageError extends Error {
  constructor(message: string) {
    super(`${message}\n${USAGE}`);
    this.name = "CliUsageError";
  }
}

export function parseCliArgs(args: string[]): CliOptions {
  const options: CliOptions = { files: [], enqueue: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const takeValue = () => {
      const value = args[++i];
      if (value === undefined || value.startsWith("--")) {
        throw new CliUsageError(`${arg} expects a value`);
      }
      return value;
    };

    if (arg === "--enqueue") {
      options.enqueue = true;
    } else if (arg === "--output-dir") {
      options.outputDir = takeValue();
    } else if (arg === "--method") {
      options.parseMethod = takeValue();
    } else if (arg === "--backend") {
      options.backend = takeValue();
    } else if (arg.startsWith("--")) {
      throw new CliUsageError(`Unknown option ${arg}`);
    } else {
      options.files.push(arg);
    }
  }

  if (!options.files.length) {
    throw new CliUsageError("No input files given");
  }
  return options;
}

export interface CliDependencies {
  pipeline: Pick<ResourcePipeline, "setup" | "ingest" | "shutdown">;
  enqueue: (job: ResourceImportJob) => Promise<unknown>;
  logger: Logger;
}

/** Ingests or enqueues every file in order; the first failure stops the run. */
export async function runCli(options: CliOptions, deps: CliDependencies): Promise<void> {
  const { files, enqueue, ...importOptions } = options;

  if (enqueue) {
    for (const filePath of files) {
      await deps.enqueue({ filePath, ...importOptions });
    }
    deps.logger.info("Queued resource imports", { count: files.length });
    return;
  }

  await deps.pipeline.setup();
  try {
    for (const filePath of files) {
      const result = await deps.pipeline.ingest(filePath, importOptions);
      deps.logger.info("Imported resource", { filePath, status: result.parsed.status });
    }
  } finally {
    await deps.pipeline.shutdown();
  }
}
