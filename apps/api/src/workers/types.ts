export interface ResourceImportJob {
  filePath: string;
  outputDir?: string;
  parseMethod?: string;
  backend?: string;
}

export type QueueName = "resource-import" | "resource-import:dlq";
