import type { PipelineConfig } from "@ragvault/resources";

import { env, type Env } from "./env";

export type PipelineEnv = Pick<
  Env,
  | "RESOURCE_MANAGEMENT"
  | "PARSER"
  | "PARSER_OUTPUT_DIR"
  | "PARSE_METHOD"
  | "USER_ID"
  | "SESSION_ID"
  | "KV_STORAGE"
  | "VECTOR_STORAGE"
  | "GRAPH_STORAGE"
  | "DOC_STATUS_STORAGE"
  | "WORKING_DIR"
  | "WORKSPACE"
  | "POSTGRES_HOST"
  | "POSTGRES_PORT"
  | "POSTGRES_USER"
  | "POSTGRES_PASSWORD"
  | "POSTGRES_MAX_CONNECTIONS"
>;

/**
 * Maps validated environment variables onto the pipeline configuration.
 * `POSTGRES_DATABASE` is not part of it: session setup reads the live value.
 */
export function loadPipelineConfig(source: PipelineEnv = env): PipelineConfig {
  return {
    resourceManagement: source.RESOURCE_MANAGEMENT,
    parser: source.PARSER,
    parserOutputDir: source.PARSER_OUTPUT_DIR,
    parseMethod: source.PARSE_METHOD,
    userId: source.USER_ID ?? null,
    sessionId: source.SESSION_ID ?? null,
    kvStorage: source.KV_STORAGE,
    vectorStorage: source.VECTOR_STORAGE,
    graphStorage: source.GRAPH_STORAGE,
    docStatusStorage: source.DOC_STATUS_STORAGE,
    workingDir: source.WORKING_DIR,
    workspace: source.WORKSPACE,
    postgres: {
      host: source.POSTGRES_HOST,
      port: source.POSTGRES_PORT,
      user: source.POSTGRES_USER,
      password: source.POSTGRES_PASSWORD,
      maxConnections: source.POSTGRES_MAX_CONNECTIONS,
    },
  };
}
