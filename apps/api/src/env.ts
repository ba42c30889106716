import "dotenv/config";
import { createEnv } from "@t3-oss/env-core";
import { z } from "zod";

const TRUE_VALUES = new Set(["true", "1", "yes", "on"]);
const FALSE_VALUES = new Set(["false", "0", "no", "off"]);

const booleanFlag = (fallback: "true" | "false") =>
  z
    .string()
    .default(fallback)
    .transform((value, ctx) => {
      const normalized = value.trim().toLowerCase();
      if (TRUE_VALUES.has(normalized)) return true;
      if (FALSE_VALUES.has(normalized)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a boolean flag, got "${value}"` });
      return z.NEVER;
    });

export const env = createEnv({
  server: {
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    SERVICE_NAME: z.string().min(1).default("ragvault-api"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    RESOURCE_MANAGEMENT: booleanFlag("false"),
    PARSER: z.string().min(1).default("mineru"),
    PARSER_OUTPUT_DIR: z.string().min(1).default("./output"),
    PARSE_METHOD: z.string().min(1).default("auto"),

    USER_ID: z.string().min(1).optional(),
    SESSION_ID: z.string().min(1).optional(),

    KV_STORAGE: z.string().min(1).default("JsonKVStorage"),
    VECTOR_STORAGE: z.string().min(1).default("NanoVectorDBStorage"),
    GRAPH_STORAGE: z.string().min(1).default("NetworkXStorage"),
    DOC_STATUS_STORAGE: z.string().min(1).default("JsonDocStatusStorage"),
    WORKING_DIR: z.string().min(1).default("./rag_storage"),
    WORKSPACE: z.string().default(""),

    POSTGRES_HOST: z.string().min(1).default("localhost"),
    POSTGRES_PORT: z.coerce.number().int().positive().default(5432),
    POSTGRES_USER: z.string().min(1).default("postgres"),
    POSTGRES_PASSWORD: z.string().optional(),
    POSTGRES_DATABASE: z.string().min(1).optional(),
    POSTGRES_MAX_CONNECTIONS: z.coerce.number().int().positive().default(10),

    REDIS_URL: z.string().url().default("redis://localhost:6379"),
    QUEUE_PREFIX: z.string().min(1).default("ragvault"),
    IMPORT_CONCURRENCY: z.coerce.number().int().positive().default(1),
  },
  runtimeEnv: {
    NODE_ENV: process.env.NODE_ENV,
    SERVICE_NAME: process.env.SERVICE_NAME,
    LOG_LEVEL: process.env.LOG_LEVEL,
    RESOURCE_MANAGEMENT: process.env.RESOURCE_MANAGEMENT,
    PARSER: process.env.PARSER,
    PARSER_OUTPUT_DIR: process.env.PARSER_OUTPUT_DIR,
    PARSE_METHOD: process.env.PARSE_METHOD,
    USER_ID: process.env.USER_ID,
    SESSION_ID: process.env.SESSION_ID,
    KV_STORAGE: process.env.KV_STORAGE,
    VECTOR_STORAGE: process.env.VECTOR_STORAGE,
    GRAPH_STORAGE: process.env.GRAPH_STORAGE,
    DOC_STATUS_STORAGE: process.env.DOC_STATUS_STORAGE,
    WORKING_DIR: process.env.WORKING_DIR,
    WORKSPACE: process.env.WORKSPACE,
    POSTGRES_HOST: process.env.POSTGRES_HOST,
    POSTGRES_PORT: process.env.POSTGRES_PORT,
    POSTGRES_USER: process.env.POSTGRES_USER,
    POSTGRES_PASSWORD: process.env.POSTGRES_PASSWORD,
    POSTGRES_DATABASE: process.env.POSTGRES_DATABASE,
    POSTGRES_MAX_CONNECTIONS: process.env.POSTGRES_MAX_CONNECTIONS,
    REDIS_URL: process.env.REDIS_URL,
    QUEUE_PREFIX: process.env.QUEUE_PREFIX,
    IMPORT_CONCURRENCY: process.env.IMPORT_CONCURRENCY,
  },
  emptyStringAsUndefined: true,
});

export type Env = typeof env;
