import { delimiter } from "node:path";
import process from "node:process";

import { MAX_TIMEOUT_MS } from "../infra/deadline.js";
import type { LoggerOptions, LogLevel } from "../logger.js";
import {
  readBool,
  readEnum,
  readInt,
  readList,
  readOptionalString,
  type EnvSource,
} from "./env.js";

/** Default deadline applied to executions without an explicit timeout. */
export const DEFAULT_TIMEOUT_MS = 30_000;
/** Default bound on the number of health records kept in memory. */
export const DEFAULT_HEALTH_MAX_RECORDS = 1_000;
/** Default number of results kept by the result cache. */
export const DEFAULT_RESULT_CACHE_SIZE = 256;
/** Default TTL applied to cached results (5 minutes). */
export const DEFAULT_RESULT_CACHE_TTL_MS = 5 * 60 * 1_000;
/** Size at which the log file is rotated (5 MiB). */
export const DEFAULT_LOG_MAX_FILE_BYTES = 5 * 1024 * 1024;
/** Log files kept, the active one included. */
export const DEFAULT_LOG_MAX_FILES = 5;

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/** Where the catalog comes from and which subset of it is exposed. */
export interface CatalogSourceConfig {
  /** Files or directories holding JSON tool records. */
  readonly paths: readonly string[];
  /** When non-empty only these tool names are loaded. */
  readonly include: readonly string[];
  /** Tool names dropped after loading. */
  readonly exclude: readonly string[];
  /** When non-empty only tools from these categories are loaded. */
  readonly categories: readonly string[];
}

/** Fully resolved engine configuration. */
export interface EngineConfig {
  readonly catalog: CatalogSourceConfig;
  readonly defaultTimeoutMs: number;
  readonly healthMaxRecords: number;
  /**
   * Consecutive timeout/transient failures after which a tool is marked
   * unavailable. `0` keeps non-permanent failures out of the health record.
   */
  readonly transientEscalationThreshold: number;
  readonly resultCache: {
    readonly enabled: boolean;
    readonly maxEntries: number;
    readonly defaultTtlMs: number;
  };
  /** Maximum number of batch items executed at once (`0` = unbounded). */
  readonly batchConcurrency: number;
  readonly log: {
    readonly file: string | null;
    readonly level: LogLevel;
    readonly maxFileBytes: number;
    readonly maxFiles: number;
    /** Raw redaction directives (`on`, `off` or comma separated tokens). */
    readonly redact: string | null;
  };
}

/** Builds an {@link EngineConfig} from environment variables. */
export function loadEngineConfig(env: EnvSource = process.env): EngineConfig {
  return {
    catalog: {
      paths: readList("TOOL_ENGINE_CATALOG_PATHS", env, delimiter),
      include: readList("TOOL_ENGINE_INCLUDE", env),
      exclude: readList("TOOL_ENGINE_EXCLUDE", env),
      categories: readList("TOOL_ENGINE_CATEGORIES", env),
    },
    defaultTimeoutMs: readInt("TOOL_ENGINE_DEFAULT_TIMEOUT_MS", DEFAULT_TIMEOUT_MS, { min: 1, max: MAX_TIMEOUT_MS }, env),
    healthMaxRecords: readInt("TOOL_ENGINE_HEALTH_MAX_RECORDS", DEFAULT_HEALTH_MAX_RECORDS, { min: 1 }, env),
    transientEscalationThreshold: readInt("TOOL_ENGINE_TRANSIENT_ESCALATION", 0, { min: 0 }, env),
    resultCache: {
      enabled: readBool("TOOL_ENGINE_RESULT_CACHE", true, env),
      maxEntries: readInt("TOOL_ENGINE_RESULT_CACHE_SIZE", DEFAULT_RESULT_CACHE_SIZE, { min: 0 }, env),
      defaultTtlMs: readInt("TOOL_ENGINE_RESULT_CACHE_TTL_MS", DEFAULT_RESULT_CACHE_TTL_MS, { min: 1 }, env),
    },
    batchConcurrency: readInt("TOOL_ENGINE_BATCH_CONCURRENCY", 0, { min: 0 }, env),
    log: {
      file: readOptionalString("TOOL_ENGINE_LOG_FILE", env) ?? null,
      level: readEnum("TOOL_ENGINE_LOG_LEVEL", LOG_LEVELS, "info", env),
      maxFileBytes: readInt("TOOL_ENGINE_LOG_MAX_BYTES", DEFAULT_LOG_MAX_FILE_BYTES, { min: 1 }, env),
      maxFiles: readInt("TOOL_ENGINE_LOG_MAX_FILES", DEFAULT_LOG_MAX_FILES, { min: 1 }, env),
      redact: readOptionalString("TOOL_ENGINE_LOG_REDACT", env) ?? null,
    },
  };
}

/** Logger options derived from the `log` section. */
export function loggerOptions(log: EngineConfig["log"]): LoggerOptions {
  return {
    logFile: log.file,
    minLevel: log.level,
    maxFileBytes: log.maxFileBytes,
    maxFiles: log.maxFiles,
    redact: log.redact,
  };
}
