import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";
import process from "node:process";

import { getCallContext } from "./infra/callContext.js";

/** Default placeholder inserted when a secret token is redacted. */
const REDACTION_TOKEN = "[REDACTED]";

/** Accepted directives enabling custom secret redaction. */
const REDACTION_ENABLE_TOKENS = new Set(["on", "true", "yes", "1", "enable", "enabled"]);

/** Directives explicitly disabling secret redaction despite configured tokens. */
const REDACTION_DISABLE_TOKENS = new Set(["off", "false", "no", "0", "disable", "disabled"]);

/** Keys whose payload values are replaced once redaction is enabled. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "proxy-authorization",
  "x-api-key",
  "api-key",
  "api_key",
  "apikey",
  "token",
  "access_token",
  "refresh_token",
  "password",
  "secret",
  "cookie",
  "set-cookie",
]);

/**
 * Parses redaction directives such as `"on,sk-"` or `"off"`. Toggles switch
 * payload redaction; anything else is a substring scrubbed from log lines.
 * Substrings without a toggle enable redaction.
 */
export function parseRedactionDirectives(raw: string | null | undefined): {
  enabled: boolean;
  tokens: Array<string>;
} {
  if (!raw) {
    return { enabled: false, tokens: [] };
  }

  const directives = raw
    .split(",")
    .map((value) => value.trim())
    .filter((value) => value.length > 0);

  if (directives.length === 0) {
    return { enabled: false, tokens: [] };
  }

  let enabled: boolean | undefined;
  const tokens: Array<string> = [];

  for (const directive of directives) {
    const normalised = directive.toLowerCase();
    if (REDACTION_DISABLE_TOKENS.has(normalised)) {
      enabled = false;
      continue;
    }
    if (REDACTION_ENABLE_TOKENS.has(normalised)) {
      enabled = true;
      continue;
    }
    tokens.push(directive);
  }

  if (enabled === undefined) {
    enabled = tokens.length > 0;
  }

  return { enabled, tokens: Array.from(new Set(tokens)) };
}

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const DEFAULT_MAX_FILE_BYTES = 5 * 1024 * 1024;
const DEFAULT_MAX_FILES = 5;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
  call_id?: string;
  tool?: string;
  batch_index?: number;
}

export interface LoggerOptions {
  readonly logFile?: string | null;
  /** Entries below this level are dropped. Defaults to `debug`. */
  readonly minLevel?: LogLevel;
  /** Size at which the log file is rotated. */
  readonly maxFileBytes?: number;
  /** Log files kept, the active one included. */
  readonly maxFiles?: number;
  /** Directives in the format read by {@link parseRedactionDirectives}. */
  readonly redact?: string | null;
  /** Extra tokens or patterns scrubbed from every line. */
  readonly redactSecrets?: Array<string | RegExp>;
  /** Overrides the payload redaction toggle of {@link redact}. */
  readonly redactionEnabled?: boolean;
  /** Suppresses the console mirror (entries still reach the file and listener). */
  readonly silent?: boolean;
  /** Console stream receiving the entries. Stdio transports need `stderr`. */
  readonly stream?: "stdout" | "stderr";
  readonly onEntry?: (entry: LogEntry) => void;
}

/**
 * Emits JSON lines on the console and optionally appends them to a rotated
 * log file. File writes go through one queue so lines keep their order.
 */
export class StructuredLogger {
  private readonly logFile: string | null;
  private readonly minLevel: LogLevel;
  private readonly maxFileBytes: number;
  private readonly maxFiles: number;
  private readonly redactSecrets: Array<string | RegExp>;
  private readonly redactionEnabled: boolean;
  private readonly silent: boolean;
  private readonly stream: "stdout" | "stderr";
  private readonly entryListener?: (entry: LogEntry) => void;
  private writeQueue: Promise<void> = Promise.resolve();
  private directoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? null;
    this.minLevel = options.minLevel ?? "debug";
    this.maxFileBytes = Math.max(1, options.maxFileBytes ?? DEFAULT_MAX_FILE_BYTES);
    this.maxFiles = Math.max(1, options.maxFiles ?? DEFAULT_MAX_FILES);
    const directives = parseRedactionDirectives(options.redact);
    this.redactSecrets = [...new Set<string | RegExp>([...directives.tokens, ...(options.redactSecrets ?? [])])];
    this.redactionEnabled = options.redactionEnabled ?? directives.enabled;
    this.silent = options.silent ?? false;
    this.stream = options.stream ?? "stdout";
    this.entryListener = options.onEntry;
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  /** Resolves once every queued file write has finished. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }
    const context = getCallContext();
    const safePayload = payload !== undefined && this.redactionEnabled ? redactKeys(payload) : payload;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(context ? { call_id: context.callId, tool: context.tool } : {}),
      ...(context?.batchIndex !== undefined ? { batch_index: context.batchIndex } : {}),
      ...(safePayload !== undefined ? { payload: safePayload } : {}),
    };
    const line = `${this.scrubSecrets(JSON.stringify(entry))}\n`;
    if (!this.silent) {
      process[this.stream].write(line);
    }
    this.entryListener?.(structuredClone(entry));
    const logFile = this.logFile;
    if (logFile !== null) {
      this.writeQueue = this.writeQueue.then(() => this.append(logFile, line));
    }
  }

  private async append(logFile: string, line: string): Promise<void> {
    try {
      if (!this.directoryReady) {
        await mkdir(dirname(logFile), { recursive: true });
        this.directoryReady = true;
      }
    } catch (error) {
      reportFileFailure("log_file_write_failed", error);
      return;
    }
    try {
      await this.rotateIfNeeded(logFile, Buffer.byteLength(line, "utf8"));
    } catch (error) {
      reportFileFailure("log_file_rotation_failed", error);
    }
    try {
      await appendFile(logFile, line, "utf8");
    } catch (error) {
      this.directoryReady = false;
      reportFileFailure("log_file_write_failed", error);
    }
  }

  /** Shifts `file.k` to `file.k+1` and drops what falls beyond {@link maxFiles}. */
  private async rotateIfNeeded(logFile: string, pendingBytes: number): Promise<void> {
    const size = await fileSize(logFile);
    if (size === 0 || size + pendingBytes <= this.maxFileBytes) {
      return;
    }
    await rm(archiveName(logFile, this.maxFiles - 1), { force: true });
    for (let index = this.maxFiles - 1; index >= 1; index -= 1) {
      await renameIfPresent(archiveName(logFile, index - 1), archiveName(logFile, index));
    }
  }

  private scrubSecrets(line: string): string {
    let sanitized = line;
    for (const pattern of this.redactSecrets) {
      if (typeof pattern === "string") {
        sanitized = pattern.length > 0 ? sanitized.split(pattern).join(REDACTION_TOKEN) : sanitized;
      } else {
        sanitized = sanitized.replace(pattern, REDACTION_TOKEN);
      }
    }
    return sanitized;
  }
}

function redactKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(redactKeys);
  }
  if (value && typeof value === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : redactKeys(entry);
    }
    return result;
  }
  return value;
}

/** `engine.log` for index 0, `engine.log.N` for the archives. */
function archiveName(logFile: string, index: number): string {
  return index === 0 ? logFile : `${logFile}.${index}`;
}

async function fileSize(file: string): Promise<number> {
  try {
    return (await stat(file)).size;
  } catch (error) {
    if (isMissingFile(error)) {
      return 0;
    }
    throw error;
  }
}

async function renameIfPresent(from: string, to: string): Promise<void> {
  try {
    await rename(from, to);
  } catch (error) {
    if (!isMissingFile(error)) {
      throw error;
    }
  }
}

/** Writes a file failure to stderr, outside the write queue. */
function reportFileFailure(message: string, error: unknown): void {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level: "error",
    message,
    payload: error instanceof Error ? { message: error.message } : { error: String(error) },
  };
  process.stderr.write(`${JSON.stringify(entry)}\n`);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
