import { appendFile, rename, stat, unlink } from "node:fs/promises";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export interface ManagedLogger extends Logger {
  /** Writes everything queued for the file sink. Resolves once the batch is on disk. */
  flush(): Promise<void>;
}

export interface CreateLoggerOptions {
  minLevel?: LogLevel;
  stdout?: boolean;
  file?: {
    path: string;
    maxBytes: number;
    backups: number;
    batchMs?: number;
  };
}

interface SinkEntry {
  level: LogLevel;
  message: string;
  meta?: Record<string, unknown>;
  timestamp: string;
}

export function createLogger(options?: CreateLoggerOptions): ManagedLogger {
  const minLevel = options?.minLevel ?? "info";
  const writeStdout = options?.stdout ?? true;
  const sink = options?.file
    ? new RotatingFileSink(
        options.file.path,
        options.file.maxBytes,
        options.file.backups,
        Math.max(10, Math.floor(options.file.batchMs ?? 250)),
      )
    : undefined;

  function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[minLevel]) {
      return;
    }
    const entry: SinkEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      meta,
    };
    if (writeStdout) {
      process.stdout.write(`${formatJsonLine(entry)}\n`);
    }
    sink?.enqueue(entry);
  }

  return {
    debug(message, meta) {
      log("debug", message, meta);
    },
    info(message, meta) {
      log("info", message, meta);
    },
    warn(message, meta) {
      log("warn", message, meta);
    },
    error(message, meta) {
      log("error", message, meta);
    },
    flush() {
      return sink ? sink.flush() : Promise.resolve();
    },
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}

class RotatingFileSink {
  private readonly queue: SinkEntry[] = [];
  private flushTimer: NodeJS.Timeout | null = null;
  private writing: Promise<void> = Promise.resolve();

  constructor(
    private readonly path: string,
    private readonly maxBytes: number,
    private readonly backups: number,
    private readonly batchMs: number,
  ) {}

  enqueue(entry: SinkEntry): void {
    this.queue.push(entry);
    this.scheduleFlush();
  }

  flush(): Promise<void> {
    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
    const batch = this.queue.splice(0, this.queue.length);
    if (batch.length > 0) {
      const text = batch.map((entry) => formatFileLine(entry)).join("\n") + "\n";
      this.writing = this.writing.then(() => this.write(text));
    }
    return this.writing;
  }

  private scheduleFlush(): void {
    if (this.flushTimer) {
      return;
    }
    this.flushTimer = setTimeout(() => {
      this.flushTimer = null;
      void this.flush();
    }, this.batchMs);
    this.flushTimer.unref();
  }

  private async write(text: string): Promise<void> {
    try {
      const currentSize = await fileSize(this.path);
      if (currentSize > 0 && currentSize + Buffer.byteLength(text) > this.maxBytes) {
        await this.rotate();
      }
      await appendFile(this.path, text, "utf8");
    } catch (error) {
      // The file sink must never break the request path; stdout still has the entry.
      process.stderr.write(`log_file_write_failed: ${errorMessage(error)}\n`);
    }
  }

  private async rotate(): Promise<void> {
    if (this.backups === 0) {
      await unlink(this.path);
      return;
    }
    for (let index = this.backups - 1; index >= 1; index -= 1) {
      await renameIfExists(`${this.path}.${index}`, `${this.path}.${index + 1}`);
    }
    await rename(this.path, `${this.path}.1`);
  }
}

async function fileSize(path: string): Promise<number> {
  try {
    const info = await stat(path);
    return info.size;
  } catch (error) {
    if (isMissingFileError(error)) {
      return 0;
    }
    throw error;
  }
}

async function renameIfExists(from: string, to: string): Promise<void> {
  try {
    await rename(from, to);
  } catch (error) {
    if (!isMissingFileError(error)) {
      throw error;
    }
  }
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function formatJsonLine(entry: SinkEntry): string {
  const payload: Record<string, unknown> = {
    timestamp: entry.timestamp,
    level: entry.level,
    message: entry.message,
  };
  if (entry.meta) {
    payload.meta = entry.meta;
  }
  return safeJson(payload);
}

function formatFileLine(entry: SinkEntry): string {
  const metaText = entry.meta ? ` ${safeJson(redactMeta(entry.meta))}` : "";
  return `${entry.timestamp} ${entry.level.toUpperCase()}: ${entry.message}${metaText}`;
}

export function redactMeta(meta: Record<string, unknown>): Record<string, unknown> {
  const output: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    const lowerKey = key.toLowerCase();
    if (
      lowerKey.includes("token") ||
      lowerKey.includes("secret") ||
      lowerKey.includes("apikey") ||
      lowerKey.includes("api_key") ||
      lowerKey.includes("authorization")
    ) {
      output[key] = "[REDACTED]";
      continue;
    }
    if (typeof value === "string" && value.length > 500) {
      output[key] = `${value.slice(0, 500)}...`;
      continue;
    }
    output[key] = value;
  }
  return output;
}

function safeJson(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return "\"[unserializable]\"";
  }
}
