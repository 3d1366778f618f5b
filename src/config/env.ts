import dotenv from "dotenv";
import { LogLevel } from "./logger";

dotenv.config();

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  supabaseUrl?: string;
  supabaseKey?: string;
  supabaseServiceKey?: string;
  storageBucket: string;
  corsOrigin: string;
  resumeFetchLimit: number;
  logLevel: LogLevel;
  logFile?: string;
  logFileMaxBytes: number;
  logFileBackups: number;
}

type EnvSource = Record<string, string | undefined>;

function getOptionalTrimmed(source: EnvSource, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(source: EnvSource = process.env): EnvConfig {
  const portRaw = source.PORT ?? "5000";
  const port = Number(portRaw);
  const fetchLimitRaw = source.RESUME_FETCH_LIMIT ?? "3000";
  const resumeFetchLimit = Number(fetchLimitRaw);
  const logLevelRaw = (source.LOG_LEVEL ?? "info").trim().toLowerCase();
  const logFileMaxBytesRaw = source.LOG_FILE_MAX_BYTES ?? "10240";
  const logFileMaxBytes = Number(logFileMaxBytesRaw);
  const logFileBackupsRaw = source.LOG_FILE_BACKUPS ?? "10";
  const logFileBackups = Number(logFileBackupsRaw);

  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid PORT value: ${portRaw}`);
  }
  if (!Number.isInteger(resumeFetchLimit) || resumeFetchLimit <= 0) {
    throw new Error(`Invalid RESUME_FETCH_LIMIT value: ${fetchLimitRaw}`);
  }
  if (!Number.isInteger(logFileMaxBytes) || logFileMaxBytes < 1024) {
    throw new Error(`Invalid LOG_FILE_MAX_BYTES value: ${logFileMaxBytesRaw}`);
  }
  if (!Number.isInteger(logFileBackups) || logFileBackups < 0) {
    throw new Error(`Invalid LOG_FILE_BACKUPS value: ${logFileBackupsRaw}`);
  }

  const supabaseKey = getOptionalTrimmed(source, "SUPABASE_KEY");

  return Object.freeze({
    nodeEnv: source.NODE_ENV ?? "development",
    port,
    supabaseUrl: getOptionalTrimmed(source, "SUPABASE_URL")?.replace(/\/+$/, ""),
    supabaseKey,
    supabaseServiceKey: getOptionalTrimmed(source, "SUPABASE_SERVICE_KEY") ?? supabaseKey,
    storageBucket: getOptionalTrimmed(source, "STORAGE_BUCKET") ?? "cv-pdfs",
    corsOrigin: getOptionalTrimmed(source, "CORS_ORIGIN") ?? "http://localhost:3000",
    resumeFetchLimit,
    logLevel: parseLogLevel(logLevelRaw),
    logFile: getOptionalTrimmed(source, "LOG_FILE"),
    logFileMaxBytes,
    logFileBackups,
  });
}

function parseLogLevel(value: string): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new Error(`Invalid LOG_LEVEL value: ${value}`);
}
