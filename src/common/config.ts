/**
 * Environment configuration, validated with zod
 * @license MIT
 */
import { z } from "zod";
import { newValidationError } from "./errors";

export const APP_VERSION = process.env.npm_package_version ?? "0.0.0";
export const SERVICE_NAME = "line-ingest";

const bool = (fallback: "true" | "false") =>
    z
        .enum(["true", "false", "1", "0"])
        .default(fallback)
        .transform((v) => v === "true" || v === "1");

/** Whole seconds in the environment, milliseconds in the config. */
const seconds = (fallback: number) =>
    z.coerce
        .number()
        .int()
        .nonnegative()
        .default(fallback)
        .transform((s) => s * 1000);

const bytes = (fallback: number) =>
    z.coerce.number().int().nonnegative().default(fallback);

const envSchema = z.object({
    HOST: z.string().min(1).default("0.0.0.0"),
    PORT: z.coerce.number().int().min(0).max(65535).default(8080),
    READ_TIMEOUT: seconds(30),
    WRITE_TIMEOUT: seconds(30),
    IDLE_TIMEOUT: seconds(120),
    SHUTDOWN_TIMEOUT: seconds(30),
    MAX_BODY_SIZE: bytes(10 * 1024 * 1024),

    DATA_FILE: z.string().min(1).default("data.tsv"),
    MAX_FILE_SIZE: bytes(1024 * 1024 * 1024),
    BACKUP_DIR: z.string().min(1).default("backups"),
    COMPRESSION: bool("false"),
    SYNC_ON_WRITE: bool("false"),

    METRICS_ENABLED: bool("true"),
    WRITE_PRINT_POINTS: bool("false"),
    LOG_LEVEL: z
        .enum(["fatal", "error", "warn", "notice", "info", "debug", "trace", "silent"])
        .default("notice")
});

export type ServerConfig = {
    host: string;
    port: number;
    /** ms allowed to receive a whole request */
    readTimeout: number;
    /** ms of socket inactivity before the connection is dropped */
    writeTimeout: number;
    /** ms a keep-alive connection may stay idle */
    idleTimeout: number;
    /** ms granted to a signal-triggered shutdown */
    shutdownTimeout: number;
    bodyLimit: number;
};

export type StorageConfig = {
    dataFile: string;
    /** bytes; 0 disables rotation */
    maxFileSize: number;
    backupDir: string;
    compression: boolean;
    syncOnWrite: boolean;
};

export type AppConfig = {
    server: ServerConfig;
    storage: StorageConfig;
    metrics: { enabled: boolean };
    logging: { level: string; printPoints: boolean };
};

/**
 * Builds the configuration from `env`. Empty variables count as unset.
 * @throws AppError of type `validation` listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const present = Object.fromEntries(
        Object.entries(env).filter(([, v]) => v !== undefined && v !== "")
    );
    const result = envSchema.safeParse(present);
    if (!result.success) {
        const issues = result.error.issues.map(
            (issue) => `${issue.path.join(".")}: ${issue.message}`
        );
        throw newValidationError(
            `configuration validation failed: ${issues.join(", ")}`,
            { issues }
        );
    }
    const e = result.data;
    return {
        server: {
            host: e.HOST,
            port: e.PORT,
            readTimeout: e.READ_TIMEOUT,
            writeTimeout: e.WRITE_TIMEOUT,
            idleTimeout: e.IDLE_TIMEOUT,
            shutdownTimeout: e.SHUTDOWN_TIMEOUT,
            bodyLimit: e.MAX_BODY_SIZE
        },
        storage: {
            dataFile: e.DATA_FILE,
            maxFileSize: e.MAX_FILE_SIZE,
            backupDir: e.BACKUP_DIR,
            compression: e.COMPRESSION,
            syncOnWrite: e.SYNC_ON_WRITE
        },
        metrics: { enabled: e.METRICS_ENABLED },
        logging: { level: e.LOG_LEVEL, printPoints: e.WRITE_PRINT_POINTS }
    };
}

/** Multi-line rendering for the startup log. */
export function describeConfig(config: AppConfig): string {
    const { server, storage } = config;
    return [
        "Server:",
        `  Address: ${server.host}:${server.port}`,
        `  ReadTimeout: ${server.readTimeout}ms`,
        `  WriteTimeout: ${server.writeTimeout}ms`,
        `  IdleTimeout: ${server.idleTimeout}ms`,
        `  ShutdownTimeout: ${server.shutdownTimeout}ms`,
        `  BodyLimit: ${server.bodyLimit}`,
        "Storage:",
        `  DataFile: ${storage.dataFile}`,
        `  MaxFileSize: ${storage.maxFileSize}`,
        `  BackupDir: ${storage.backupDir}`,
        `  Compression: ${storage.compression}`,
        `  SyncOnWrite: ${storage.syncOnWrite}`,
        "Logging:",
        `  Level: ${config.logging.level}`
    ].join("\n");
}
