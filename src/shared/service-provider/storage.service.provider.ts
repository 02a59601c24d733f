/**
 * Append-only TSV persistence of ingested points
 * @license MIT
 */
import { stringify } from "csv-stringify";
import { createReadStream, createWriteStream } from "fs";
import { access, FileHandle, mkdir, open, rename, unlink } from "fs/promises";
import { basename, dirname, join } from "path";
import { pipeline } from "stream/promises";
import { createGzip } from "zlib";
import { StorageConfig } from "../../common/config";
import { newStorageError, wrapWithType } from "../../common/errors";
import { Logger } from "../../common/logger";
import { Point } from "../type/point.type";
import { MetricsRecorder, NOOP_RECORDER } from "./metrics.service.provider";

const logger = new Logger("StorageServiceProvider");

const NS_PER_SEC = 1_000_000_000n;

/** The write path as seen by controllers and the server. */
export interface StorageWriter {
    open(): Promise<void>;
    writePoint(point: Point): Promise<void>;
    close(): Promise<void>;
}

/** `host=server01,region=us-west`; order follows the tag map. */
export function formatTags(tags: ReadonlyMap<string, string>): string {
    const parts: string[] = [];
    for (const [key, value] of tags) parts.push(`${key}=${value}`);
    return parts.join(",");
}

/**
 * Shortest decimal that reads back to the same double, never in
 * exponent notation: 1e21 -> "1000000000000000000000".
 */
export function formatFloat(value: number): string {
    if (Number.isNaN(value)) return "NaN";
    if (value === Infinity) return "+Inf";
    if (value === -Infinity) return "-Inf";
    if (Object.is(value, -0)) return "-0";

    const text = String(value);
    const e = text.indexOf("e");
    if (e === -1) return text;

    const negative = text.startsWith("-");
    const mantissa = text.slice(negative ? 1 : 0, e);
    const exponent = Number(text.slice(e + 1));
    const dot = mantissa.indexOf(".");
    const digits = mantissa.replace(".", "");
    const intLength = (dot === -1 ? mantissa.length : dot) + exponent;

    let out: string;
    if (intLength <= 0) {
        out = `0.${"0".repeat(-intLength)}${digits}`;
    } else if (intLength >= digits.length) {
        out = digits + "0".repeat(intLength - digits.length);
    } else {
        out = `${digits.slice(0, intLength)}.${digits.slice(intLength)}`;
    }
    return negative ? `-${out}` : out;
}

/**
 * RFC 3339 in UTC with up to nine fractional digits, trailing zeros
 * trimmed: 1434055562000000001n -> "2015-06-11T20:46:02.000000001Z".
 */
export function formatTimestamp(ns: bigint): string {
    let seconds = ns / NS_PER_SEC;
    let fraction = ns % NS_PER_SEC;
    if (fraction < 0n) {
        fraction += NS_PER_SEC;
        seconds -= 1n;
    }
    const iso = new Date(Number(seconds) * 1000).toISOString();
    const whole = iso.slice(0, iso.lastIndexOf("."));
    const frac =
        fraction === 0n
            ? ""
            : `.${fraction.toString().padStart(9, "0").replace(/0+$/, "")}`;
    return `${whole}${frac}Z`;
}

/** "YYYYMMDD-HHMMSS" in UTC. */
function rotationStamp(date: Date): string {
    return date
        .toISOString()
        .replace(/[-:]/g, "")
        .replace("T", "-")
        .slice(0, 15);
}

function encodeRows(rows: string[][]): Promise<string> {
    return new Promise((resolve, reject) => {
        stringify(rows, { delimiter: "\t" }, (err, output) => {
            if (err) reject(err);
            else resolve(output);
        });
    });
}

async function exists(path: string): Promise<boolean> {
    try {
        await access(path);
        return true;
    } catch {
        return false;
    }
}

export class StorageServiceProvider implements StorageWriter {
    private handle: FileHandle | null = null;
    private opening: Promise<FileHandle> | null = null;
    private closing: Promise<void> | null = null;
    /** Tail of the write queue; every append runs after the previous one settled. */
    private tail: Promise<void> = Promise.resolve();

    constructor(
        private readonly config: StorageConfig,
        private readonly recorder: MetricsRecorder = NOOP_RECORDER
    ) {}

    get isOpen(): boolean {
        return this.handle !== null;
    }

    get isClosed(): boolean {
        return this.closing !== null;
    }

    async open(): Promise<void> {
        if (this.closing) throw newStorageError("storage is closed");
        await this.acquire();
    }

    /**
     * Appends one row per field. Resolves once every row of the point has
     * been handed to the file in a single write (and synced when
     * `syncOnWrite` is set); rows of concurrent calls never interleave.
     */
    writePoint(point: Point): Promise<void> {
        if (this.closing) {
            return Promise.reject(newStorageError("storage is closed"));
        }
        const run = this.tail.then(() => this.append(point));
        // the caller gets the failure through `run`, the queue keeps going
        this.tail = run.then(
            () => undefined,
            () => undefined
        );
        return run;
    }

    /** Truncates the data file. Queued writes complete first. */
    async clear(): Promise<void> {
        if (this.closing) throw newStorageError("storage is closed");
        const run = this.tail.then(async () => {
            const handle = await this.acquire();
            try {
                await handle.truncate(0);
            } catch (err) {
                throw wrapWithType(err, "storage", "failed to truncate file");
            }
        });
        this.tail = run.then(
            () => undefined,
            () => undefined
        );
        await run;
    }

    /** Releases the file handle after queued writes. Safe to call repeatedly. */
    close(): Promise<void> {
        if (this.closing) {
            // a failed close was already reported to the first caller
            return this.closing.then(
                () => undefined,
                () => undefined
            );
        }
        this.closing = this.release();
        return this.closing;
    }

    private async release(): Promise<void> {
        await this.tail;
        if (this.opening) {
            await this.opening.catch((err: Error) =>
                logger.warn(`Storage never opened: ${err.message}`)
            );
        }
        const handle = this.handle;
        this.handle = null;
        if (!handle) return;
        try {
            await handle.close();
        } catch (err) {
            throw wrapWithType(err, "storage", "failed to close storage file");
        } finally {
            this.recorder.set("storage_connection_status", 0);
        }
        logger.notice(`Storage closed: ${this.config.dataFile}`);
    }

    private acquire(): Promise<FileHandle> {
        if (this.handle) return Promise.resolve(this.handle);
        this.opening ??= this.openFile().finally(() => {
            this.opening = null;
        });
        return this.opening;
    }

    private async openFile(): Promise<FileHandle> {
        try {
            await mkdir(dirname(this.config.dataFile), { recursive: true });
            this.handle = await open(this.config.dataFile, "a");
        } catch (err) {
            throw wrapWithType(err, "storage", "failed to open storage file");
        }
        this.recorder.set("storage_connection_status", 1);
        logger.notice(`Storage  : ${this.config.dataFile}`);
        return this.handle;
    }

    private async append(point: Point): Promise<void> {
        const started = process.hrtime.bigint();
        const handle = await this.rotateIfNeeded(await this.acquire());

        const tags = formatTags(point.tags);
        const time = formatTimestamp(point.timestamp);
        const rows: string[][] = [];
        for (const [key, value] of point.fields) {
            rows.push([point.measurement, tags, key, formatFloat(value), time]);
        }

        try {
            await handle.appendFile(await encodeRows(rows));
            if (this.config.syncOnWrite) await handle.datasync();
        } catch (err) {
            throw wrapWithType(err, "storage", "failed to write point to storage");
        }

        this.recorder.increment("rows_written_total", {}, rows.length);
        this.recorder.observe(
            "storage_write_duration_seconds",
            Number(process.hrtime.bigint() - started) / 1e9
        );
    }

    private async rotateIfNeeded(handle: FileHandle): Promise<FileHandle> {
        if (this.config.maxFileSize <= 0) return handle;
        try {
            const { size } = await handle.stat();
            if (size < this.config.maxFileSize) return handle;
            return await this.rotate(handle);
        } catch (err) {
            throw wrapWithType(err, "storage", "file rotation failed");
        }
    }

    /**
     * Moves the data file to `<backupDir>/<name>.<YYYYMMDD-HHMMSS>` (gzipped
     * when compression is on) and reopens an empty one.
     */
    private async rotate(handle: FileHandle): Promise<FileHandle> {
        const { dataFile, backupDir } = this.config;
        this.handle = null;
        await handle.close();

        await mkdir(backupDir, { recursive: true });
        const stem = join(backupDir, `${basename(dataFile)}.${rotationStamp(new Date())}`);
        let target = stem;
        for (let n = 1; (await exists(target)) || (await exists(`${target}.gz`)); n++) {
            target = `${stem}-${n}`;
        }
        await rename(dataFile, target);

        if (this.config.compression) {
            await pipeline(
                createReadStream(target),
                createGzip(),
                createWriteStream(`${target}.gz`)
            );
            await unlink(target);
            target = `${target}.gz`;
        }

        this.handle = await open(dataFile, "a");
        this.recorder.increment("storage_rotations_total");
        logger.notice(`Storage file rotated: ${dataFile} -> ${target}`);
        return this.handle;
    }
}
