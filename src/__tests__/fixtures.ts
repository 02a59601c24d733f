import { mkdtemp } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { AppConfig, loadConfig } from "../common/config";
import { StorageWriter } from "../shared/service-provider/storage.service.provider";
import { Point } from "../shared/type/point.type";

export function tempDir(): Promise<string> {
    return mkdtemp(join(tmpdir(), "line-ingest-"));
}

export function testConfig(env: NodeJS.ProcessEnv = {}): AppConfig {
    return loadConfig({ HOST: "127.0.0.1", PORT: "0", METRICS_ENABLED: "false", ...env });
}

/** Keeps written points in memory; `failWith` makes writes reject. */
export class MemoryStorage implements StorageWriter {
    readonly points: Point[] = [];
    opened = false;
    closed = false;
    failWith: Error | null = null;
    closeError: Error | null = null;

    async open(): Promise<void> {
        this.opened = true;
    }

    async writePoint(point: Point): Promise<void> {
        if (this.failWith) throw this.failWith;
        this.points.push(point);
    }

    async close(): Promise<void> {
        this.closed = true;
        if (this.closeError) throw this.closeError;
    }
}

/** Holds every write until `release()` is called. */
export class BlockingStorage extends MemoryStorage {
    started = false;
    private gate: Promise<void>;
    private unblock: () => void = () => undefined;

    constructor() {
        super();
        this.gate = new Promise((resolve) => {
            this.unblock = resolve;
        });
    }

    release(): void {
        this.unblock();
    }

    async writePoint(point: Point): Promise<void> {
        this.started = true;
        await this.gate;
        await super.writePoint(point);
    }
}
