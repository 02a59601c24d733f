/**
 * HTTP listener and storage lifecycle
 * @license MIT
 */
import { once } from "events";
import Fastify, { FastifyInstance, FastifyRequest } from "fastify";
import { APP_VERSION, AppConfig, SERVICE_NAME } from "../common/config";
import { registerErrorHandler } from "../common/error-handler";
import { newTimeoutError, newValidationError } from "../common/errors";
import { Logger } from "../common/logger";
import { HealthController } from "../controller/health.controller";
import { MetricsController } from "../controller/metrics.controller";
import { WriteController } from "../controller/write.controller";
import {
    MetricsExposition,
    MetricsRecorder,
    MetricsServiceProvider
} from "../shared/service-provider/metrics.service.provider";
import {
    StorageServiceProvider,
    StorageWriter
} from "../shared/service-provider/storage.service.provider";
import { ReadyResponse } from "../shared/type/response.type";
import {
    SERVER_STATUS_CODE,
    ServerMetricsSnapshot,
    ServerStatus
} from "../shared/type/server.type";

const logger = new Logger("IngestServer");

// stopped is terminal; a server is never restarted
const TRANSITIONS: ReadonlyMap<ServerStatus, ReadonlySet<ServerStatus>> = new Map([
    [
        ServerStatus.Starting,
        new Set([ServerStatus.Running, ServerStatus.ShuttingDown, ServerStatus.Stopped])
    ],
    [ServerStatus.Running, new Set([ServerStatus.ShuttingDown, ServerStatus.Stopped])],
    [ServerStatus.ShuttingDown, new Set([ServerStatus.Stopped])],
    [ServerStatus.Stopped, new Set<ServerStatus>()]
]);

export type IngestServerOptions = {
    metrics?: MetricsRecorder & MetricsExposition;
    /** Replaces the file-backed writer; `null` runs without storage. */
    storage?: StorageWriter | null;
};

/** Resolves when `signal` aborts; `dispose` detaches the listener. */
function whenAborted(signal: AbortSignal): { aborted: Promise<"aborted">; dispose: () => void } {
    let onAbort: () => void = () => undefined;
    const aborted = new Promise<"aborted">((resolve) => {
        onAbort = () => resolve("aborted");
        if (signal.aborted) onAbort();
        else signal.addEventListener("abort", onAbort, { once: true });
    });
    return { aborted, dispose: () => signal.removeEventListener("abort", onAbort) };
}

export class IngestServer {
    readonly app: FastifyInstance;
    private readonly config: AppConfig;
    private readonly metrics: MetricsRecorder & MetricsExposition;
    private storage: StorageWriter | null;
    private readonly startTime = new Date();
    private status = ServerStatus.Starting;
    private activeConnections = 0;
    private idleWaiters: Array<() => void> = [];
    private healthy = true;
    private readonly inFlight = new WeakSet<FastifyRequest>();
    private stopping: Promise<void> | null = null;

    /** @throws AppError of type `validation` when `config` is missing */
    constructor(config: AppConfig | null | undefined, options: IngestServerOptions = {}) {
        if (!config) {
            throw newValidationError("config cannot be nil");
        }
        this.config = config;
        this.metrics =
            options.metrics ??
            new MetricsServiceProvider({ defaultMetrics: config.metrics.enabled });
        this.storage =
            options.storage === undefined
                ? new StorageServiceProvider(config.storage, this.metrics)
                : options.storage;

        const { server } = config;
        this.app = Fastify({
            logger: Logger.config,
            requestTimeout: server.readTimeout,
            connectionTimeout: server.writeTimeout,
            keepAliveTimeout: server.idleTimeout,
            bodyLimit: server.bodyLimit
        });

        // a request is uncounted exactly once, whether it completes or the
        // client goes away before the reply
        this.app.addHook("onRequest", async (req, res) => {
            this.inFlight.add(req);
            this.incrementConnection();
            res.raw.once("close", () => this.settle(req));
        });
        this.app.addHook("onRequestAbort", async (req) => {
            this.settle(req);
        });
        this.app.addHook("onResponse", async (req, res) => {
            this.settle(req);
            const endpoint = req.routeOptions.url ?? "unmatched";
            this.metrics.increment("http_requests_total", {
                method: req.method,
                endpoint,
                status_code: res.statusCode
            });
            this.metrics.observe("http_request_duration_seconds", res.elapsedTime / 1000, {
                method: req.method,
                endpoint
            });
        });

        registerErrorHandler(this.app, this.metrics);
        new WriteController(
            () => this.storage,
            this.metrics,
            config.logging.printPoints
        ).register(this.app);
        new HealthController(SERVICE_NAME, () => this.readiness()).register(this.app);
        new MetricsController(this.metrics, () => this.refreshGauges()).register(this.app);

        this.metrics.set("server_status", SERVER_STATUS_CODE[this.status]);
        this.metrics.set("server_start_time_seconds", Math.floor(this.startTime.getTime() / 1000));
        this.metrics.set("server_config_port", server.port);
        this.metrics.set("server_health", 1);
    }

    /**
     * Opens storage, starts listening and resolves once the listener has
     * closed again. Rejects when storage cannot be opened or the port
     * cannot be bound.
     */
    async start(): Promise<void> {
        if (this.status !== ServerStatus.Starting) {
            throw newValidationError(`cannot start a server that is ${this.status}`);
        }
        const { host, port } = this.config.server;
        logger.notice(`Starting ${SERVICE_NAME} on ${host}:${port}...`);

        if (this.storage) await this.storage.open();
        const address = await this.app.listen({ host, port });

        // shutdown may have begun while we were binding
        if (!this.transition(ServerStatus.Running)) return;
        logger.notice(`Server listening at ${address}. Version ${APP_VERSION}`);
        logger.notice(`Metrics available at ${address}/metrics`);

        if (this.app.server.listening) {
            await once(this.app.server, "close");
        }
    }

    getStatus(): ServerStatus {
        return this.status;
    }

    getStartTime(): Date {
        return this.startTime;
    }

    incrementConnection(): void {
        this.activeConnections++;
        this.metrics.set("server_active_connections", this.activeConnections);
    }

    /** Never goes below zero, however unbalanced the calls are. */
    decrementConnection(): void {
        this.activeConnections = Math.max(0, this.activeConnections - 1);
        this.metrics.set("server_active_connections", this.activeConnections);
        if (this.activeConnections === 0) {
            for (const resolve of this.idleWaiters.splice(0)) resolve();
        }
    }

    getActiveConnections(): number {
        return this.activeConnections;
    }

    /** Readiness flag, independent of the lifecycle status. */
    setHealth(healthy: boolean): void {
        this.healthy = healthy;
        this.metrics.set("server_health", healthy ? 1 : 0);
    }

    isHealthy(): boolean {
        return this.healthy;
    }

    getMetrics(): ServerMetricsSnapshot {
        return {
            status: this.status,
            statusCode: SERVER_STATUS_CODE[this.status],
            uptimeSeconds: (Date.now() - this.startTime.getTime()) / 1000,
            startTime: this.startTime.toISOString(),
            port: this.config.server.port,
            activeConnections: this.activeConnections,
            storageConnected: this.storage !== null,
            healthy: this.healthy
        };
    }

    /**
     * Stops accepting requests, waits for in-flight ones until `signal`
     * aborts, then releases storage. Storage is released and the status
     * ends `stopped` even when the deadline passes; the timeout is then
     * reported by rejecting with a `timeout` AppError.
     *
     * Every call, concurrent or later, shares the first shutdown.
     */
    shutdown(signal: AbortSignal | null | undefined): Promise<void> {
        if (!signal) {
            return Promise.reject(newValidationError("shutdown signal cannot be nil"));
        }
        this.stopping ??= this.terminate(signal);
        return this.stopping;
    }

    /**
     * Best-effort shutdown without deadline or drain. Joins a shutdown in
     * progress and never rejects.
     */
    async close(): Promise<void> {
        this.stopping ??= this.terminate(null);
        await this.stopping.catch((err: Error) =>
            logger.warn(`Shutdown finished with error: ${err.message}`)
        );
    }

    private async terminate(signal: AbortSignal | null): Promise<void> {
        logger.notice("Shutting down server gracefully...");
        const started = process.hrtime.bigint();
        this.transition(ServerStatus.ShuttingDown);

        let timedOut = false;
        try {
            timedOut = await this.drain(signal);
        } catch (err) {
            logger.error({ err }, "HTTP server shutdown error");
            this.metrics.increment("server_errors_total", {
                error_type: "shutdown_error",
                component: "http_server"
            });
        } finally {
            await this.releaseStorage();
            this.transition(ServerStatus.Stopped);
            this.metrics.observe(
                "server_shutdown_duration_seconds",
                Number(process.hrtime.bigint() - started) / 1e9
            );
        }

        if (timedOut) {
            throw newTimeoutError("shutdown deadline exceeded before requests drained", {
                activeConnections: this.activeConnections
            });
        }
        logger.notice("Server shutdown complete");
    }

    /** true when `signal` aborted before every request finished */
    private async drain(signal: AbortSignal | null): Promise<boolean> {
        const closing = this.app.close();
        if (!signal) {
            await closing;
            return false;
        }

        const drained = closing.then(() => this.whenIdle());
        const { aborted, dispose } = whenAborted(signal);
        try {
            const outcome = await Promise.race([
                drained.then(() => "drained" as const),
                aborted
            ]);
            if (outcome === "drained") return false;
        } finally {
            dispose();
        }

        logger.warn(
            `Shutdown deadline reached with ${this.activeConnections} request(s) in flight`
        );
        this.app.server.closeAllConnections();
        drained.catch((err: Error) =>
            logger.error({ err }, "HTTP server shutdown error after deadline")
        );
        return true;
    }

    private settle(req: FastifyRequest): void {
        if (this.inFlight.delete(req)) this.decrementConnection();
    }

    private whenIdle(): Promise<void> {
        if (this.activeConnections === 0) return Promise.resolve();
        return new Promise((resolve) => this.idleWaiters.push(resolve));
    }

    private async releaseStorage(): Promise<void> {
        const storage = this.storage;
        this.storage = null;
        if (!storage) return;
        try {
            await storage.close();
        } catch (err) {
            logger.error({ err }, "Storage close error");
            this.metrics.increment("server_errors_total", {
                error_type: "close_error",
                component: "storage"
            });
        }
        this.metrics.set("storage_connection_status", 0);
    }

    private transition(next: ServerStatus): boolean {
        if (!TRANSITIONS.get(this.status)?.has(next)) {
            logger.debug(`Ignoring status transition ${this.status} -> ${next}`);
            return false;
        }
        this.status = next;
        this.metrics.set("server_status", SERVER_STATUS_CODE[next]);
        return true;
    }

    private readiness(): ReadyResponse {
        return {
            ready: this.healthy && this.status === ServerStatus.Running,
            status: this.status,
            healthy: this.healthy
        };
    }

    private refreshGauges(): void {
        this.metrics.set(
            "server_uptime_seconds",
            (Date.now() - this.startTime.getTime()) / 1000
        );
    }
}
