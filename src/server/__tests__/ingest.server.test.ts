import { request } from "http";
import { afterEach, describe, expect, it, vi } from "vitest";
import { BlockingStorage, MemoryStorage, testConfig } from "../../__tests__/fixtures";
import { MetricsServiceProvider } from "../../shared/service-provider/metrics.service.provider";
import { ServerStatus } from "../../shared/type/server.type";
import { IngestServer } from "../ingest.server";

const servers: IngestServer[] = [];

function create(storage: MemoryStorage | null = new MemoryStorage()) {
    const metrics = new MetricsServiceProvider();
    const server = new IngestServer(testConfig(), { storage, metrics });
    servers.push(server);
    return { server, metrics, storage };
}

function deadline(ms = 2000): AbortSignal {
    return AbortSignal.timeout(ms);
}

afterEach(async () => {
    await Promise.all(servers.splice(0).map((server) => server.close()));
    vi.restoreAllMocks();
});

describe("IngestServer", () => {
    it("requires a configuration", () => {
        expect(() => new IngestServer(null)).toThrow("config cannot be nil");
        expect(() => new IngestServer(undefined)).toThrow("config cannot be nil");
    });

    it("starts out in the starting state", () => {
        const { server } = create();
        expect(server.getStatus()).toBe(ServerStatus.Starting);
        expect(server.isHealthy()).toBe(true);
        expect(server.getStartTime()).toBeInstanceOf(Date);
        expect(server.getMetrics()).toMatchObject({
            status: "starting",
            statusCode: 1,
            port: 0,
            activeConnections: 0,
            storageConnected: true,
            healthy: true
        });
    });

    it("never lets the connection count go negative", () => {
        const { server } = create();
        server.incrementConnection();
        server.incrementConnection();
        server.decrementConnection();
        server.decrementConnection();
        server.decrementConnection();
        expect(server.getActiveConnections()).toBe(0);
        server.incrementConnection();
        expect(server.getActiveConnections()).toBe(1);
    });

    it("toggles health", async () => {
        const { server, metrics } = create();
        server.setHealth(false);
        expect(server.isHealthy()).toBe(false);
        expect(server.getMetrics().healthy).toBe(false);
        expect(await metrics.metrics()).toContain("ingest_server_health 0");

        server.setHealth(true);
        expect(server.isHealthy()).toBe(true);
    });

    describe("start", () => {
        it("listens until shut down", async () => {
            const { server, storage } = create();
            const running = server.start();

            await vi.waitFor(() => expect(server.getStatus()).toBe(ServerStatus.Running));
            expect(storage?.opened).toBe(true);

            const ready = await server.app.inject({ method: "GET", url: "/ready" });
            expect(ready.statusCode).toBe(200);
            expect(ready.json()).toEqual({ ready: true, status: "running", healthy: true });

            await server.shutdown(deadline());
            await expect(running).resolves.toBeUndefined();
            expect(server.getStatus()).toBe(ServerStatus.Stopped);
        });

        it("is not ready while unhealthy", async () => {
            const { server } = create();
            const running = server.start();
            await vi.waitFor(() => expect(server.getStatus()).toBe(ServerStatus.Running));

            server.setHealth(false);
            const ready = await server.app.inject({ method: "GET", url: "/ready" });
            expect(ready.statusCode).toBe(503);
            expect(ready.json().ready).toBe(false);

            await server.shutdown(deadline());
            await running;
        });

        it("cannot start a stopped server", async () => {
            const { server } = create();
            await server.shutdown(deadline());
            await expect(server.start()).rejects.toMatchObject({
                type: "validation",
                message: "cannot start a server that is stopped"
            });
        });
    });

    describe("shutdown", () => {
        it("requires a signal", async () => {
            const { server } = create();
            await expect(server.shutdown(null)).rejects.toMatchObject({
                type: "validation",
                message: "shutdown signal cannot be nil"
            });
            await expect(server.shutdown(undefined)).rejects.toMatchObject({
                type: "validation"
            });
            expect(server.getStatus()).toBe(ServerStatus.Starting);
        });

        it("releases storage and stops", async () => {
            const { server, storage } = create();
            await server.shutdown(deadline());

            expect(server.getStatus()).toBe(ServerStatus.Stopped);
            expect(storage?.closed).toBe(true);
            expect(server.getMetrics()).toMatchObject({
                status: "stopped",
                statusCode: 4,
                storageConnected: false
            });
        });

        it("runs once for concurrent callers", async () => {
            const storage = new MemoryStorage();
            const close = vi.spyOn(storage, "close");
            const { server, metrics } = create(storage);
            const set = vi.spyOn(metrics, "set");

            await Promise.all(Array.from({ length: 5 }, () => server.shutdown(deadline())));

            const stopped = set.mock.calls.filter(
                ([name, value]) => name === "server_status" && value === 4
            );
            expect(stopped).toHaveLength(1);
            expect(close).toHaveBeenCalledTimes(1);
            expect(server.getStatus()).toBe(ServerStatus.Stopped);
        });

        it("resolves again when called after it finished", async () => {
            const { server } = create();
            await server.shutdown(deadline());
            await expect(server.shutdown(deadline())).resolves.toBeUndefined();
        });

        it("gives up on hanging requests at the deadline", async () => {
            const storage = new BlockingStorage();
            const { server } = create(storage);
            const pending = server.app.inject({
                method: "POST",
                url: "/write",
                headers: { "content-type": "text/plain" },
                payload: "cpu value=1 1"
            });
            await vi.waitFor(() => expect(storage.started).toBe(true));
            expect(server.getActiveConnections()).toBe(1);

            await expect(server.shutdown(AbortSignal.timeout(50))).rejects.toMatchObject({
                type: "timeout"
            });
            expect(server.getStatus()).toBe(ServerStatus.Stopped);
            expect(storage.closed).toBe(true);

            storage.release();
            await pending;
        });

        it("uncounts a request whose client disconnects", async () => {
            const storage = new BlockingStorage();
            const { server } = create(storage);
            const running = server.start();
            await vi.waitFor(() => expect(server.getStatus()).toBe(ServerStatus.Running));

            const address = server.app.server.address();
            if (address === null || typeof address === "string") {
                throw new Error("server is not listening on a TCP port");
            }
            const client = request({
                host: "127.0.0.1",
                port: address.port,
                method: "POST",
                path: "/write",
                headers: { "content-type": "text/plain" }
            });
            const clientErrors: Error[] = [];
            client.on("error", (err) => clientErrors.push(err));
            client.end("cpu value=1 1");

            await vi.waitFor(() => expect(storage.started).toBe(true));
            expect(server.getActiveConnections()).toBe(1);

            client.destroy();
            await vi.waitFor(() => expect(server.getActiveConnections()).toBe(0));
            storage.release();
            await vi.waitFor(() => expect(storage.points).toHaveLength(1));

            await expect(server.shutdown(AbortSignal.timeout(1000))).resolves.toBeUndefined();
            await running;
            expect(server.getActiveConnections()).toBe(0);
        });

        it("still stops when storage fails to close", async () => {
            const storage = new MemoryStorage();
            storage.closeError = new Error("EIO");
            const { server, metrics } = create(storage);

            await server.shutdown(deadline());

            expect(server.getStatus()).toBe(ServerStatus.Stopped);
            expect(await metrics.metrics()).toContain(
                'ingest_server_errors_total{error_type="close_error",component="storage"} 1'
            );
        });

        it("records the shutdown duration", async () => {
            const { server, metrics } = create();
            await server.shutdown(deadline());
            expect(await metrics.metrics()).toContain(
                "ingest_server_shutdown_duration_seconds_count 1"
            );
        });
    });

    describe("close", () => {
        it("stops without a deadline and can repeat", async () => {
            const { server, storage } = create();
            await server.close();
            await server.close();
            expect(server.getStatus()).toBe(ServerStatus.Stopped);
            expect(storage?.closed).toBe(true);
        });

        it("works without storage", async () => {
            const { server } = create(null);
            expect(server.getMetrics().storageConnected).toBe(false);
            await expect(server.close()).resolves.toBeUndefined();
            expect(server.getStatus()).toBe(ServerStatus.Stopped);
        });

        it("swallows a timed out shutdown", async () => {
            const storage = new BlockingStorage();
            const { server } = create(storage);
            const pending = server.app.inject({
                method: "POST",
                url: "/write",
                headers: { "content-type": "text/plain" },
                payload: "cpu value=1 1"
            });
            await vi.waitFor(() => expect(storage.started).toBe(true));

            const stopping = server.shutdown(AbortSignal.timeout(20));
            await expect(server.close()).resolves.toBeUndefined();
            await expect(stopping).rejects.toMatchObject({ type: "timeout" });

            storage.release();
            await pending;
        });
    });
});
