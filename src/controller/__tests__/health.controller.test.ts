import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MemoryStorage, testConfig } from "../../__tests__/fixtures";
import { IngestServer } from "../../server/ingest.server";
import { MetricsServiceProvider } from "../../shared/service-provider/metrics.service.provider";

describe("HealthController", () => {
    let server: IngestServer;

    beforeEach(() => {
        server = new IngestServer(testConfig(), {
            storage: new MemoryStorage(),
            metrics: new MetricsServiceProvider()
        });
    });

    afterEach(async () => {
        await server.close();
    });

    it("reports liveness", async () => {
        const res = await server.app.inject({ method: "GET", url: "/health" });
        expect(res.statusCode).toBe(200);
        expect(res.json()).toEqual({ status: "healthy", service: "line-ingest" });
    });

    it("is not ready before the listener runs", async () => {
        const res = await server.app.inject({ method: "GET", url: "/ready" });
        expect(res.statusCode).toBe(503);
        expect(res.json()).toEqual({ ready: false, status: "starting", healthy: true });
    });

    it("answers unknown routes with a JSON 404", async () => {
        const res = await server.app.inject({ method: "GET", url: "/nope" });
        expect(res.statusCode).toBe(404);
        expect(res.json()).toEqual({
            error: "not_found",
            type: "not_found",
            code: 404,
            message: "route GET /nope not found"
        });
    });
});

describe("MetricsController", () => {
    it("serves the registry in text format", async () => {
        const server = new IngestServer(testConfig({ PORT: "9123" }), {
            storage: new MemoryStorage(),
            metrics: new MetricsServiceProvider()
        });
        const res = await server.app.inject({ method: "GET", url: "/metrics" });
        await server.close();

        expect(res.statusCode).toBe(200);
        expect(res.headers["content-type"]).toMatch(/^text\/plain/);
        expect(res.body).toContain("ingest_server_status 1");
        expect(res.body).toContain("ingest_server_config_port 9123");
        expect(res.body).toContain("# TYPE ingest_server_uptime_seconds gauge");
    });
});
