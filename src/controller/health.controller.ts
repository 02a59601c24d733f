import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { HealthResponse, ReadyResponse } from "../shared/type/response.type";

export class HealthController {
    constructor(
        private readonly service: string,
        private readonly readiness: () => ReadyResponse
    ) {}

    register(fastify: FastifyInstance): void {
        fastify.get("/health", (req, res) => this.health(req, res));
        fastify.get("/ready", (req, res) => this.ready(req, res));
    }

    /** Liveness: answers as long as the process serves requests. */
    async health(_req: FastifyRequest, res: FastifyReply) {
        const response: HealthResponse = { status: "healthy", service: this.service };
        return res.send(response);
    }

    async ready(_req: FastifyRequest, res: FastifyReply) {
        const response = this.readiness();
        return res.code(response.ready ? 200 : 503).send(response);
    }
}
