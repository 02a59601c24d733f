import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { MetricsExposition } from "../shared/service-provider/metrics.service.provider";

export class MetricsController {
    constructor(
        private readonly exposition: MetricsExposition,
        /** Refreshes gauges that are only computed on scrape. */
        private readonly beforeScrape: () => void = () => undefined
    ) {}

    register(fastify: FastifyInstance): void {
        fastify.get("/metrics", (req, res) => this.metrics(req, res));
    }

    async metrics(_req: FastifyRequest, res: FastifyReply) {
        this.beforeScrape();
        const body = await this.exposition.metrics();
        return res.header("Content-Type", this.exposition.contentType).send(body);
    }
}
