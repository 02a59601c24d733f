/**
 * Line protocol ingestion endpoint
 * @license MIT
 */
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { errorBody } from "../common/error-handler";
import { isAppError, newStorageError, newValidationError } from "../common/errors";
import { Logger } from "../common/logger";
import { formatPoint, parseLineProtocol } from "../protocol/parser";
import { MetricsRecorder } from "../shared/service-provider/metrics.service.provider";
import { StorageWriter } from "../shared/service-provider/storage.service.provider";
import { Point } from "../shared/type/point.type";
import { WriteResponse } from "../shared/type/response.type";

const logger = new Logger("WriteController");

type WriteRequest = { Body: string | undefined };

export class WriteController {
    constructor(
        private readonly storage: () => StorageWriter | null,
        private readonly metrics: MetricsRecorder,
        private readonly printPoints = false
    ) {
        logger.notice("WriteController init");
    }

    register(fastify: FastifyInstance): void {
        fastify.register(async (scope) => {
            // the body is line protocol whatever the client claims it is
            scope.removeAllContentTypeParsers();
            scope.addContentTypeParser(
                "*",
                { parseAs: "string" },
                (_req, body, done) => done(null, body)
            );
            scope.all<WriteRequest>("/write", (req, res) => this.write(req, res));
        });
    }

    async write(req: FastifyRequest<WriteRequest>, res: FastifyReply) {
        if (req.method !== "POST") {
            return res
                .code(405)
                .header("Allow", "POST")
                .send(errorBody("validation", 405, `method ${req.method} not allowed`));
        }

        const body = typeof req.body === "string" ? req.body : "";
        if (body.length === 0) {
            throw newValidationError("empty request body");
        }

        let points: Point[];
        try {
            points = parseLineProtocol(body);
        } catch (err) {
            this.metrics.increment("parse_errors_total");
            throw err;
        }
        this.metrics.observe("write_batch_size", points.length);

        const storage = this.storage();
        if (!storage) throw newStorageError("storage is not available");

        let rows = 0;
        for (const point of points) {
            try {
                await storage.writePoint(point);
            } catch (err) {
                this.metrics.increment("write_errors_total", {
                    error_type: isAppError(err) ? err.type : "internal"
                });
                throw err;
            }
            rows += point.fields.size;
            this.metrics.increment("points_written_total", {
                measurement: point.measurement
            });
            if (this.printPoints) logger.notice(formatPoint(point));
        }

        logger.info(`Wrote ${points.length} points (${rows} rows)`);
        const response: WriteResponse = { points: points.length, rows };
        return res.send(response);
    }
}
