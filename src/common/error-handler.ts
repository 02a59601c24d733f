/**
 * Top-level error boundary: every error thrown by a route or hook ends
 * here and leaves as a JSON payload, never as a stack trace.
 */
import type { FastifyInstance } from "fastify";
import { ErrorContext, ErrorType, isAppError, statusCodeFor } from "./errors";
import { Logger } from "./logger";
import { MetricsRecorder } from "../shared/service-provider/metrics.service.provider";
import { ErrorResponse } from "../shared/type/response.type";

const logger = new Logger("ErrorHandler");

export function errorBody(
    type: ErrorType,
    code: number,
    message: string,
    context?: ErrorContext
): ErrorResponse {
    const body: ErrorResponse = { error: type, type, code, message };
    if (context && Object.keys(context).length > 0) body.context = context;
    return body;
}

export function registerErrorHandler(
    fastify: FastifyInstance,
    recorder: MetricsRecorder
): void {
    fastify.setErrorHandler((error, req, res) => {
        if (isAppError(error)) {
            const code = statusCodeFor(error.type);
            if (code >= 500) {
                logger.error({ err: error }, `${req.method} ${req.url}: ${error.message}`);
            } else {
                logger.warn(`${req.method} ${req.url}: ${error.message}`);
            }
            return res
                .code(code)
                .send(errorBody(error.type, code, error.message, error.context));
        }

        // fastify's own client errors (body too large, bad content type, ...)
        const status = error.statusCode;
        if (status !== undefined && status >= 400 && status < 500) {
            logger.warn(`${req.method} ${req.url}: ${error.message}`);
            return res.code(status).send(errorBody("validation", status, error.message));
        }

        logger.error({ err: error }, `Unhandled error on ${req.method} ${req.url}`);
        recorder.increment("server_errors_total", {
            error_type: "internal",
            component: "http"
        });
        return res.code(500).send(errorBody("internal", 500, "Internal Server Error"));
    });

    fastify.setNotFoundHandler((req, res) =>
        res
            .code(404)
            .send(errorBody("not_found", 404, `route ${req.method} ${req.url} not found`))
    );
}
