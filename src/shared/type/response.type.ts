/**
 * Typed shapes for every API response returned by the controllers.
 */
import { ErrorContext, ErrorType } from "../../common/errors";
import { ServerStatus } from "./server.type";

// ── /write ───────────────────────────────────────────────────────────────────

export type WriteResponse = { points: number; rows: number };

// ── /health, /ready ──────────────────────────────────────────────────────────

export type HealthResponse = { status: "healthy"; service: string };
export type ReadyResponse  = { ready: boolean; status: ServerStatus; healthy: boolean };

// ── errors ───────────────────────────────────────────────────────────────────

export type ErrorResponse = {
    error: ErrorType;
    type: ErrorType;
    code: number;
    message: string;
    context?: ErrorContext;
};
