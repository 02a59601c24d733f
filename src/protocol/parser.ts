/**
 * Line protocol parsing and formatting
 * @license MIT
 */
import { AppError, newValidationError } from "../common/errors";
import { Point } from "../shared/type/point.type";

/**
 * measurement[,tag=value...] field=value[,field=value...] timestamp
 *
 * Field values may carry one trailing `i` (integer suffix), the
 * timestamp is nanoseconds since epoch as a base-10 integer.
 */
const SEGMENTS = 3;
const SEGMENT_SEPARATOR = /\s+/;
const DECIMAL_RE = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const SPECIAL_FLOAT_RE = /^([+-]?)(inf|infinity|nan)$/i;
const INTEGER_RE = /^[+-]?\d+$/;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

class NumberSyntaxError extends Error {
    constructor(readonly reason: "invalid syntax" | "value out of range", value: string) {
        super(`parsing "${value}": ${reason}`);
        this.name = "NumberSyntaxError";
    }
}

function parseFloat64(raw: string): number {
    const special = SPECIAL_FLOAT_RE.exec(raw);
    if (special) {
        if (special[2].toLowerCase() === "nan") return NaN;
        return special[1] === "-" ? -Infinity : Infinity;
    }
    if (!DECIMAL_RE.test(raw)) throw new NumberSyntaxError("invalid syntax", raw);
    const value = Number(raw);
    if (!Number.isFinite(value)) throw new NumberSyntaxError("value out of range", raw);
    return value;
}

function parseInt64(raw: string): bigint {
    if (!INTEGER_RE.test(raw)) throw new NumberSyntaxError("invalid syntax", raw);
    const value = BigInt(raw);
    if (value < INT64_MIN || value > INT64_MAX) {
        throw new NumberSyntaxError("value out of range", raw);
    }
    return value;
}

/** Splits on the first `=`; null when there is none. */
function splitPair(pair: string): [string, string] | null {
    const at = pair.indexOf("=");
    if (at === -1) return null;
    return [pair.slice(0, at), pair.slice(at + 1)];
}

function parseLine(line: string, lineNo: number): Point {
    const context = { line: lineNo };
    const parts = line.trim().split(SEGMENT_SEPARATOR);
    if (parts.length !== SEGMENTS) {
        throw newValidationError(
            `invalid line format: expected ${SEGMENTS} parts, got ${parts.length}`,
            context
        );
    }
    const [head, fieldSegment, timestampSegment] = parts;

    const [measurement, ...tagPairs] = head.split(",");
    if (measurement === "") {
        throw newValidationError("missing measurement name", context);
    }

    const tags = new Map<string, string>();
    for (const pair of tagPairs) {
        const kv = splitPair(pair);
        if (!kv) throw newValidationError(`malformed tag: ${pair}`, context);
        const [key, value] = kv;
        if (key === "" || value === "") {
            throw newValidationError(`invalid tag key or value: ${pair}`, context);
        }
        tags.set(key, value);
    }

    const fields = new Map<string, number>();
    for (const pair of fieldSegment.split(",")) {
        const kv = splitPair(pair);
        if (!kv) throw newValidationError(`malformed field: ${pair}`, context);
        const [key, raw] = kv;
        if (key === "") throw newValidationError("empty field name", context);
        const stripped = raw.endsWith("i") ? raw.slice(0, -1) : raw;
        try {
            fields.set(key, parseFloat64(stripped));
        } catch (err) {
            throw fieldError(err, raw, lineNo);
        }
    }

    let timestamp: bigint;
    try {
        timestamp = parseInt64(timestampSegment);
    } catch (err) {
        const reason = err instanceof NumberSyntaxError ? err.reason : "invalid syntax";
        throw new AppError("validation", `invalid timestamp: ${reason}`, {
            cause: err,
            context: { ...context, value: timestampSegment }
        });
    }

    return Object.freeze({ measurement, tags, fields, timestamp });
}

function fieldError(err: unknown, raw: string, lineNo: number): AppError {
    const reason = err instanceof NumberSyntaxError ? err.reason : "invalid syntax";
    return new AppError("validation", `invalid field value '${raw}': ${reason}`, {
        cause: err,
        context: { line: lineNo, value: raw }
    });
}

/**
 * Parses every non-blank line of `input`.
 *
 * All or nothing: the first invalid line fails the whole call and no
 * point of earlier valid lines is returned. Callers that want per-line
 * tolerance must split the input themselves.
 *
 * @throws AppError of type `validation`
 */
export function parseLineProtocol(input: string): Point[] {
    const points: Point[] = [];
    const lines = input.split("\n");
    for (let i = 0; i < lines.length; i++) {
        if (!lines[i].trim()) continue;
        points.push(parseLine(lines[i], i + 1));
    }
    return points;
}

function formatFieldValue(value: number): string {
    if (Number.isNaN(value)) return "NaN";
    if (value === Infinity) return "+Inf";
    if (value === -Infinity) return "-Inf";
    return String(value);
}

/** Renders a point back to one line of line protocol. */
export function formatPoint(point: Point): string {
    const head = [point.measurement];
    for (const [key, value] of point.tags) head.push(`${key}=${value}`);
    const fields: string[] = [];
    for (const [key, value] of point.fields) {
        fields.push(`${key}=${formatFieldValue(value)}`);
    }
    return `${head.join(",")} ${fields.join(",")} ${point.timestamp}`;
}
