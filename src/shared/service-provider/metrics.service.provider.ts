/**
 * Prometheus metrics behind a small recorder interface
 * @license MIT
 */
import {
    collectDefaultMetrics,
    Counter,
    Gauge,
    Histogram,
    Registry
} from "prom-client";

type MetricDefinition = {
    help: string;
    labelNames: readonly string[];
};

type HistogramDefinition = MetricDefinition & { buckets?: readonly number[] };

const PREFIX = "ingest_";

const COUNTERS = {
    http_requests_total: {
        help: "Total number of HTTP requests",
        labelNames: ["method", "endpoint", "status_code"]
    },
    points_written_total: {
        help: "Total number of data points written to storage",
        labelNames: ["measurement"]
    },
    rows_written_total: {
        help: "Total number of rows appended to the storage file",
        labelNames: []
    },
    parse_errors_total: {
        help: "Total number of rejected line protocol payloads",
        labelNames: []
    },
    write_errors_total: {
        help: "Total number of failed point writes",
        labelNames: ["error_type"]
    },
    server_errors_total: {
        help: "Total number of server errors",
        labelNames: ["error_type", "component"]
    },
    storage_rotations_total: {
        help: "Total number of storage file rotations",
        labelNames: []
    }
} as const satisfies Record<string, MetricDefinition>;

const GAUGES = {
    server_status: {
        help: "Current server status (1=starting, 2=running, 3=shutting_down, 4=stopped)",
        labelNames: []
    },
    server_health: {
        help: "Server health status (0=unhealthy, 1=healthy)",
        labelNames: []
    },
    server_active_connections: {
        help: "Current number of requests being processed",
        labelNames: []
    },
    server_start_time_seconds: {
        help: "Server start time in Unix seconds",
        labelNames: []
    },
    server_uptime_seconds: {
        help: "Server uptime in seconds",
        labelNames: []
    },
    server_config_port: {
        help: "Configured server port",
        labelNames: []
    },
    storage_connection_status: {
        help: "Storage connection status (0=disconnected, 1=connected)",
        labelNames: []
    }
} as const satisfies Record<string, MetricDefinition>;

const HISTOGRAMS = {
    http_request_duration_seconds: {
        help: "HTTP request duration in seconds",
        labelNames: ["method", "endpoint"]
    },
    write_batch_size: {
        help: "Number of points per write request",
        labelNames: [],
        buckets: [1, 10, 100, 1000, 10000, 100000]
    },
    storage_write_duration_seconds: {
        help: "Time spent appending one point to the storage file",
        labelNames: []
    },
    server_shutdown_duration_seconds: {
        help: "Server shutdown duration in seconds",
        labelNames: []
    }
} as const satisfies Record<string, HistogramDefinition>;

export type CounterName = keyof typeof COUNTERS;
export type GaugeName = keyof typeof GAUGES;
export type HistogramName = keyof typeof HISTOGRAMS;
export type Labels = Record<string, string | number>;

/** What the core needs from a metrics backend. */
export interface MetricsRecorder {
    increment(name: CounterName, labels?: Labels, value?: number): void;
    set(name: GaugeName, value: number, labels?: Labels): void;
    observe(name: HistogramName, value: number, labels?: Labels): void;
}

/** Text exposition of everything recorded so far. */
export interface MetricsExposition {
    readonly contentType: string;
    metrics(): Promise<string>;
}

export const NOOP_RECORDER: MetricsRecorder = {
    increment: () => undefined,
    set: () => undefined,
    observe: () => undefined
};

export type MetricsOptions = {
    /** Also collect Node.js process metrics (cpu, memory, event loop). */
    defaultMetrics?: boolean;
};

function build<N extends string, D, M>(
    defs: Record<N, D>,
    create: (name: N, def: D) => M
): Map<N, M> {
    const built = new Map<N, M>();
    for (const name in defs) {
        built.set(name, create(name, defs[name]));
    }
    return built;
}

export class MetricsServiceProvider implements MetricsRecorder, MetricsExposition {
    readonly registry = new Registry();
    private readonly counters: Map<CounterName, Counter<string>>;
    private readonly gauges: Map<GaugeName, Gauge<string>>;
    private readonly histograms: Map<HistogramName, Histogram<string>>;

    constructor(options: MetricsOptions = {}) {
        const registers = [this.registry];
        this.counters = build<CounterName, MetricDefinition, Counter<string>>(
            COUNTERS,
            (name, def) =>
                new Counter({
                    name: PREFIX + name,
                    help: def.help,
                    labelNames: [...def.labelNames],
                    registers
                })
        );
        this.gauges = build<GaugeName, MetricDefinition, Gauge<string>>(
            GAUGES,
            (name, def) =>
                new Gauge({
                    name: PREFIX + name,
                    help: def.help,
                    labelNames: [...def.labelNames],
                    registers
                })
        );
        this.histograms = build<HistogramName, HistogramDefinition, Histogram<string>>(
            HISTOGRAMS,
            (name, def) =>
                new Histogram({
                    name: PREFIX + name,
                    help: def.help,
                    labelNames: [...def.labelNames],
                    ...(def.buckets ? { buckets: [...def.buckets] } : {}),
                    registers
                })
        );
        if (options.defaultMetrics) {
            collectDefaultMetrics({ register: this.registry, prefix: PREFIX });
        }
    }

    get contentType(): string {
        return this.registry.contentType;
    }

    increment(name: CounterName, labels: Labels = {}, value = 1): void {
        this.counters.get(name)?.inc(labels, value);
    }

    set(name: GaugeName, value: number, labels: Labels = {}): void {
        this.gauges.get(name)?.set(labels, value);
    }

    observe(name: HistogramName, value: number, labels: Labels = {}): void {
        this.histograms.get(name)?.observe(labels, value);
    }

    metrics(): Promise<string> {
        return this.registry.metrics();
    }
}
