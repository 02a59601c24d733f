import pino from "pino";

declare module "fastify" {
    interface FastifyBaseLogger {
        notice: pino.LogFn;
    }
}

const LEVELS = { notice: 35 };

/** Single-line `[context] msg` output; colours only on a developer machine. */
function prettyTransport(env: string | undefined) {
    return {
        target: "pino-pretty",
        options: {
            customLevels: "trace:10,debug:20,info:30,notice:35,warn:40,error:50,fatal:60",
            colorize: env === undefined || env === "local",
            singleLine: true,
            translateTime: "yyyy-mm-dd'T'HH:MM:ss.l'Z'",
            messageFormat: "[{context}] {msg}",
            // fastify's request logger adds reqId, req, res and responseTime
            ignore: "pid,hostname,context,reqId,req,res,responseTime",
            errorLikeObjectKeys: ["err"]
        }
    };
}

export class Logger {
    /** Shared by the module loggers and fastify's request logger. */
    static readonly config = {
        level: process.env.LOG_LEVEL || "notice",
        customLevels: LEVELS,
        base: { context: "App" },
        // tests log as plain JSON, without the worker thread
        transport:
            process.env.APP_ENV === "test" ? undefined : prettyTransport(process.env.APP_ENV)
    };

    private static readonly root: pino.Logger<"notice"> = pino(Logger.config);

    readonly notice: pino.LogFn;
    readonly error: pino.LogFn;
    readonly warn: pino.LogFn;
    readonly info: pino.LogFn;
    readonly debug: pino.LogFn;

    constructor(context: string) {
        const child = Logger.root.child({ context });
        this.notice = child.notice.bind(child);
        this.error = child.error.bind(child);
        this.warn = child.warn.bind(child);
        this.info = child.info.bind(child);
        this.debug = child.debug.bind(child);
    }
}
