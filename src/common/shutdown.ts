import { Logger } from "./logger";

const logger = new Logger("Shutdown");

/** What the process-level shutdown needs from the running server. */
export interface Stoppable {
    shutdown(signal: AbortSignal): Promise<void>;
}

let instance: Stoppable | null = null;
let deadline = 30_000;

export function setServerInstance(server: Stoppable, timeoutMs: number): void {
    instance = server;
    deadline = timeoutMs;
}

/**
 * Stops the registered server within the configured deadline, then exits.
 * A failed or late shutdown turns the exit code into 1.
 */
export async function shutdown(
    code: number,
    exit: (code: number) => void = process.exit
): Promise<void> {
    logger.notice("Shutting down...");
    if (instance) {
        await instance
            .shutdown(AbortSignal.timeout(deadline))
            .catch((err: Error) => {
                logger.error({ err }, "Error stopping server");
                code = 1;
            });
    }
    exit(code);
}

export function installSignalHandlers(): void {
    for (const signal of ["SIGINT", "SIGTERM"] as const) {
        process.once(signal, () => {
            logger.notice(`Received ${signal}`);
            shutdown(0).catch((err: Error) => logger.error({ err }, "Shutdown failed"));
        });
    }
}
