import "dotenv/config";
import { describeConfig, loadConfig } from "./common/config";
import { Logger } from "./common/logger";
import { installSignalHandlers, setServerInstance, shutdown } from "./common/shutdown";
import { IngestServer } from "./server/ingest.server";

const logger = new Logger("App");

async function main(): Promise<void> {
    const config = loadConfig();
    logger.notice(`Configuration loaded\n${describeConfig(config)}`);

    const server = new IngestServer(config);
    setServerInstance(server, config.server.shutdownTimeout);
    installSignalHandlers();

    // resolves once the listener is closed by a shutdown
    await server.start();
}

main().catch((err: Error) => {
    logger.error({ err }, "Server failed");
    shutdown(1).catch((e: Error) => logger.error({ err: e }, "Shutdown failed"));
});
