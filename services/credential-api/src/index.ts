import { logger } from "../../../libs/logging/logger.js";
import { ConfigGuard } from "../../../libs/bootstrap/config-guard.js";
import { ENGINE_CONFIG_GUARDS, loadServiceConfig } from "../../../libs/bootstrap/config/engine-config.js";
import { DB_CONFIG_GUARDS } from "../../../libs/bootstrap/config/db-config.js";
import { SoulboundCredentialEngine } from "../../../libs/engine/index.js";
import { EventRelay } from "../../../libs/outbox/EventRelay.js";
import { createApp } from "../../../libs/http/app.js";
import { db } from "../../../libs/db/index.js";

async function main() {
    // Fail-closed configuration
    ConfigGuard.enforce(ENGINE_CONFIG_GUARDS);
    const config = loadServiceConfig();

    const engine = new SoulboundCredentialEngine(config.engine);

    let relay: EventRelay | null = null;
    if (config.eventRelayEnabled) {
        ConfigGuard.enforce(DB_CONFIG_GUARDS);
        relay = new EventRelay(engine);
        await relay.initialize();
        relay.start();
    }

    const app = createApp(engine, config.api);
    const server = app.listen(config.api.port, () => {
        logger.info({ port: config.api.port, authorizationMode: engine.authorizationMode }, "Credential API listening");
    });

    let shuttingDown = false;
    const shutdown = (signal: string) => {
        if (shuttingDown) return;
        shuttingDown = true;
        logger.info({ signal }, "Shutting down credential API");

        server.close();
        const drain = relay
            ? relay.stop().then(() => db.close())
            : Promise.resolve();
        drain
            .then(() => process.exit(0))
            .catch((err: unknown) => {
                logger.error({ err }, "Shutdown did not complete cleanly");
                process.exit(1);
            });
    };

    process.on("SIGTERM", () => shutdown("SIGTERM"));
    process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch(err => {
    logger.fatal(err);
    process.exit(1);
});
