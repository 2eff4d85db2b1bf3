import { ConfigGuard } from "../../../libs/bootstrap/config-guard.js";
import { DB_CONFIG_GUARDS } from "../../../libs/bootstrap/config/db-config.js";
import { loadAppConfig } from "../../../libs/bootstrap/config/app-config.js";
import { pgCatalogUnitOfWorkFactory } from "../../../libs/catalog/catalogUnitOfWork.js";
import { createPool } from "../../../libs/db/pool.js";
import { createApp } from "../../../libs/http/app.js";
import { createLogger, logger as bootLogger } from "../../../libs/logging/logger.js";

async function main() {
    ConfigGuard.enforce(DB_CONFIG_GUARDS);
    const config = loadAppConfig();

    const logger = createLogger({ level: config.logLevel, name: 'catalog-api' });
    const pool = createPool(config.database, logger);

    const app = createApp({
        createUnitOfWork: pgCatalogUnitOfWorkFactory(pool, logger),
        logger
    });

    const server = app.listen(config.port, () => {
        logger.info({ port: config.port, env: config.nodeEnv }, "Catalog API listening");
    });

    const shutdown = (signal: string) => {
        logger.info({ signal }, "Shutting down");
        server.close((closeError) => {
            pool.end()
                .then(() => process.exit(closeError ? 1 : 0))
                .catch((poolError: unknown) => {
                    logger.error({ err: poolError }, "[DB] Pool shutdown failed");
                    process.exit(1);
                });
        });
    };

    process.once('SIGTERM', () => shutdown('SIGTERM'));
    process.once('SIGINT', () => shutdown('SIGINT'));
}

main().catch(err => {
    bootLogger.fatal({ err }, "Catalog API failed to start");
    process.exit(1);
});
