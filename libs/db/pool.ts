import pg from 'pg';
import type { Pool } from 'pg';
import type { DatabaseConfig } from '../bootstrap/config/app-config.js';
import type { Logger } from '../logging/logger.js';

const { Pool: PgPool } = pg;

/**
 * Builds the connection pool from validated configuration. Idle-client errors
 * are logged instead of crashing the process.
 */
export function createPool(config: DatabaseConfig, logger: Logger): Pool {
    const pool = new PgPool({
        host: config.host,
        port: config.port,
        user: config.user,
        password: config.password,
        database: config.name,
        max: config.poolMax,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
        ssl: config.ssl ? { rejectUnauthorized: true, ca: config.caCert } : false
    });

    pool.on('error', (error) => {
        logger.error({ err: error }, '[DB] Idle client error');
    });

    return pool;
}
