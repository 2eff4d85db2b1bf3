import { z } from 'zod';
import { Failures } from '../../errors/failure.js';
import type { Failure } from '../../errors/failure.js';
import { ConfigGuard } from '../config-guard.js';
import type { Env } from '../config-guard.js';
import { DB_CONFIG_GUARDS } from './db-config.js';

const AppConfigSchema = z.object({
    NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    DB_HOST: z.string().min(1),
    DB_PORT: z.coerce.number().int().min(1).max(65535),
    DB_USER: z.string().min(1),
    DB_PASSWORD: z.string().min(1),
    DB_NAME: z.string().min(1),
    DB_POOL_MAX: z.coerce.number().int().positive().default(10),
    DB_SSL: z.enum(['true', 'false']).default('false').transform(value => value === 'true'),
    DB_CA_CERT: z.string().optional(),
});

export interface DatabaseConfig {
    readonly host: string;
    readonly port: number;
    readonly user: string;
    readonly password: string;
    readonly name: string;
    readonly poolMax: number;
    readonly ssl: boolean;
    readonly caCert?: string;
}

export interface AppConfig {
    readonly nodeEnv: 'development' | 'test' | 'staging' | 'production';
    readonly port: number;
    readonly logLevel: string;
    readonly database: DatabaseConfig;
}

export class ConfigurationError extends Error {
    constructor(readonly issues: readonly string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`);
        this.name = 'ConfigurationError';
    }
}

/**
 * Parses the process environment into typed configuration. Problems are
 * raised as one Infrastructure failure listing every issue; values are never
 * echoed back.
 */
export function loadAppConfig(env: Env = process.env): AppConfig {
    const result = AppConfigSchema.safeParse(env);
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw configFailure(issues);
    }

    // Environment-dependent rules live with the startup guard only.
    const guardIssues = ConfigGuard.check(DB_CONFIG_GUARDS, env);
    if (guardIssues.length > 0) {
        throw configFailure(guardIssues);
    }

    const parsed = result.data;

    return Object.freeze({
        nodeEnv: parsed.NODE_ENV,
        port: parsed.PORT,
        logLevel: parsed.LOG_LEVEL,
        database: Object.freeze({
            host: parsed.DB_HOST,
            port: parsed.DB_PORT,
            user: parsed.DB_USER,
            password: parsed.DB_PASSWORD,
            name: parsed.DB_NAME,
            poolMax: parsed.DB_POOL_MAX,
            ssl: parsed.DB_SSL,
            caCert: parsed.DB_CA_CERT,
        }),
    });
}

function configFailure(issues: string[]): Failure {
    return Failures.infrastructure(new ConfigurationError(issues), 'Config:Load');
}
