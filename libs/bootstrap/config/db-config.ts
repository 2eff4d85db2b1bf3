import type { GuardRule } from '../config-guard.js';

const PROTECTED_ENVS = ['production', 'staging'];

/**
 * DB Configuration Guards
 * Connection parameters must be explicit; protected environments must use TLS.
 */
export const DB_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'DB_HOST' },
    { type: 'required', name: 'DB_PORT' },
    { type: 'required', name: 'DB_USER' },
    { type: 'required', name: 'DB_PASSWORD' },
    { type: 'required', name: 'DB_NAME' },

    {
        type: 'forbidIf',
        name: 'DB_SSL',
        when: (env) => PROTECTED_ENVS.includes(env.NODE_ENV ?? '') && env.DB_SSL !== 'true',
        message: 'DB_SSL must be true in production/staging',
    },

    {
        type: 'assert',
        check: (env) => !PROTECTED_ENVS.includes(env.NODE_ENV ?? '') || !!env.DB_CA_CERT,
        message: 'DB_CA_CERT is required in production/staging',
    }
];
