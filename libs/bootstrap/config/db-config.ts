import { GuardRule } from '../config-guard.js';

const PROTECTED_ENVS = ['production', 'staging'];

/**
 * Event store connection parameters. Only enforced when the event relay is
 * enabled; the engine itself never touches the database.
 */
export const DB_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'DB_HOST' },
    { type: 'required', name: 'DB_PORT' },
    { type: 'required', name: 'DB_USER' },
    { type: 'required', name: 'DB_PASSWORD', sensitive: true },
    { type: 'required', name: 'DB_NAME' },

    {
        type: 'assert',
        check: (env) => env.DB_PORT === undefined || /^\d{1,5}$/.test(env.DB_PORT),
        message: 'DB_PORT must be a port number',
    },
    {
        type: 'assert',
        check: (env) => env.DB_POOL_MAX === undefined || /^[1-9]\d*$/.test(env.DB_POOL_MAX),
        message: 'DB_POOL_MAX must be a positive integer',
    },
    {
        type: 'forbidIf',
        name: 'DB_SSL_QUERY',
        when: (env) => PROTECTED_ENVS.includes(env.NODE_ENV ?? '') && env.DB_SSL_QUERY === 'false',
        message: 'TLS to the event store cannot be disabled in production/staging',
    },
    {
        type: 'assert',
        check: (env) => !PROTECTED_ENVS.includes(env.NODE_ENV ?? '') || !!env.DB_CA_CERT,
        message: 'DB_CA_CERT is required in production/staging',
    }
];
