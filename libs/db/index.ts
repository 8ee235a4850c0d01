import pg from 'pg';
import { AsyncLocalStorage } from 'node:async_hooks';
import { ConfigGuard } from '../bootstrap/config-guard.js';
import { DB_CONFIG_GUARDS } from '../bootstrap/config/db-config.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { logger } from '../logging/logger.js';
import { assertDbRole, DbRole } from './roles.js';

const { Pool } = pg;

export type Queryable = {
    query<T extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]): Promise<pg.QueryResult<T>>;
};

export type TxClient = Queryable;

/**
 * The slice of the database layer the event relay depends on.
 */
export interface DbClient {
    queryAsRole<T extends pg.QueryResultRow = pg.QueryResultRow>(
        role: DbRole,
        text: string,
        params?: unknown[]
    ): Promise<pg.QueryResult<T>>;
    transactionAsRole<T>(role: DbRole, callback: (client: TxClient) => Promise<T>): Promise<T>;
}

const transactionContext = new AsyncLocalStorage<{ inTx: boolean }>();

let pool: pg.Pool | null = null;

/**
 * The pool is created on first use so that importing the module never
 * requires database configuration.
 */
function getPool(): pg.Pool {
    if (pool) return pool;

    ConfigGuard.enforce(DB_CONFIG_GUARDS);

    const isProtectedEnv = process.env.NODE_ENV === 'production' || process.env.NODE_ENV === 'staging';
    const poolMax = process.env.DB_POOL_MAX ? parseInt(process.env.DB_POOL_MAX, 10) : 10;
    pool = new Pool({
        host: process.env.DB_HOST,
        port: Number(process.env.DB_PORT),
        user: process.env.DB_USER,
        password: process.env.DB_PASSWORD,
        database: process.env.DB_NAME,
        max: Number.isFinite(poolMax) ? poolMax : 10,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
        ssl: isProtectedEnv || process.env.DB_SSL_QUERY === 'true'
            ? { rejectUnauthorized: true, ca: process.env.DB_CA_CERT }
            : false
    });
    pool.on('error', (error) => {
        logger.error({ error }, '[DB] Idle client error');
    });
    return pool;
}

function quoteIdentifier(identifier: string): string {
    const escaped = identifier.replace(/"/g, '""');
    return `"${escaped}"`;
}

async function resetRole(client: pg.PoolClient, context: string): Promise<boolean> {
    try {
        await client.query('RESET ROLE');
        return true;
    } catch (error) {
        logger.warn({ error }, `[DB] Failed to reset role during ${context}`);
        return false;
    }
}

export const db: DbClient & { close(): Promise<void> } = {
    /**
     * Scoped role query; the role applies to this call only.
     */
    queryAsRole: async <T extends pg.QueryResultRow = pg.QueryResultRow>(
        role: DbRole,
        text: string,
        params?: unknown[]
    ): Promise<pg.QueryResult<T>> => {
        const validatedRole = assertDbRole(role);
        const client = await getPool().connect();
        let resetOk = false;
        try {
            await client.query(`SET ROLE ${quoteIdentifier(validatedRole)}`);
            return await client.query<T>(text, params);
        } catch (error) {
            throw ErrorSanitizer.sanitize(error, 'DatabaseLayer:QueryAsRoleFailure');
        } finally {
            resetOk = await resetRole(client, 'queryAsRole');
            client.release(resetOk ? undefined : new Error('[DB] Forcing client destroy after queryAsRole'));
        }
    },

    /**
     * Executes the callback in one transaction under the given role.
     * Rolls back on any error; nested transactions are rejected.
     */
    transactionAsRole: async <T>(role: DbRole, callback: (client: TxClient) => Promise<T>): Promise<T> => {
        if (transactionContext.getStore()?.inTx) {
            throw new Error('Nested transaction detected: transactionAsRole cannot be invoked within an active transaction.');
        }

        const validatedRole = assertDbRole(role);
        const client = await getPool().connect();
        let resetOk = false;
        try {
            return await transactionContext.run({ inTx: true }, async () => {
                try {
                    await client.query('BEGIN');
                    await client.query(`SET LOCAL ROLE ${quoteIdentifier(validatedRole)}`);
                    const txClient: TxClient = {
                        query: <R extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]) =>
                            client.query<R>(text, params)
                    };
                    const result = await callback(txClient);
                    await client.query('COMMIT');
                    return result;
                } catch (error) {
                    try {
                        await client.query('ROLLBACK');
                    } catch (rollbackError) {
                        logger.error({ error: rollbackError }, '[DB] Failed to rollback transaction');
                    }
                    throw ErrorSanitizer.sanitize(error, 'DatabaseLayer:TransactionFailed');
                }
            });
        } finally {
            resetOk = await resetRole(client, 'transactionAsRole');
            client.release(resetOk ? undefined : new Error('[DB] Forcing client destroy after transactionAsRole'));
        }
    },

    close: async (): Promise<void> => {
        if (pool) {
            const current = pool;
            pool = null;
            await current.end();
        }
    }
};

export type { DbRole };
