/**
 * Database connection settings, read from the environment with defaults
 * sized for a single interactive process or one small API instance.
 */

export interface DbConfig {
    /** Max pool connections (default: 10 in production, 2 elsewhere). */
    maxConnections: number;
    /** Close idle connections after this many seconds (default: 30). */
    idleTimeoutSeconds: number;
    /** Give up connecting after this many seconds (default: 5). */
    connectTimeoutSeconds: number;
    /** Recycle connections after this many seconds (default: 30 min). */
    maxLifetimeSeconds: number;
    /** Server-side statement timeout in ms (default: 10s). */
    statementTimeoutMs: number;
    /** Use named prepared statements (off behind transaction poolers). */
    prepareStatements: boolean;
}

function readPositive(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
    const raw = env[name];
    if (raw === undefined || raw.trim().length === 0) {
        return fallback;
    }
    const value = Number(raw);
    if (!Number.isFinite(value) || value <= 0) {
        throw new Error(`${name} must be a positive number.`);
    }
    return value;
}

export function loadDbConfig(env: NodeJS.ProcessEnv = process.env): DbConfig {
    const isProd = (env.NODE_ENV ?? 'development') === 'production';

    return {
        maxConnections: readPositive(env, 'DB_POOL_MAX', isProd ? 10 : 2),
        idleTimeoutSeconds: readPositive(env, 'DB_IDLE_TIMEOUT_SECONDS', 30),
        connectTimeoutSeconds: readPositive(env, 'DB_CONNECT_TIMEOUT_SECONDS', 5),
        maxLifetimeSeconds: readPositive(env, 'DB_MAX_LIFETIME_SECONDS', 30 * 60),
        statementTimeoutMs: readPositive(env, 'DB_STATEMENT_TIMEOUT_MS', 10_000),
        prepareStatements: env.DB_PREPARE_STATEMENTS !== 'false'
    };
}
