/**
 * Environment-driven configuration for the agent runner.
 *
 * Provider credentials are not read here: each provider pulls its own keys
 * from the secret store when it is configured or checked.
 */

function optionalAny(keys: string[], fallback: string): string {
    for (const key of keys) {
        const value = process.env[key];
        if (value) return value;
    }
    return fallback;
}

function optionalBool(key: string, fallback: boolean): boolean {
    const raw = process.env[key];
    if (raw == null) return fallback;
    return raw.toLowerCase() === "true" || raw === "1";
}

function optionalInt(key: string, fallback: number): number {
    const raw = process.env[key];
    if (!raw) return fallback;
    const value = Number.parseInt(raw, 10);
    return Number.isFinite(value) ? value : fallback;
}

export const config = {
    // Agent definitions
    agentsDir: optionalAny(["AGENTS_DIR"], "agents"),
    defaultAgent: optionalAny(["DEFAULT_AGENT"], ""),

    // Durable credential storage (dotenv format)
    secretsFile: optionalAny(["SECRETS_FILE"], ".env"),

    // Loop pacing (success delay comes from the agent's loop_delay)
    loopFailureDelayMs: optionalInt("LOOP_FAILURE_DELAY_MS", 60_000),
    loopStartupDelayMs: optionalInt("LOOP_STARTUP_DELAY_MS", 5_000),
    listenerIntervalMs: optionalInt("LISTENER_INTERVAL_MS", 30_000),
    providerStatusCacheMs: optionalInt("PROVIDER_STATUS_CACHE_MS", 30_000),
    logLevel: optionalAny(["LOG_LEVEL"], "info"),

    // Control API
    apiPort: optionalInt("API_PORT", optionalInt("PORT", 8000)),
    apiHost: optionalAny(["API_HOST"], "0.0.0.0"),
    apiKey: optionalAny(["API_KEY"], ""),

    // PostgreSQL run history (in-memory when unset)
    databaseUrl: optionalAny(["DATABASE_URL"], ""),
    pgHost: optionalAny(["PGHOST"], ""),
    pgPort: optionalInt("PGPORT", 5432),
    pgUser: optionalAny(["PGUSER"], ""),
    pgPassword: optionalAny(["PGPASSWORD"], ""),
    pgDatabase: optionalAny(["PGDATABASE"], ""),
    pgSsl: optionalBool("PG_SSL", false),
    pgPoolMax: optionalInt("PG_POOL_MAX", 5),
    maxRunRecords: optionalInt("MAX_RUN_RECORDS", 1000),
    statusRunsLimit: optionalInt("STATUS_RUNS_LIMIT", 20),
} as const;

export type RunnerConfig = typeof config;
