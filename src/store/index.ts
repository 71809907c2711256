/**
 * Run history storage.
 *
 *   - interface.ts   RunRecordStore contract
 *   - memory.ts      bounded in-process store
 *   - runRecords.ts  PostgreSQL read/write + cleanup
 *   - migrations.ts  schema
 *   - helpers.ts     row mappers
 *
 * PostgreSQL is used when DATABASE_URL or PGHOST/PGUSER/PGDATABASE is set.
 */

import { Pool, type PoolConfig } from "pg";
import type { RunRecord, RunRecordInput, RunRecordStore } from "./interface.js";
import { MemoryRunRecordStore } from "./memory.js";
import { runMigrations } from "./migrations.js";
import * as runRecordsOps from "./runRecords.js";

export type { RunRecord, RunRecordInput, RunRecordStore } from "./interface.js";
export { MemoryRunRecordStore } from "./memory.js";

export interface RunStoreConfig {
    maxRunRecords: number;
    databaseUrl: string;
    pgHost: string;
    pgPort: number;
    pgUser: string;
    pgPassword: string;
    pgDatabase: string;
    pgSsl: boolean;
    pgPoolMax: number;
}

export class PgRunRecordStore implements RunRecordStore {
    private readonly pool: Pool;
    private readonly maxRunRecords: number;

    constructor(config: RunStoreConfig) {
        this.maxRunRecords = config.maxRunRecords;

        const poolConfig: PoolConfig = {
            max: config.pgPoolMax,
        };

        if (config.databaseUrl) {
            poolConfig.connectionString = config.databaseUrl;
        } else {
            if (!config.pgHost || !config.pgUser || !config.pgDatabase) {
                throw new Error(
                    "Postgres config missing: set DATABASE_URL or PGHOST/PGUSER/PGDATABASE",
                );
            }
            poolConfig.host = config.pgHost;
            poolConfig.port = config.pgPort;
            poolConfig.user = config.pgUser;
            poolConfig.password = config.pgPassword;
            poolConfig.database = config.pgDatabase;
        }

        if (config.pgSsl) {
            poolConfig.ssl = { rejectUnauthorized: false };
        }

        this.pool = new Pool(poolConfig);
    }

    async init(): Promise<void> {
        await runMigrations(this.pool);
    }

    record(input: RunRecordInput): Promise<RunRecord> {
        return runRecordsOps.recordRun(this.pool, this.maxRunRecords, input);
    }

    list(agent: string | undefined, limit: number): Promise<RunRecord[]> {
        return runRecordsOps.listRuns(this.pool, agent, limit);
    }

    async close(): Promise<void> {
        await this.pool.end();
    }
}

export function isDatabaseConfigured(config: RunStoreConfig): boolean {
    return Boolean(config.databaseUrl || (config.pgHost && config.pgUser && config.pgDatabase));
}

export function createRunRecordStore(config: RunStoreConfig): RunRecordStore {
    return isDatabaseConfigured(config)
        ? new PgRunRecordStore(config)
        : new MemoryRunRecordStore(config.maxRunRecords);
}
