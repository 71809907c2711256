/**
 * Run history schema. Idempotent: safe to run on every start.
 */

import type { Pool } from "pg";

export async function runMigrations(pool: Pool): Promise<void> {
    await pool.query(`
        CREATE TABLE IF NOT EXISTS agent_runs (
            id BIGSERIAL PRIMARY KEY,
            agent TEXT NOT NULL,
            task TEXT NULL,
            success BOOLEAN NOT NULL,
            error TEXT NULL,
            delay_ms INTEGER NOT NULL,
            duration_ms INTEGER NOT NULL,
            created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
        )
    `);

    await pool.query(`
        CREATE INDEX IF NOT EXISTS idx_agent_runs_agent_created
        ON agent_runs (agent, created_at DESC)
    `);
}
