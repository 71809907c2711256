/**
 * Run records store operations: recording, listing, cleanup.
 */

import type { Pool } from "pg";
import type { RunRecord, RunRecordInput } from "./interface.js";
import { mapRunRow } from "./helpers.js";

export async function recordRun(
    pool: Pool,
    maxRunRecords: number,
    input: RunRecordInput,
): Promise<RunRecord> {
    const inserted = await pool.query<Record<string, unknown>>(
        `
        INSERT INTO agent_runs (agent, task, success, error, delay_ms, duration_ms)
        VALUES ($1, $2, $3, $4, $5, $6)
        RETURNING *
        `,
        [
            input.agent,
            input.task,
            input.success,
            input.error ?? null,
            Math.round(input.delayMs),
            Math.round(input.durationMs),
        ],
    );

    // Trim old records
    await pool.query(
        `
        DELETE FROM agent_runs
        WHERE id IN (
            SELECT id FROM agent_runs WHERE agent = $1
            ORDER BY created_at DESC OFFSET $2
        )
        `,
        [input.agent, maxRunRecords],
    );

    const row = inserted.rows[0];
    if (!row) throw new Error("Run record insert returned no row");
    return mapRunRow(row);
}

export async function listRuns(
    pool: Pool,
    agent: string | undefined,
    limit: number,
): Promise<RunRecord[]> {
    const result = agent === undefined
        ? await pool.query<Record<string, unknown>>(
            `SELECT * FROM agent_runs ORDER BY created_at DESC, id DESC LIMIT $1`,
            [limit],
        )
        : await pool.query<Record<string, unknown>>(
            `SELECT * FROM agent_runs WHERE agent = $1 ORDER BY created_at DESC, id DESC LIMIT $2`,
            [agent, limit],
        );
    return result.rows.map(mapRunRow);
}
