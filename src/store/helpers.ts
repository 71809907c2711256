/**
 * Store helpers: row mapping for run history.
 */

import type { RunRecord } from "./interface.js";

export function toIso(value: Date | string): string {
    return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}

function toIsoValue(value: unknown): string {
    if (value instanceof Date || typeof value === "string") return toIso(value);
    return new Date(0).toISOString();
}

export function mapRunRow(row: Record<string, unknown>): RunRecord {
    return {
        id: String(row.id),
        agent: String(row.agent),
        task: row.task == null ? null : String(row.task),
        success: Boolean(row.success),
        error: row.error == null ? undefined : String(row.error),
        delayMs: Number(row.delay_ms ?? 0),
        durationMs: Number(row.duration_ms ?? 0),
        createdAt: toIsoValue(row.created_at),
    };
}
