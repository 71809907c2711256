import type { RunRecord, RunRecordInput, RunRecordStore } from "./interface.js";

/**
 * Run history kept in process; used when no database is configured.
 * Like the Postgres store, it keeps at most `maxRecords` per agent.
 */
export class MemoryRunRecordStore implements RunRecordStore {
    private records: RunRecord[] = [];
    private nextId = 1;

    constructor(private readonly maxRecords: number) { }

    async init(): Promise<void> {
        return;
    }

    async record(input: RunRecordInput): Promise<RunRecord> {
        const record: RunRecord = {
            ...input,
            id: String(this.nextId++),
            createdAt: new Date().toISOString(),
        };
        this.records.push(record);

        const own = this.records.filter((r) => r.agent === input.agent);
        if (own.length > this.maxRecords) {
            const dropped = new Set(own.slice(0, own.length - this.maxRecords));
            this.records = this.records.filter((r) => !dropped.has(r));
        }
        return record;
    }

    async list(agent: string | undefined, limit: number): Promise<RunRecord[]> {
        if (limit <= 0) return [];
        const matching = agent === undefined
            ? this.records
            : this.records.filter((r) => r.agent === agent);
        return matching.slice(-limit).reverse();
    }

    async close(): Promise<void> {
        this.records = [];
    }
}
