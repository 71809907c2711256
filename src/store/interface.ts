/** One loop iteration, as recorded in run history */
export interface RunRecord {
    id: string;
    agent: string;
    /** Selected task, or null when the iteration failed before selection */
    task: string | null;
    success: boolean;
    error?: string;
    /** Pause applied after the iteration */
    delayMs: number;
    durationMs: number;
    createdAt: string;
}

export type RunRecordInput = Omit<RunRecord, "id" | "createdAt">;

export interface RunRecordStore {
    init(): Promise<void>;
    record(input: RunRecordInput): Promise<RunRecord>;
    /** Newest first */
    list(agent: string | undefined, limit: number): Promise<RunRecord[]>;
    close(): Promise<void>;
}
