/**
 * In-process metrics for the agent runner: counters, gauges and duration
 * summaries. GET /metrics serves them as JSON, or as Prometheus text with
 * ?format=prometheus.
 */

export interface SummaryValue {
    count: number;
    sum: number;
    max: number;
}

export interface MetricsSnapshot {
    snapshotAt: number;
    uptimeSeconds: number;
    counters: Record<string, number>;
    gauges: Record<string, number>;
    summaries: Record<string, SummaryValue>;
}

export class MetricsRegistry {
    private readonly startedAt = Date.now();
    private readonly counters = new Map<string, number>();
    private readonly gauges = new Map<string, number>();
    private readonly summaries = new Map<string, SummaryValue>();

    inc(name: string, delta = 1): void {
        this.counters.set(name, this.counter(name) + delta);
    }

    set(name: string, value: number): void {
        this.gauges.set(name, value);
    }

    /** Record one observation (e.g. a duration in ms) into a summary */
    observe(name: string, value: number): void {
        const current = this.summaries.get(name);
        if (!current) {
            this.summaries.set(name, { count: 1, sum: value, max: value });
            return;
        }
        current.count += 1;
        current.sum += value;
        current.max = Math.max(current.max, value);
    }

    counter(name: string): number {
        return this.counters.get(name) ?? 0;
    }

    gauge(name: string): number {
        return this.gauges.get(name) ?? 0;
    }

    summary(name: string): SummaryValue | undefined {
        const value = this.summaries.get(name);
        return value ? { ...value } : undefined;
    }

    private uptimeSeconds(now = Date.now()): number {
        return Math.round((now - this.startedAt) / 1000);
    }

    snapshot(): MetricsSnapshot {
        const now = Date.now();
        const summaries: Record<string, SummaryValue> = {};
        for (const [name, value] of this.summaries) summaries[name] = { ...value };
        return {
            snapshotAt: now,
            uptimeSeconds: this.uptimeSeconds(now),
            counters: Object.fromEntries(this.counters),
            gauges: Object.fromEntries(this.gauges),
            summaries,
        };
    }

    /** Prometheus text exposition; counters come first, uptime last */
    toPrometheus(prefix = "pulse_agent"): string {
        const lines: string[] = [];
        const emit = (name: string, type: string, samples: Array<[string, number]>) => {
            lines.push(`# TYPE ${name} ${type}`);
            for (const [sample, value] of samples) lines.push(`${sample} ${value}`);
        };

        for (const [key, value] of this.counters) {
            const name = `${prefix}_${key}_total`;
            emit(name, "counter", [[name, value]]);
        }
        for (const [key, value] of this.gauges) {
            const name = `${prefix}_${key}`;
            emit(name, "gauge", [[name, value]]);
        }
        for (const [key, value] of this.summaries) {
            const name = `${prefix}_${key}`;
            emit(name, "summary", [
                [`${name}_count`, value.count],
                [`${name}_sum`, value.sum],
            ]);
        }
        const uptime = `${prefix}_uptime_seconds`;
        emit(uptime, "gauge", [[uptime, this.uptimeSeconds()]]);
        return lines.join("\n") + "\n";
    }
}

export const metrics = new MetricsRegistry();

// ═══════════════════════════════════════════════════════
//                  Well-known metric names
// ═══════════════════════════════════════════════════════

/** Counter: agent loop iterations */
export const METRIC_LOOP_TICKS = "loop_ticks";
/** Counter: tasks whose behavior reported success */
export const METRIC_TASK_SUCCESS = "task_success";
/** Counter: tasks whose behavior reported failure */
export const METRIC_TASK_FAILURE = "task_failure";
/** Counter: iterations aborted by an exception */
export const METRIC_ITERATION_ERRORS = "iteration_errors";
/** Summary: wall time of one loop iteration, in ms */
export const METRIC_ITERATION_DURATION_MS = "iteration_duration_ms";
/** Counter: registry dispatches that ended in an error result */
export const METRIC_DISPATCH_FAILURES = "dispatch_failures";
/** Counter: registry dispatches that reached a provider and returned */
export const METRIC_DISPATCH_SUCCESS = "dispatch_success";
/** Counter: records pushed by background listeners */
export const METRIC_LISTENER_RECORDS = "listener_records";
/** Gauge: providers currently registered */
export const METRIC_REGISTERED_PROVIDERS = "registered_providers";
