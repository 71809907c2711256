/**
 * TaskScheduler: weighted random choice of the next task.
 *
 * Base weights are fixed at construction. Each selection works on a fresh
 * copy, optionally adjusted by time-of-day rules, so repeated calls never
 * drift. Randomness and the clock are injected.
 */

import { ConfigurationError } from "../errors/RuntimeError.js";
import { err, ok, type Result } from "../result.js";
import { applyTimeRules, type TimeRule } from "./timeRules.js";

export interface Task {
    readonly name: string;
    readonly weight: number;
}

export interface TaskSchedulerOptions {
    timeRules?: readonly TimeRule[];
    /** Uniform in [0, 1). Default: Math.random */
    random?: () => number;
    /** Default: () => new Date() */
    clock?: () => Date;
}

export class TaskScheduler {
    readonly tasks: readonly Task[];
    private readonly timeRules: readonly TimeRule[];
    private readonly random: () => number;
    private readonly clock: () => Date;

    constructor(tasks: readonly Task[], opts: TaskSchedulerOptions = {}) {
        if (tasks.length === 0) {
            throw new ConfigurationError("Agent has no tasks");
        }
        for (const task of tasks) {
            if (!Number.isFinite(task.weight) || task.weight < 0) {
                throw new ConfigurationError(`Task '${task.name}' has invalid weight ${task.weight}`);
            }
        }
        if (tasks.every((t) => t.weight === 0)) {
            throw new ConfigurationError("Task weights sum to zero");
        }

        this.tasks = tasks.map((t) => ({ ...t }));
        this.timeRules = opts.timeRules ?? [];
        this.random = opts.random ?? Math.random;
        this.clock = opts.clock ?? (() => new Date());
    }

    /** Base weights, or weights adjusted for `hour` when one is given */
    effectiveWeights(hour?: number): number[] {
        const base = this.tasks.map((t) => t.weight);
        if (hour === undefined) return base;
        return applyTimeRules(hour, this.tasks.map((t) => t.name), base, this.timeRules);
    }

    select(opts: { timeBased?: boolean } = {}): Result<Task, ConfigurationError> {
        const weights = this.effectiveWeights(opts.timeBased ? this.clock().getHours() : undefined);
        const index = pickWeighted(weights, this.random());
        if (index < 0) {
            return err(new ConfigurationError("Effective task weights sum to zero"));
        }
        const task = this.tasks[index];
        return task ? ok(task) : err(new ConfigurationError(`No task at index ${index}`));
    }
}

/**
 * Index drawn with probability weights[i] / Σweights for `r` in [0, 1),
 * or -1 when nothing has positive weight.
 */
export function pickWeighted(weights: readonly number[], r: number): number {
    const total = weights.reduce((sum, w) => sum + (w > 0 ? w : 0), 0);
    if (!(total > 0)) return -1;

    const target = r * total;
    let cumulative = 0;
    let lastPositive = -1;
    for (let i = 0; i < weights.length; i++) {
        const w = weights[i] ?? 0;
        if (w <= 0) continue;
        lastPositive = i;
        cumulative += w;
        if (target < cumulative) return i;
    }
    // Float rounding can leave r * total a hair above the final sum
    return lastPositive;
}
