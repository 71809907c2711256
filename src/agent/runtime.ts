/**
 * Agent Runtime: the autonomous loop.
 *
 * One iteration:
 *   1. Drain  : move feed records some task consumes into Agent State
 *   2. Refill : fetch inputs the agent's tasks expect but State lacks
 *   3. Select : weighted task draw, time-adjusted when configured
 *   4. Execute: run the bound behavior
 *   5. Pace   : loop_delay after success, failure back-off otherwise
 *
 * An iteration never throws. A failure is logged and recorded, then
 * the failure back-off applies. Only the abort signal stops the loop.
 */

import { ConfigurationError } from "../errors/RuntimeError.js";
import { extractErrorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import {
    metrics,
    METRIC_ITERATION_DURATION_MS,
    METRIC_ITERATION_ERRORS,
    METRIC_LOOP_TICKS,
    METRIC_TASK_FAILURE,
    METRIC_TASK_SUCCESS,
} from "../metrics.js";
import type { BehaviorRegistry } from "../behaviors/registry.js";
import type {
    AgentBehavior,
    AgentContext,
    BackgroundFeed,
    FeedContext,
    FeedFactory,
    InputSource,
} from "../behaviors/interface.js";
import type { OperationParams } from "../providers/interface.js";
import type { DispatchResult, ProviderRegistry } from "../providers/registry.js";
import { TaskScheduler } from "../scheduler/taskScheduler.js";
import { timeRulesFromDefinition } from "../scheduler/timeRules.js";
import { sleep as defaultSleep, type Sleep } from "../sleep.js";
import type { RunRecordStore } from "../store/interface.js";
import { MessageChannel } from "./channel.js";
import type { AgentDefinition } from "./definition.js";
import { AgentState, type InboundRecord } from "./state.js";

export type AgentStatus = "RUNNING" | "STOPPED";

export interface AgentOptions {
    registry: ProviderRegistry;
    behaviors: BehaviorRegistry;
    log: Logger;
    /** Pause after a failed iteration. Default: 60s */
    failureDelayMs?: number;
    /** Pause before the first iteration. Default: 0 */
    startupDelayMs?: number;
    /** Poll interval handed to background feeds. Default: 30s */
    feedIntervalMs?: number;
    sleep?: Sleep;
    random?: () => number;
    clock?: () => Date;
    runs?: RunRecordStore;
}

export interface IterationOutcome {
    task: string | null;
    success: boolean;
    error?: string;
    delayMs: number;
    durationMs: number;
}

export class Agent implements AgentContext {
    readonly name: string;
    readonly state = new AgentState();
    readonly log: Logger;
    readonly registry: ProviderRegistry;
    readonly channel = new MessageChannel<InboundRecord>();

    private readonly scheduler: TaskScheduler;
    private readonly taskBehaviors: AgentBehavior[];
    private readonly behaviorsByName: Map<string, AgentBehavior>;
    private readonly feeds: BackgroundFeed[];
    private readonly consumedSources: ReadonlySet<string>;
    private readonly successDelayMs: number;
    private readonly failureDelayMs: number;
    private readonly startupDelayMs: number;
    private readonly feedIntervalMs: number;
    private readonly sleepFn: Sleep;
    private readonly randomFn: () => number;
    private readonly clock: () => Date;
    private readonly runs?: RunRecordStore;

    private llmProvider: string | null = null;
    private systemPrompt: string | null = null;
    private currentStatus: AgentStatus = "STOPPED";
    private looping = false;
    private lastOutcomeValue: IterationOutcome | null = null;

    constructor(readonly definition: AgentDefinition, opts: AgentOptions) {
        this.name = definition.name;
        this.registry = opts.registry;
        this.log = opts.log.child(`agent:${definition.name}`);

        const unknown = definition.tasks.filter((t) => !opts.behaviors.has(t.name)).map((t) => t.name);
        if (unknown.length > 0) {
            throw new ConfigurationError(`Tasks without a registered behavior: ${unknown.join(", ")}`);
        }

        this.taskBehaviors = [];
        for (const task of definition.tasks) {
            const behavior = opts.behaviors.get(task.name);
            if (behavior && !this.taskBehaviors.includes(behavior)) this.taskBehaviors.push(behavior);
        }
        this.behaviorsByName = new Map(this.taskBehaviors.map((b) => [b.name, b]));

        // One instance of each feed per agent
        const factories = new Map<string, FeedFactory>();
        for (const behavior of this.taskBehaviors) {
            for (const factory of behavior.feeds ?? []) {
                if (!factories.has(factory.name)) factories.set(factory.name, factory);
            }
        }
        this.feeds = [...factories.values()].map((factory) => factory.create());
        this.consumedSources = new Set(this.taskBehaviors.flatMap((b) => b.consumes ?? []));

        this.randomFn = opts.random ?? Math.random;
        this.clock = opts.clock ?? (() => new Date());
        this.scheduler = new TaskScheduler(definition.tasks, {
            timeRules: timeRulesFromDefinition(definition.time_rules, definition.time_based_multipliers),
            random: this.randomFn,
            clock: this.clock,
        });

        this.successDelayMs = definition.loop_delay * 1000;
        this.failureDelayMs = opts.failureDelayMs ?? 60_000;
        this.startupDelayMs = opts.startupDelayMs ?? 0;
        this.feedIntervalMs = opts.feedIntervalMs ?? 30_000;
        this.sleepFn = opts.sleep ?? defaultSleep;
        this.runs = opts.runs;
    }

    get status(): AgentStatus {
        return this.currentStatus;
    }

    get lastOutcome(): IterationOutcome | null {
        return this.lastOutcomeValue;
    }

    // ═══════════════════════════════════════════════════════
    //                  AgentContext
    // ═══════════════════════════════════════════════════════

    now(): Date {
        return this.clock();
    }

    random(): number {
        return this.randomFn();
    }

    performAction(
        provider: string,
        operation: string,
        params: readonly unknown[] | OperationParams,
    ): Promise<DispatchResult> {
        return isPositional(params)
            ? this.registry.dispatch(provider, operation, params)
            : this.registry.dispatchNamed(provider, operation, params);
    }

    providerSetting(provider: string, key: string): unknown {
        const found = this.registry.get(provider);
        return found.ok ? found.value.config[key] : undefined;
    }

    // ═══════════════════════════════════════════════════════
    //                  LLM
    // ═══════════════════════════════════════════════════════

    /** Pick the first configured LLM provider, in registration order */
    async setupLlmProvider(): Promise<string> {
        const providers = await this.registry.listLlmProviders();
        const first = providers[0];
        if (!first) {
            throw new ConfigurationError("No configured LLM provider found");
        }
        this.llmProvider = first;
        this.log.info(`Using LLM provider '${first}'`);
        return first;
    }

    get modelProvider(): string | null {
        return this.llmProvider;
    }

    async promptLlm(prompt: string, systemPrompt?: string): Promise<string | null> {
        let provider = this.llmProvider;
        if (!provider) {
            try {
                provider = await this.setupLlmProvider();
            } catch (err) {
                this.log.error(extractErrorMessage(err));
                return null;
            }
        }

        const result = await this.registry.dispatch(provider, "generate-text", [
            prompt,
            systemPrompt ?? this.constructSystemPrompt(),
        ]);
        if (!result.ok) return null;
        return typeof result.value === "string" && result.value.trim() ? result.value.trim() : null;
    }

    /** Bio, traits and style examples; built once */
    constructSystemPrompt(): string {
        if (this.systemPrompt !== null) return this.systemPrompt;

        const { bio, traits, examples } = this.definition;
        const parts: string[] = [...bio];
        if (traits.length > 0) {
            parts.push("\nYour key traits are:");
            parts.push(...traits.map((trait) => `- ${trait}`));
        }
        if (examples.length > 0) {
            parts.push("\nHere are some examples of your style (Please avoid repeating any of these):");
            parts.push(...examples.map((example) => `- ${example}`));
        }

        this.systemPrompt = parts.join("\n");
        return this.systemPrompt;
    }

    // ═══════════════════════════════════════════════════════
    //                  Iteration
    // ═══════════════════════════════════════════════════════

    async runIteration(): Promise<IterationOutcome> {
        const started = Date.now();
        metrics.inc(METRIC_LOOP_TICKS);
        let task: string | null = null;
        let outcome: IterationOutcome;

        try {
            this.drainChannel();

            await this.replenishInputs();

            const selected = this.scheduler.select({ timeBased: this.definition.use_time_based_weights });
            if (!selected.ok) throw selected.error;
            task = selected.value.name;

            const behavior = this.behaviorsByName.get(task);
            if (!behavior) throw new ConfigurationError(`No behavior for task '${task}'`);

            this.log.info(`Running task '${task}'`);
            const success = await behavior.run(this);
            metrics.inc(success ? METRIC_TASK_SUCCESS : METRIC_TASK_FAILURE);

            outcome = {
                task,
                success,
                delayMs: success ? this.successDelayMs : this.failureDelayMs,
                durationMs: Date.now() - started,
            };
        } catch (err) {
            const message = extractErrorMessage(err);
            this.log.error(`Error in loop iteration${task ? ` (${task})` : ""}: ${message}`);
            metrics.inc(METRIC_ITERATION_ERRORS);
            outcome = {
                task,
                success: false,
                error: message,
                delayMs: this.failureDelayMs,
                durationMs: Date.now() - started,
            };
        }

        metrics.observe(METRIC_ITERATION_DURATION_MS, outcome.durationMs);
        this.lastOutcomeValue = outcome;
        await this.recordRun(outcome);
        return outcome;
    }

    private drainChannel(): void {
        const drained = this.channel.drain();
        if (drained.length === 0) return;
        const consumed = drained.filter((record) => this.consumedSources.has(record.source));
        if (consumed.length < drained.length) {
            this.log.debug(`Dropped ${drained.length - consumed.length} record(s) no task consumes`);
        }
        if (consumed.length > 0) this.state.receive(consumed);
    }

    private async replenishInputs(): Promise<void> {
        const seen = new Set<string>();
        const sources: InputSource[] = [];
        for (const behavior of this.taskBehaviors) {
            for (const input of behavior.inputs ?? []) {
                if (seen.has(input.name)) continue;
                seen.add(input.name);
                sources.push(input);
            }
        }
        for (const source of sources) {
            if (source.isMissing(this.state)) await source.replenish(this);
        }
    }

    private async recordRun(outcome: IterationOutcome): Promise<void> {
        if (!this.runs) return;
        try {
            await this.runs.record({ agent: this.name, ...outcome });
        } catch (err) {
            this.log.warn(`Failed to record run: ${extractErrorMessage(err)}`);
        }
    }

    // ═══════════════════════════════════════════════════════
    //                  Loop
    // ═══════════════════════════════════════════════════════

    /** Resolve an LLM provider when any task needs one */
    async prepare(): Promise<void> {
        if (this.taskBehaviors.some((b) => b.usesLlm) && !this.llmProvider) {
            await this.setupLlmProvider();
        }
    }

    /**
     * Run until `signal` aborts. Throws when startup fails (no LLM provider
     * for tasks that need one) or when this agent's loop is already running.
     */
    async loop(signal: AbortSignal): Promise<void> {
        if (this.looping) throw new ConfigurationError(`Agent '${this.name}' is already running`);
        this.looping = true;
        try {
            await this.prepare();
        } catch (err) {
            this.looping = false;
            throw err;
        }

        this.currentStatus = "RUNNING";
        this.log.info("Starting agent loop");

        const feedController = new AbortController();
        const stopFeeds = () => feedController.abort();
        signal.addEventListener("abort", stopFeeds, { once: true });
        const feeds = this.startFeeds(feedController.signal);

        try {
            if (this.startupDelayMs > 0) {
                await this.sleepFn(this.startupDelayMs, signal);
            }
            while (!signal.aborted) {
                const outcome = await this.runIteration();
                if (signal.aborted) break;
                this.log.info(`Waiting ${Math.round(outcome.delayMs / 1000)}s before next loop`);
                await this.sleepFn(outcome.delayMs, signal);
            }
        } finally {
            this.looping = false;
            this.currentStatus = "STOPPED";
            signal.removeEventListener("abort", stopFeeds);
            feedController.abort();
            await Promise.allSettled(feeds);
            this.log.info("Agent loop stopped");
        }
    }

    private startFeeds(signal: AbortSignal): Promise<void>[] {
        const ctx: FeedContext = {
            registry: this.registry,
            channel: this.channel,
            log: this.log.child("feed"),
            sleep: this.sleepFn,
            intervalMs: this.feedIntervalMs,
            providerSetting: (provider, key) => this.providerSetting(provider, key),
        };

        return this.feeds.map((feed) =>
            feed.run(ctx, signal).catch((err: unknown) => {
                this.log.error(`Feed '${feed.name}' failed: ${extractErrorMessage(err)}`);
            }),
        );
    }
}

function isPositional(params: readonly unknown[] | OperationParams): params is readonly unknown[] {
    return Array.isArray(params);
}
