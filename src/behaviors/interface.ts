/**
 * AgentBehavior: what a task name binds to.
 *
 * A behavior runs once per selected iteration against the agent context
 * and reports success. Behaviors can also declare the inputs they expect
 * in Agent State (fetched by the loop when missing), background feeds
 * that should run while the loop does, and the feed sources whose records
 * they take from the inbox. Records from sources no task consumes are
 * dropped when the loop drains the channel.
 */

import type { MessageChannel } from "../agent/channel.js";
import type { AgentState, InboundRecord } from "../agent/state.js";
import type { Logger } from "../logger.js";
import type { OperationParams } from "../providers/interface.js";
import type { DispatchResult, ProviderRegistry } from "../providers/registry.js";
import type { Sleep } from "../sleep.js";

export interface AgentContext {
    readonly name: string;
    readonly state: AgentState;
    readonly log: Logger;
    readonly registry: ProviderRegistry;
    now(): Date;
    /** Uniform in [0, 1) */
    random(): number;
    /** Generated text, or null when no LLM could produce any */
    promptLlm(prompt: string, systemPrompt?: string): Promise<string | null>;
    performAction(
        provider: string,
        operation: string,
        params: readonly unknown[] | OperationParams,
    ): Promise<DispatchResult>;
    /** Validated configuration value of a registered provider */
    providerSetting(provider: string, key: string): unknown;
}

/** State an agent task family needs before it can run */
export interface InputSource {
    readonly name: string;
    isMissing(state: AgentState): boolean;
    replenish(ctx: AgentContext): Promise<void>;
}

export interface FeedContext {
    readonly registry: ProviderRegistry;
    readonly channel: MessageChannel<InboundRecord>;
    readonly log: Logger;
    readonly sleep: Sleep;
    readonly intervalMs: number;
    providerSetting(provider: string, key: string): unknown;
}

/** Background producer; returns once `signal` aborts */
export interface BackgroundFeed {
    readonly name: string;
    run(ctx: FeedContext, signal: AbortSignal): Promise<void>;
}

/** Builds a fresh feed for each agent, so feed state never outlives its agent */
export interface FeedFactory {
    readonly name: string;
    create(): BackgroundFeed;
}

export interface AgentBehavior {
    readonly name: string;
    readonly description: string;
    /** The loop resolves an LLM provider before starting when any task needs one */
    readonly usesLlm: boolean;
    readonly inputs?: readonly InputSource[];
    readonly feeds?: readonly FeedFactory[];
    /** `InboundRecord.source` values this behavior takes from the inbox */
    readonly consumes?: readonly string[];
    run(ctx: AgentContext): Promise<boolean>;
}
