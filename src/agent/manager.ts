/**
 * Agent Manager: lifecycle of the one agent this process runs.
 *
 * Responsibilities:
 *   - Load an agent definition and build its provider registry
 *   - Start/stop the agent loop in the background
 *   - Give the control API and CLI access to the loaded agent
 */

import { ConfigurationError } from "../errors/RuntimeError.js";
import { extractErrorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { BehaviorRegistry } from "../behaviors/registry.js";
import type { FetchLike, ProviderCatalog } from "../providers/interface.js";
import { ProviderRegistry } from "../providers/registry.js";
import type { SecretStore } from "../providers/secrets.js";
import type { Sleep } from "../sleep.js";
import type { RunRecordStore } from "../store/interface.js";
import { listAgentDefinitions, loadAgentDefinition } from "./loader.js";
import { Agent } from "./runtime.js";

export interface AgentManagerOptions {
    agentsDir: string;
    catalog: ProviderCatalog;
    secrets: SecretStore;
    behaviors: BehaviorRegistry;
    log: Logger;
    runs?: RunRecordStore;
    fetch?: FetchLike;
    statusCacheMs?: number;
    failureDelayMs?: number;
    startupDelayMs?: number;
    feedIntervalMs?: number;
    sleep?: Sleep;
    random?: () => number;
}

// ═══════════════════════════════════════════════════════
//                   Agent Manager
// ═══════════════════════════════════════════════════════

export class AgentManager {
    private agent: Agent | null = null;
    private controller: AbortController | null = null;
    private loopPromise: Promise<void> | null = null;
    private readonly log: Logger;

    constructor(private readonly opts: AgentManagerOptions) {
        this.log = opts.log.child("manager");
    }

    /** Loaded agent, if any */
    get current(): Agent | null {
        return this.agent;
    }

    /**
     * Load `name` from the agents directory, replacing the current agent.
     * A running loop is stopped first.
     */
    async load(name: string): Promise<Agent> {
        const definition = await loadAgentDefinition(this.opts.agentsDir, name);

        if (this.isRunning()) {
            await this.stop();
        }

        const registry = ProviderRegistry.fromConfig(definition.config, {
            catalog: this.opts.catalog,
            secrets: this.opts.secrets,
            log: this.opts.log,
            fetch: this.opts.fetch,
            statusCacheMs: this.opts.statusCacheMs,
        });

        this.agent = new Agent(definition, {
            registry,
            behaviors: this.opts.behaviors,
            log: this.opts.log,
            runs: this.opts.runs,
            failureDelayMs: this.opts.failureDelayMs,
            startupDelayMs: this.opts.startupDelayMs,
            feedIntervalMs: this.opts.feedIntervalMs,
            sleep: this.opts.sleep,
            random: this.opts.random,
        });
        this.log.info(`Loaded agent '${definition.name}' with ${registry.names.length} provider(s)`);
        return this.agent;
    }

    /**
     * Start the loop in the background.
     * @returns false when it is already running or starting, or when stop()
     *          was called before startup finished
     * @throws ConfigurationError when no agent is loaded or no LLM is configured
     */
    async start(): Promise<boolean> {
        const agent = this.agent;
        if (!agent) throw new ConfigurationError("No agent loaded");
        if (this.isRunning()) return false;

        // Claim the slot before the first await so concurrent calls see it
        const controller = new AbortController();
        this.controller = controller;

        try {
            await agent.prepare();
        } catch (err) {
            this.release(controller);
            throw err;
        }
        if (controller.signal.aborted) {
            this.release(controller);
            return false;
        }

        this.loopPromise = agent.loop(controller.signal)
            .catch((err: unknown) => {
                this.log.error(`Agent loop exited: ${extractErrorMessage(err)}`);
            })
            .finally(() => this.release(controller));
        return true;
    }

    /** Abort the loop (or a pending start) and wait for the in-flight iteration to finish */
    async stop(): Promise<boolean> {
        const controller = this.controller;
        if (!controller) return false;

        controller.abort();
        const loop = this.loopPromise;
        if (loop) {
            await loop;
        } else {
            this.release(controller);
        }
        return true;
    }

    /** True from the moment start() claims the loop until it has exited */
    isRunning(): boolean {
        return this.controller !== null;
    }

    private release(controller: AbortController): void {
        if (this.controller !== controller) return;
        this.controller = null;
        this.loopPromise = null;
    }

    listAgents(): Promise<string[]> {
        return listAgentDefinitions(this.opts.agentsDir);
    }
}
