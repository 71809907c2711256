/**
 * Bootstrap: wires concrete implementations together once at startup.
 *
 * This is the single place where the provider catalog, behaviors, secret
 * store and run history meet; everything downstream receives them by
 * reference.
 */

import { AgentManager } from "./agent/manager.js";
import { createDefaultBehaviors } from "./behaviors/registry.js";
import type { RunnerConfig } from "./config.js";
import type { Logger } from "./logger.js";
import { createDefaultCatalog } from "./providers/catalog.js";
import { DotenvSecretStore } from "./providers/secrets.js";
import { createRunRecordStore, isDatabaseConfigured, type RunRecordStore } from "./store/index.js";

export interface Runtime {
    manager: AgentManager;
    runs: RunRecordStore;
}

export async function bootstrapRuntime(config: RunnerConfig, log: Logger): Promise<Runtime> {
    const runs = createRunRecordStore(config);
    await runs.init();
    log.info(`Run history: ${isDatabaseConfigured(config) ? "postgres" : "in-memory"}`);

    const manager = new AgentManager({
        agentsDir: config.agentsDir,
        catalog: createDefaultCatalog(),
        secrets: new DotenvSecretStore(config.secretsFile),
        behaviors: createDefaultBehaviors(),
        log,
        runs,
        statusCacheMs: config.providerStatusCacheMs,
        failureDelayMs: config.loopFailureDelayMs,
        startupDelayMs: config.loopStartupDelayMs,
        feedIntervalMs: config.listenerIntervalMs,
    });

    return { manager, runs };
}
