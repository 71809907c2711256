#!/usr/bin/env node
/**
 * Agent Runner
 *
 * Commands:
 *   serve                          control API; loads DEFAULT_AGENT when set (default)
 *   run <agent>                    run one agent's loop in the foreground
 *   configure <agent> <provider>   interactive credential setup
 *   connections <agent>            list providers and their status
 */

import "dotenv/config";
import { config } from "./config.js";
import { createLogger } from "./logger.js";
import { bootstrapRuntime } from "./bootstrap.js";
import { startApiServer } from "./api/server.js";
import { metrics } from "./metrics.js";
import { TerminalPrompt } from "./providers/prompt.js";
import { extractErrorMessage } from "./errors.js";

const log = createLogger(config.logLevel);

function usage(): never {
    console.error("Usage: pulse-agent [serve | run <agent> | configure <agent> <provider> | connections <agent>]");
    process.exit(2);
}

async function serve(): Promise<void> {
    const { manager, runs } = await bootstrapRuntime(config, log);
    if (config.defaultAgent) {
        await manager.load(config.defaultAgent);
    }

    const server = await startApiServer({
        config: {
            apiPort: config.apiPort,
            apiHost: config.apiHost,
            apiKey: config.apiKey,
            statusRunsLimit: config.statusRunsLimit,
        },
        agentManager: manager,
        runs,
        metrics,
        log,
    });

    const shutdown = (signal: string) => {
        log.info(`${signal} received, shutting down`);
        server.close();
        manager.stop()
            .then(() => runs.close())
            .then(() => process.exit(0))
            .catch((err: unknown) => {
                log.error("Shutdown failed:", extractErrorMessage(err));
                process.exit(1);
            });
    };
    process.once("SIGINT", () => shutdown("SIGINT"));
    process.once("SIGTERM", () => shutdown("SIGTERM"));
}

async function run(agentName: string): Promise<void> {
    const { manager, runs } = await bootstrapRuntime(config, log);
    const agent = await manager.load(agentName);

    const controller = new AbortController();
    process.once("SIGINT", () => controller.abort());
    process.once("SIGTERM", () => controller.abort());

    log.info("Press Ctrl+C to stop the loop.");
    try {
        await agent.loop(controller.signal);
    } finally {
        await runs.close();
    }
}

async function configure(agentName: string, provider: string): Promise<void> {
    const { manager, runs } = await bootstrapRuntime(config, log);
    try {
        const agent = await manager.load(agentName);
        const result = await agent.registry.configure(provider, { prompt: new TerminalPrompt() });
        if (!result.ok || !result.value) process.exitCode = 1;
    } finally {
        await runs.close();
    }
}

async function connections(agentName: string): Promise<void> {
    const { manager, runs } = await bootstrapRuntime(config, log);
    try {
        const agent = await manager.load(agentName);
        for (const status of await agent.registry.listProviders()) {
            const mark = status.configured ? "configured" : "not configured";
            console.log(`${status.name}${status.isLlmProvider ? " (llm)" : ""}: ${mark}`);
        }
    } finally {
        await runs.close();
    }
}

async function main(argv: string[]): Promise<void> {
    const [command = "serve", ...args] = argv;
    switch (command) {
        case "serve":
            return serve();
        case "run": {
            const name = args[0] ?? config.defaultAgent;
            if (!name) usage();
            return run(name);
        }
        case "configure": {
            const [name, provider] = args;
            if (!name || !provider) usage();
            return configure(name, provider);
        }
        case "connections": {
            const name = args[0] ?? config.defaultAgent;
            if (!name) usage();
            return connections(name);
        }
        default:
            usage();
    }
}

main(process.argv.slice(2)).catch((err: unknown) => {
    log.error("Fatal:", extractErrorMessage(err));
    process.exit(1);
});
