/**
 * API Server: HTTP control plane for the agent runner.
 *
 * Provides REST endpoints for:
 * - Status and metrics
 * - Agent definitions (list, load)
 * - Connections (status, actions, env-driven configure)
 * - One-shot actions while the loop is stopped
 * - Loop lifecycle (start/stop) and run history
 */

import { createServer, type IncomingMessage, type Server } from "node:http";
import { ZodError } from "zod";
import type { AgentManager } from "../agent/manager.js";
import type { Agent } from "../agent/runtime.js";
import { AgentRuntimeError, InvalidParametersError, type RuntimeErrorKind } from "../errors/RuntimeError.js";
import { extractErrorMessage } from "../errors.js";
import { getUrl, parseBody, PayloadTooLargeError, withCors, writeJson, writeText } from "../http.js";
import type { Logger } from "../logger.js";
import type { MetricsRegistry } from "../metrics.js";
import type { RunRecordStore } from "../store/interface.js";
import { parseActionRequest, parseAgentName, parseRunsLimit } from "../validation.js";

// ═══════════════════════════════════════════════════════
//                  Server Config
// ═══════════════════════════════════════════════════════

export interface ApiServerConfig {
    apiPort: number;
    apiHost: string;
    apiKey: string;
    statusRunsLimit: number;
}

export interface ApiServerContext {
    config: ApiServerConfig;
    agentManager: AgentManager;
    runs: RunRecordStore;
    metrics: MetricsRegistry;
    log: Logger;
}

// ═══════════════════════════════════════════════════════
//                  Helpers
// ═══════════════════════════════════════════════════════

const STATUS_BY_KIND: Record<RuntimeErrorKind, number> = {
    configuration: 400,
    not_found: 404,
    not_configured: 503,
    unknown_operation: 404,
    invalid_parameters: 400,
    provider: 502,
};

function requireApiKey(req: IncomingMessage, apiKey: string): boolean {
    if (!apiKey) return true;
    const provided = req.headers["x-api-key"];
    return provided === apiKey;
}

function errorBody(err: AgentRuntimeError): Record<string, unknown> {
    const body: Record<string, unknown> = { error: err.userMessage, kind: err.kind };
    if (err instanceof InvalidParametersError) body.violations = err.violations;
    return body;
}

class NoAgentLoadedError extends Error {
    constructor() {
        super("No agent loaded");
        this.name = "NoAgentLoadedError";
    }
}

// ═══════════════════════════════════════════════════════
//                  Server
// ═══════════════════════════════════════════════════════

export function createApiServer(ctx: ApiServerContext): Server {
    const { config, agentManager, runs, log } = ctx;

    const requireAgent = (): Agent => {
        const agent = agentManager.current;
        if (!agent) throw new NoAgentLoadedError();
        return agent;
    };

    return createServer(async (req, res) => {
        try {
            if (!req.url || !req.method) {
                writeJson(res, 400, { error: "invalid request" });
                return;
            }

            const url = getUrl(req, `${config.apiHost}:${config.apiPort}`);
            const path = url.pathname.replace(/\/+$/, "") || "/";

            if (req.method === "OPTIONS") {
                withCors(res);
                res.statusCode = 204;
                res.end();
                return;
            }

            // Auth check for mutating endpoints
            if (req.method === "POST" && !requireApiKey(req, config.apiKey)) {
                writeJson(res, 401, { error: "unauthorized" });
                return;
            }

            // ── Status ─────────────────────────────────────
            if (req.method === "GET" && path === "/") {
                const agent = agentManager.current;
                writeJson(res, 200, {
                    status: "running",
                    agent: agent?.name ?? null,
                    loop: agent?.status ?? "STOPPED",
                    running: agentManager.isRunning(),
                    connections: agent?.registry.names ?? [],
                    lastIteration: agent?.lastOutcome ?? null,
                    state: agent?.state.snapshot() ?? null,
                });
                return;
            }

            // ── Agents ─────────────────────────────────────
            if (req.method === "GET" && path === "/agents") {
                writeJson(res, 200, { agents: await agentManager.listAgents() });
                return;
            }

            const loadMatch = /^\/agents\/([^/]+)\/load$/.exec(path);
            if (req.method === "POST" && loadMatch?.[1]) {
                const name = parseAgentName(loadMatch[1]);
                const agent = await agentManager.load(name);
                log.info(`Agent '${agent.name}' loaded via API`);
                writeJson(res, 200, { status: "success", agent: agent.name });
                return;
            }

            // ── Connections ────────────────────────────────
            if (req.method === "GET" && path === "/connections") {
                const agent = requireAgent();
                writeJson(res, 200, { connections: await agent.registry.listProviders() });
                return;
            }

            const actionsMatch = /^\/connections\/([^/]+)\/actions$/.exec(path);
            if (req.method === "GET" && actionsMatch?.[1]) {
                const name = decodeURIComponent(actionsMatch[1]);
                const described = requireAgent().registry.describe(name);
                if (!described.ok) {
                    writeJson(res, 404, errorBody(described.error));
                    return;
                }
                writeJson(res, 200, { connection: name, actions: described.value });
                return;
            }

            const configureMatch = /^\/connections\/([^/]+)\/configure$/.exec(path);
            if (req.method === "POST" && configureMatch?.[1]) {
                const name = decodeURIComponent(configureMatch[1]);
                const result = await requireAgent().registry.configure(name, {});
                if (!result.ok) {
                    writeJson(res, 404, errorBody(result.error));
                    return;
                }
                writeJson(res, result.value ? 200 : 400, {
                    status: result.value ? "success" : "failed",
                    connection: name,
                    configured: result.value,
                });
                return;
            }

            // ── One-shot action ────────────────────────────
            if (req.method === "POST" && path === "/agent/action") {
                const agent = requireAgent();
                if (agentManager.isRunning()) {
                    writeJson(res, 409, { error: "Agent loop is running; stop it before performing actions" });
                    return;
                }
                const payload = parseActionRequest(await parseBody(req));
                const result = await agent.performAction(payload.connection, payload.action, payload.params);
                if (!result.ok) {
                    writeJson(res, STATUS_BY_KIND[result.error.kind], errorBody(result.error));
                    return;
                }
                writeJson(res, 200, { status: "success", result: result.value ?? null });
                return;
            }

            // ── Lifecycle ──────────────────────────────────
            if (req.method === "POST" && path === "/agent/start") {
                requireAgent();
                const started = await agentManager.start();
                writeJson(res, started ? 200 : 409, started
                    ? { status: "started" }
                    : { error: "Agent loop is already running" });
                return;
            }

            if (req.method === "POST" && path === "/agent/stop") {
                const stopped = await agentManager.stop();
                writeJson(res, stopped ? 200 : 409, stopped
                    ? { status: "stopped" }
                    : { error: "Agent loop is not running" });
                return;
            }

            if (req.method === "GET" && path === "/agent/runs") {
                const limit = parseRunsLimit(url, config.statusRunsLimit);
                const agent = agentManager.current;
                writeJson(res, 200, { runs: await runs.list(agent?.name, limit) });
                return;
            }

            // ── Metrics ────────────────────────────────────
            if (req.method === "GET" && path === "/metrics") {
                if (url.searchParams.get("format") === "prometheus") {
                    writeText(res, 200, ctx.metrics.toPrometheus());
                } else {
                    writeJson(res, 200, ctx.metrics.snapshot());
                }
                return;
            }

            writeJson(res, 404, { error: "not found" });
        } catch (err) {
            if (err instanceof ZodError) {
                writeJson(res, 400, {
                    error: "invalid request payload",
                    details: err.issues,
                });
                return;
            }
            if (err instanceof SyntaxError) {
                writeJson(res, 400, {
                    error: "invalid JSON body",
                    detail: err.message,
                });
                return;
            }
            if (err instanceof PayloadTooLargeError) {
                writeJson(res, 413, { error: err.message });
                return;
            }
            if (err instanceof NoAgentLoadedError) {
                writeJson(res, 400, { error: err.message });
                return;
            }
            if (err instanceof AgentRuntimeError) {
                writeJson(res, STATUS_BY_KIND[err.kind], errorBody(err));
                return;
            }
            const message = extractErrorMessage(err);
            log.error("API error:", message);
            writeJson(res, 500, { error: message });
        }
    });
}

export function startApiServer(ctx: ApiServerContext): Promise<Server> {
    const server = createApiServer(ctx);
    return new Promise((resolve, reject) => {
        server.once("error", reject);
        server.listen(ctx.config.apiPort, ctx.config.apiHost, () => {
            server.off("error", reject);
            ctx.log.info(
                `Control API listening on http://${ctx.config.apiHost}:${ctx.config.apiPort}`,
            );
            resolve(server);
        });
    });
}
