import assert from "node:assert/strict";
import { z } from "zod";
import {
    jsonResponse,
    MemorySecretStore,
    routedFetch,
    ScriptedPrompt,
    silentLogger,
} from "../testing/fakes.js";
import { perplexityFactory } from "./perplexity.js";

const log = silentLogger();

const searchBodySchema = z.object({
    model: z.string(),
    messages: z.array(z.object({ role: z.string(), content: z.unknown() })),
});

function completion(content: string): Response {
    return jsonResponse({
        id: "px-1",
        object: "chat.completion",
        created: 1_700_000_000,
        model: "sonar-reasoning-pro",
        choices: [{ index: 0, message: { role: "assistant", content }, finish_reason: "stop" }],
        usage: { prompt_tokens: 20, completion_tokens: 4, total_tokens: 24 },
    });
}

async function runSearchTests(): Promise<void> {
    const { fetch, requests } = routedFetch({ "POST /chat/completions": () => completion("Paris is the capital.") });
    const provider = perplexityFactory()({ name: "perplexity" }, {
        secrets: new MemorySecretStore({ PERPLEXITY_API_KEY: "test-secret" }),
        log,
        fetch,
    });

    assert.equal(provider.isLlmProvider, false);
    assert.equal(provider.config.model, "sonar-reasoning-pro");
    assert.equal(await provider.isConfigured(), true);
    assert.equal(requests.length, 0);

    assert.equal(await provider.performAction("search", { query: "capital of France" }), "Paris is the capital.");
    assert.equal(requests[0]?.url, "https://api.perplexity.ai/chat/completions");
    assert.equal(requests[0]?.headers.authorization, "Bearer test-secret");
    const body = searchBodySchema.parse(requests[0]?.body);
    assert.equal(body.model, "sonar-reasoning-pro");
    assert.deepEqual(body.messages.map((m) => m.role), ["system", "user"]);
    assert.equal(body.messages[1]?.content, "capital of France");

    await provider.performAction("search", { query: "tides", model: "sonar" });
    assert.equal(searchBodySchema.parse(requests[1]?.body).model, "sonar");
}

async function runConfigureTests(): Promise<void> {
    const secrets = new MemorySecretStore();
    const { fetch, requests } = routedFetch({ "POST /chat/completions": () => completion("ok") });
    const provider = perplexityFactory()({}, { secrets, log, fetch });

    assert.equal(await provider.isConfigured(), false);
    assert.equal(await provider.configure({ prompt: new ScriptedPrompt(["test-secret"]) }), true);
    assert.equal(secrets.values.get("PERPLEXITY_API_KEY"), "test-secret");
    assert.equal(requests.length, 1);

    const rejecting = routedFetch({ "POST /chat/completions": () => jsonResponse({ error: "bad key" }, 401) });
    const fresh = new MemorySecretStore();
    const other = perplexityFactory()({}, { secrets: fresh, log, fetch: rejecting.fetch });
    assert.equal(await other.configure({ prompt: new ScriptedPrompt(["test-secret"]) }), false);
    assert.equal(fresh.writes, 0);
}

await runSearchTests();
await runConfigureTests();
console.log("Perplexity provider tests passed.");
