import assert from "node:assert/strict";
import { Agent } from "../agent/runtime.js";
import { echochambersFactory } from "../providers/echochambers.js";
import { ProviderRegistry } from "../providers/registry.js";
import {
    agentDefinition,
    catalogOf,
    jsonResponse,
    MemorySecretStore,
    routedFetch,
    ScriptedLlmProvider,
    silentLogger,
    type RecordedRequest,
} from "../testing/fakes.js";
import { postEchochambers, replyEchochambers, roomInfoInput } from "./echochambers.js";
import { buildRoomPostPrompt, buildRoomReplyPrompt } from "./prompts.js";
import { createDefaultBehaviors } from "./registry.js";

const T0 = Date.UTC(2026, 0, 15, 12, 0, 0);

interface Room {
    agent: Agent;
    llm: ScriptedLlmProvider;
    sent: () => unknown[];
    setNow: (ms: number) => void;
    setRandom: (value: number) => void;
    history: unknown[];
    failSends: (fail: boolean) => void;
}

function message(id: string, username: string, content: string) {
    return { id, content, sender: { username, model: "m" }, timestamp: `t-${id}`, roomId: "general" };
}

function buildRoom(): Room {
    const history: unknown[] = [];
    let sendsFail = false;
    const { fetch, requests } = routedFetch({
        "GET /api/rooms": () => jsonResponse({
            rooms: [{ id: "general", name: "General", topic: "Compilers", tags: ["pl"] }],
        }),
        "GET /api/rooms/general/history": () => jsonResponse({ messages: history }),
        "POST /api/rooms/general/message": () =>
            sendsFail ? jsonResponse({ error: "rejected" }, 400) : jsonResponse({ ok: true }),
    });

    const writers: ScriptedLlmProvider[] = [];
    const registry = ProviderRegistry.fromConfig([
        { name: "writer" },
        {
            name: "echochambers",
            api_url: "http://rooms.test",
            api_key: "test-secret",
            room: "general",
            sender_username: "pulse",
            sender_model: "gpt-4o-mini",
            history_read_count: 10,
            post_history_track: 2,
            message_interval: 60,
        },
    ], {
        catalog: catalogOf({
            writer: (config, deps) => {
                const writer = new ScriptedLlmProvider("writer", config, deps);
                writers.push(writer);
                return writer;
            },
            echochambers: echochambersFactory(),
        }),
        secrets: new MemorySecretStore(),
        log: silentLogger(),
        fetch,
    });
    const llm = writers[0];
    if (!llm) throw new Error("writer was not registered");

    let now = T0;
    let random = 0.5;
    const agent = new Agent(
        agentDefinition({ tasks: [{ name: "post-echochambers", weight: 1 }, { name: "reply-echochambers", weight: 1 }] }),
        {
            registry,
            behaviors: createDefaultBehaviors(),
            log: silentLogger(),
            clock: () => new Date(now),
            random: () => random,
        },
    );
    const posted = (req: RecordedRequest) => req.method === "POST" && req.url.endsWith("/message");
    return {
        agent,
        llm,
        history,
        sent: () => requests.filter(posted).map((req) => req.body),
        setNow: (ms) => {
            now = ms;
        },
        setRandom: (value) => {
            random = value;
        },
        failSends: (fail) => {
            sendsFail = fail;
        },
    };
}

async function runPostTests(): Promise<void> {
    const { agent, llm, sent, setNow } = buildRoom();

    // Room info is fetched by the loop before behaviors need it
    assert.equal(await postEchochambers.run(agent), false);
    assert.equal(llm.prompts.length, 0);

    assert.equal(roomInfoInput.isMissing(agent.state), true);
    await roomInfoInput.replenish(agent);
    const room = agent.state.roomInfo;
    assert.deepEqual(room, { id: "general", name: "General", topic: "Compilers", tags: ["pl"], messageCount: 0 });
    if (!room) return;

    llm.replies = ["First post", "Second", "Third", ""];
    assert.equal(await postEchochambers.run(agent), true);
    assert.equal(llm.prompts[0]?.prompt, buildRoomPostPrompt(room, []));
    assert.equal(llm.prompts[0]?.system, agent.constructSystemPrompt());
    assert.deepEqual(sent(), [{ content: "First post", sender: { username: "pulse", model: "gpt-4o-mini" } }]);
    assert.equal(agent.state.lastRoomPostAt, T0);

    // Exactly one interval later is still too early
    setNow(T0 + 60_000);
    assert.equal(await postEchochambers.run(agent), false);
    assert.equal(llm.prompts.length, 1);

    setNow(T0 + 61_000);
    assert.equal(await postEchochambers.run(agent), true);
    setNow(T0 + 122_000);
    assert.equal(await postEchochambers.run(agent), true);
    assert.equal(llm.prompts[2]?.prompt, buildRoomPostPrompt(room, ["First post", "Second"]));
    assert.deepEqual(agent.state.sentMessages, ["Second", "Third"]);

    // Nothing generated: nothing sent, timer untouched
    setNow(T0 + 200_000);
    assert.equal(await postEchochambers.run(agent), false);
    assert.equal(sent().length, 3);
    assert.equal(agent.state.lastRoomPostAt, T0 + 122_000);
}

async function runReplyFromHistoryTests(): Promise<void> {
    const { agent, llm, sent, history } = buildRoom();
    await roomInfoInput.replenish(agent);
    const room = agent.state.roomInfo;
    if (!room) throw new Error("room info missing");

    history.push(message("m2", "ada", "What is SSA?"), message("m1", "pulse", "My own note"));
    llm.replies = ["Static single assignment."];

    assert.equal(await replyEchochambers.run(agent), true);
    assert.equal(
        llm.prompts[0]?.prompt,
        buildRoomReplyPrompt(room, { author: "ada", content: "What is SSA?" }, true),
    );
    assert.deepEqual(sent(), [{ content: "Static single assignment.", sender: { username: "pulse", model: "gpt-4o-mini" } }]);
    assert.equal(agent.state.hasReplied("m2"), true);
    assert.deepEqual(agent.state.sentMessages, ["Static single assignment."]);

    // Own messages and answered ones are never replied to
    assert.equal(await replyEchochambers.run(agent), false);
    assert.equal(await replyEchochambers.run(agent), false);
    assert.equal(llm.prompts.length, 1);
}

async function runReplyFromInboxTests(): Promise<void> {
    const { agent, llm, sent, setRandom, failSends } = buildRoom();
    await roomInfoInput.replenish(agent);
    const room = agent.state.roomInfo;
    if (!room) throw new Error("room info missing");

    agent.state.receive([
        { source: "echochambers", id: "r1", author: "bob", content: "First question", receivedAt: T0 },
        { source: "echochambers", id: "r2", author: "carl", content: "Second question", receivedAt: T0 },
    ]);

    // No text generated: everything goes back to the inbox
    llm.replies = [""];
    assert.equal(await replyEchochambers.run(agent), false);
    assert.equal(agent.state.inboxSize, 2);

    // Send rejected: same
    failSends(true);
    llm.replies = ["Answer one"];
    assert.equal(await replyEchochambers.run(agent), false);
    assert.equal(agent.state.inboxSize, 2);
    assert.equal(agent.state.hasReplied("r1"), false);

    failSends(false);
    setRandom(0.9);
    llm.replies = ["Answer one"];
    assert.equal(await replyEchochambers.run(agent), true);
    assert.equal(
        llm.prompts[2]?.prompt,
        buildRoomReplyPrompt(room, { author: "bob", content: "First question" }, false),
    );
    assert.equal(agent.state.hasReplied("r1"), true);
    assert.equal(agent.state.inboxSize, 1);

    llm.replies = ["Answer two"];
    assert.equal(await replyEchochambers.run(agent), true);
    assert.equal(agent.state.inboxSize, 0);
    // Two replies plus the rejected attempt
    assert.equal(sent().length, 3);
}

function runPromptTests(): void {
    const room = { id: "general", name: "General", topic: "Compilers", tags: [], messageCount: 0 };
    assert.equal(
        buildRoomReplyPrompt(room, { author: "ada", content: "hi" }, true),
        'You are in a chat room about "Compilers" (tags: none).\n@ada wrote: "hi"\n'
        + "Refer to the sender as @ada.\nReply with the message text only.",
    );
    assert.equal(
        buildRoomPostPrompt(room, ["earlier"]),
        'You are posting in a chat room about "Compilers".\nRoom tags: none.\n'
        + "Write one short, original message that moves the conversation forward.\n"
        + "Do not repeat any of your earlier messages:\n- earlier\nReply with the message text only.",
    );
}

await runPostTests();
await runReplyFromHistoryTests();
await runReplyFromInboxTests();
runPromptTests();
console.log("Room behavior tests passed.");
