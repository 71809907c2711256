import assert from "node:assert/strict";
import { ConfigurationError, ProviderError } from "../errors/RuntimeError.js";
import { jsonResponse, MemorySecretStore, routedFetch, silentLogger } from "../testing/fakes.js";
import { echochambersFactory, EchochambersProvider } from "./echochambers.js";

const log = silentLogger();

const BASE_CONFIG = {
    name: "echochambers",
    api_url: "http://rooms.test/",
    api_key: "test-secret",
    room: "general",
    sender_username: "pulse",
    sender_model: "gpt-4o-mini",
    history_read_count: 2,
    retry_delay_ms: 0,
};

const ROOMS = {
    rooms: [
        { id: "cooking", name: "Cooking", topic: "Recipes", tags: ["food"], messageCount: 3 },
        { id: "general", name: "General" },
    ],
};

function runConfigTests(): void {
    const secrets = new MemorySecretStore();
    assert.throws(
        () => echochambersFactory()({ ...BASE_CONFIG, room: "" }, { secrets, log }),
        (err: unknown) => err instanceof ConfigurationError && err.message.startsWith("Invalid echochambers config: room"),
    );
    const provider = new EchochambersProvider("echochambers", BASE_CONFIG, { secrets, log });
    assert.equal(provider.config.post_history_track, 50);
    assert.equal(provider.config.message_interval, 60);
    assert.deepEqual([...provider.operations.keys()], ["get-room-info", "get-room-history", "send-message"]);
}

async function runRoomInfoTests(): Promise<void> {
    const { fetch, requests } = routedFetch({ "GET /api/rooms": () => jsonResponse(ROOMS) });
    const provider = echochambersFactory()(BASE_CONFIG, { secrets: new MemorySecretStore(), log, fetch });

    assert.deepEqual(await provider.performAction("get-room-info", {}), {
        id: "general",
        name: "General",
        topic: "General Discussion",
        tags: [],
        messageCount: 0,
    });
    assert.equal(requests[0]?.url, "http://rooms.test/api/rooms");
    assert.equal(requests[0]?.headers["x-api-key"], "test-secret");

    const elsewhere = echochambersFactory()(
        { ...BASE_CONFIG, room: "philosophy" },
        { secrets: new MemorySecretStore(), log, fetch },
    );
    assert.equal(await elsewhere.isConfigured(), false);
    await assert.rejects(
        elsewhere.performAction("get-room-info", {}),
        (err: unknown) => err instanceof ProviderError
            && err.message === "echochambers.get-room-info failed: Room 'philosophy' not found",
    );
}

async function runHistoryTests(): Promise<void> {
    const { fetch } = routedFetch({
        "GET /api/rooms/general/history": () => jsonResponse({
            messages: [
                { id: "m3", content: "newest", sender: { username: "ada", model: "m" }, timestamp: "t3", roomId: "general" },
                { id: "m2", content: "middle" },
                { id: "m1", content: "oldest", sender: { username: "bob", model: "m" }, timestamp: "t1", roomId: "general" },
            ],
        }),
    });
    const provider = echochambersFactory()(BASE_CONFIG, { secrets: new MemorySecretStore(), log, fetch });

    assert.deepEqual(await provider.performAction("get-room-history", {}), [
        { id: "m3", content: "newest", sender: { username: "ada", model: "m" }, timestamp: "t3", roomId: "general" },
        { id: "m2", content: "middle", sender: { username: "", model: "" }, timestamp: "", roomId: "" },
    ]);
}

async function runSendMessageTests(): Promise<void> {
    let attempts = 0;
    const { fetch, requests } = routedFetch({
        "POST /api/rooms/general/message": () => {
            attempts++;
            return attempts === 1 ? jsonResponse({ error: "busy" }, 503) : jsonResponse({ id: "m4" });
        },
    });
    const provider = echochambersFactory()(BASE_CONFIG, { secrets: new MemorySecretStore(), log, fetch });

    assert.deepEqual(await provider.performAction("send-message", { content: "Hello, room" }), { id: "m4" });
    assert.equal(requests.length, 2);
    assert.equal(requests[1]?.method, "POST");
    assert.deepEqual(requests[1]?.body, {
        content: "Hello, room",
        sender: { username: "pulse", model: "gpt-4o-mini" },
    });

    // Client errors are not retried
    const rejecting = routedFetch({
        "POST /api/rooms/general/message": () => jsonResponse({ error: "forbidden" }, 403),
    });
    const other = echochambersFactory()(BASE_CONFIG, { secrets: new MemorySecretStore(), log, fetch: rejecting.fetch });
    await assert.rejects(other.performAction("send-message", { content: "hi" }), ProviderError);
    assert.equal(rejecting.requests.length, 1);
}

runConfigTests();
await runRoomInfoTests();
await runHistoryTests();
await runSendMessageTests();
console.log("Echochambers provider tests passed.");
