import assert from "node:assert/strict";
import type { FeedContext } from "../behaviors/interface.js";
import { echochambersFactory } from "../providers/echochambers.js";
import { ProviderRegistry } from "../providers/registry.js";
import {
    catalogOf,
    jsonResponse,
    MemorySecretStore,
    recordingSleep,
    routedFetch,
    silentLogger,
} from "../testing/fakes.js";
import { MessageChannel } from "./channel.js";
import { ROOM_SOURCE, RoomListener } from "./listener.js";
import type { InboundRecord } from "./state.js";

function message(id: string, username: string, content: string) {
    return { id, content, sender: { username, model: "m" }, timestamp: `t-${id}`, roomId: "general" };
}

function buildFeed(history: { messages: unknown[] }): { ctx: FeedContext; channel: MessageChannel<InboundRecord> } {
    const { fetch } = routedFetch({
        "GET /api/rooms": () => jsonResponse({ rooms: [{ id: "general", name: "General" }] }),
        "GET /api/rooms/general/history": () => jsonResponse(history),
    });
    const registry = ProviderRegistry.fromConfig([{
        name: ROOM_SOURCE,
        api_url: "http://rooms.test",
        api_key: "test-secret",
        room: "general",
        sender_username: "pulse",
        sender_model: "gpt-4o-mini",
        history_read_count: 10,
    }], {
        catalog: catalogOf({ [ROOM_SOURCE]: echochambersFactory() }),
        secrets: new MemorySecretStore(),
        log: silentLogger(),
        fetch,
    });
    const channel = new MessageChannel<InboundRecord>();
    const ctx: FeedContext = {
        registry,
        channel,
        log: silentLogger(),
        sleep: recordingSleep().sleep,
        intervalMs: 500,
        providerSetting: (provider, key) => {
            const found = registry.get(provider);
            return found.ok ? found.value.config[key] : undefined;
        },
    };
    return { ctx, channel };
}

async function runPollTests(): Promise<void> {
    const history = {
        messages: [
            message("m3", "ada", "third"),
            message("m2", "pulse", "mine"),
            message("m1", "bob", "first"),
            message("m0", "carl", ""),
        ],
    };
    const { ctx, channel } = buildFeed(history);
    const listener = new RoomListener();

    assert.equal(await listener.poll(ctx), 2);
    const records = channel.drain();
    // Oldest first, own and empty messages dropped
    assert.deepEqual(records.map((r) => [r.source, r.id, r.author, r.content]), [
        ["echochambers", "m1", "bob", "first"],
        ["echochambers", "m3", "ada", "third"],
    ]);

    assert.equal(await listener.poll(ctx), 0);

    history.messages.unshift(message("m4", "bob", "fourth"));
    assert.equal(await listener.poll(ctx), 1);
    assert.deepEqual(channel.drain().map((r) => r.id), ["m4"]);
}

async function runLoopTests(): Promise<void> {
    const { ctx, channel } = buildFeed({ messages: [message("m1", "bob", "hi")] });
    const controller = new AbortController();
    const { sleep, delays } = recordingSleep((_ms, calls) => {
        if (calls === 2) controller.abort();
    });

    await new RoomListener().run({ ...ctx, sleep }, controller.signal);
    assert.deepEqual(delays, [500, 500]);
    assert.deepEqual(channel.drain().map((r) => r.id), ["m1"]);
}

async function runUnavailableTests(): Promise<void> {
    const { ctx, channel } = buildFeed({ messages: [] });
    const offline: FeedContext = { ...ctx, registry: ProviderRegistry.fromConfig([], {
        catalog: catalogOf({}),
        secrets: new MemorySecretStore(),
        log: silentLogger(),
    }) };
    assert.equal(await new RoomListener().poll(offline), 0);
    assert.equal(channel.pending, 0);
}

await runPollTests();
await runLoopTests();
await runUnavailableTests();
console.log("Room listener tests passed.");
