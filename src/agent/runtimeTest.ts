import assert from "node:assert/strict";
import { ConfigurationError } from "../errors/RuntimeError.js";
import type { BackgroundFeed, FeedFactory, InputSource } from "../behaviors/interface.js";
import { BehaviorRegistry } from "../behaviors/registry.js";
import { ProviderRegistry } from "../providers/registry.js";
import { MemoryRunRecordStore } from "../store/memory.js";
import {
    agentDefinition,
    behavior,
    catalogOf,
    EchoProvider,
    MemorySecretStore,
    recordingSleep,
    ScriptedLlmProvider,
    silentLogger,
} from "../testing/fakes.js";
import { Agent } from "./runtime.js";
import { MAX_INBOX_RECORDS, MAX_REPLIED_IDS, type InboundRecord } from "./state.js";

const log = silentLogger();

function registryWith(withLlm: boolean): { registry: ProviderRegistry; llm: () => ScriptedLlmProvider } {
    let llm: ScriptedLlmProvider | undefined;
    const registry = ProviderRegistry.fromConfig(
        withLlm ? [{ name: "echo" }, { name: "writer" }] : [{ name: "echo" }],
        {
            catalog: catalogOf({
                echo: (config, deps) => new EchoProvider("echo", config, deps),
                writer: (config, deps) => {
                    llm = new ScriptedLlmProvider("writer", config, deps);
                    return llm;
                },
            }),
            secrets: new MemorySecretStore(),
            log,
        },
    );
    return {
        registry,
        llm: () => {
            if (!llm) throw new Error("no LLM registered");
            return llm;
        },
    };
}

async function runResilienceTests(): Promise<void> {
    const behaviors = new BehaviorRegistry([
        behavior("explode", async () => {
            throw new Error("boom");
        }),
        behavior("ok", async () => true),
    ]);
    let draw = 0;
    const runs = new MemoryRunRecordStore(500);
    const controller = new AbortController();
    let statusAtLastSleep = "";
    const agent = new Agent(
        agentDefinition({
            loop_delay: 5,
            tasks: [{ name: "explode", weight: 1 }, { name: "ok", weight: 9 }],
        }),
        {
            registry: registryWith(false).registry,
            behaviors,
            log,
            runs,
            failureDelayMs: 1234,
            random: () => (draw++ % 100) / 100,
            sleep: recordingSleep((_ms, calls) => {
                if (calls === 100) {
                    statusAtLastSleep = agent.status;
                    controller.abort();
                }
            }).sleep,
        },
    );

    await agent.loop(controller.signal);

    assert.equal(statusAtLastSleep, "RUNNING");
    assert.equal(agent.status, "STOPPED");

    const history = await runs.list(undefined, 500);
    assert.equal(history.length, 100);
    const exploded = history.filter((r) => r.task === "explode");
    assert.equal(exploded.length, 10);
    assert.ok(exploded.every((r) => !r.success && r.error === "boom" && r.delayMs === 1234));
    assert.ok(history.filter((r) => r.task === "ok").every((r) => r.success && r.delayMs === 5000));
}

async function runSleepScheduleTests(): Promise<void> {
    const behaviors = new BehaviorRegistry([
        behavior("ok", async () => true),
        behavior("nope", async () => false),
    ]);
    const controller = new AbortController();
    const recorder = recordingSleep((_ms, calls) => {
        if (calls === 4) controller.abort();
    });
    let draw = 0;
    const agent = new Agent(
        agentDefinition({ loop_delay: 2, tasks: [{ name: "ok", weight: 1 }, { name: "nope", weight: 1 }] }),
        {
            registry: registryWith(false).registry,
            behaviors,
            log,
            failureDelayMs: 60_000,
            startupDelayMs: 10,
            random: () => [0.1, 0.9, 0.4][draw++ % 3] ?? 0,
            sleep: recorder.sleep,
        },
    );

    await agent.loop(controller.signal);
    // Startup pause, then success / failure / success back-offs
    assert.deepEqual(recorder.delays, [10, 2000, 60_000, 2000]);
    assert.deepEqual(agent.lastOutcome?.task, "ok");
}

async function runPromptTests(): Promise<void> {
    const { registry, llm } = registryWith(true);
    const agent = new Agent(
        agentDefinition({
            bio: ["I am Ada.", "I like compilers."],
            traits: ["Patient"],
            examples: ["Parse carefully."],
        }),
        { registry, behaviors: new BehaviorRegistry([behavior("ok", async () => true)]), log },
    );

    const system = agent.constructSystemPrompt();
    assert.equal(
        system,
        "I am Ada.\nI like compilers.\n\nYour key traits are:\n- Patient\n\n"
        + "Here are some examples of your style (Please avoid repeating any of these):\n- Parse carefully.",
    );

    llm().replies = ["  Hi there  ", "   "];
    assert.equal(await agent.promptLlm("Hello"), "Hi there");
    assert.equal(agent.modelProvider, "writer");
    assert.deepEqual(llm().prompts[0], { prompt: "Hello", system });

    assert.equal(await agent.promptLlm("Again", "Be brief."), null);
    assert.deepEqual(llm().prompts[1], { prompt: "Again", system: "Be brief." });
}

async function runStartupTests(): Promise<void> {
    const behaviors = new BehaviorRegistry([behavior("chat", async () => true, true)]);
    assert.throws(
        () => new Agent(agentDefinition({ tasks: [{ name: "ghost", weight: 1 }] }), {
            registry: registryWith(false).registry,
            behaviors,
            log,
        }),
        (err: unknown) => err instanceof ConfigurationError
            && err.message === "Tasks without a registered behavior: ghost",
    );

    const agent = new Agent(agentDefinition({ tasks: [{ name: "chat", weight: 1 }] }), {
        registry: registryWith(false).registry,
        behaviors,
        log,
    });
    await assert.rejects(
        agent.loop(new AbortController().signal),
        (err: unknown) => err instanceof ConfigurationError && err.message === "No configured LLM provider found",
    );
    assert.equal(agent.status, "STOPPED");
    assert.equal(await agent.promptLlm("anyone?"), null);
}

async function runIterationTests(): Promise<void> {
    let replenished = 0;
    const counter: InputSource = {
        name: "balance",
        isMissing: (state) => state.lastBalance === undefined,
        async replenish(ctx) {
            replenished++;
            ctx.state.lastBalance = "1.5";
        },
    };
    let inboxSeen = -1;
    const inspect = {
        ...behavior("inspect", async (ctx) => {
            inboxSeen = ctx.state.inboxSize;
            const said = await ctx.performAction("echo", "say", ["positional"]);
            const added = await ctx.performAction("echo", "add", { a: 2, b: "3" });
            return said.ok && said.value === "positional" && added.ok && added.value === 5;
        }),
        inputs: [counter],
        consumes: ["echochambers"],
    };
    const agent = new Agent(agentDefinition({ tasks: [{ name: "inspect", weight: 1 }], loop_delay: 1 }), {
        registry: registryWith(false).registry,
        behaviors: new BehaviorRegistry([inspect]),
        log,
    });

    agent.channel.push({ source: "echochambers", id: "m1", author: "bob", content: "hi", receivedAt: 0 });
    const first = await agent.runIteration();
    assert.equal(inboxSeen, 1);
    assert.equal(agent.channel.pending, 0);
    assert.deepEqual({ task: first.task, success: first.success, delayMs: first.delayMs }, {
        task: "inspect",
        success: true,
        delayMs: 1000,
    });

    await agent.runIteration();
    assert.equal(replenished, 1);
}

function record(source: string, n: number): InboundRecord {
    return { source, id: `${source}-${n}`, author: "bob", content: `message ${n}`, receivedAt: n };
}

async function runInboxBoundTests(): Promise<void> {
    // Nothing consumes the feed: drained records are dropped, not queued
    const poster = new Agent(agentDefinition({ tasks: [{ name: "post", weight: 1 }] }), {
        registry: registryWith(false).registry,
        behaviors: new BehaviorRegistry([behavior("post", async () => true)]),
        log,
    });
    for (let i = 0; i < 1_000; i++) {
        poster.channel.push(record("echochambers", i));
        await poster.runIteration();
    }
    assert.equal(poster.state.inboxSize, 0);
    assert.equal(poster.channel.pending, 0);

    // A consumer that never takes anything still sees a bounded inbox
    const hoarder = new Agent(agentDefinition({ tasks: [{ name: "hoard", weight: 1 }] }), {
        registry: registryWith(false).registry,
        behaviors: new BehaviorRegistry([{ ...behavior("hoard", async () => true), consumes: ["echochambers"] }]),
        log,
    });
    for (let i = 0; i < MAX_INBOX_RECORDS + 20; i++) {
        hoarder.channel.push(record("echochambers", i));
        hoarder.channel.push(record("twitter", i));
        await hoarder.runIteration();
    }
    assert.equal(hoarder.state.inboxSize, MAX_INBOX_RECORDS);
    assert.deepEqual(hoarder.state.takeInbox("twitter"), []);
    const kept = hoarder.state.takeInbox("echochambers");
    assert.equal(kept[0]?.id, "echochambers-20");
    assert.equal(kept[kept.length - 1]?.id, `echochambers-${MAX_INBOX_RECORDS + 19}`);

    for (let i = 0; i <= MAX_REPLIED_IDS; i++) hoarder.state.markReplied(`id-${i}`);
    assert.equal(hoarder.state.hasReplied("id-0"), false);
    assert.equal(hoarder.state.hasReplied("id-1"), true);
    assert.equal(hoarder.state.snapshot().replied, MAX_REPLIED_IDS);
}

async function runFeedPerAgentTests(): Promise<void> {
    const created: BackgroundFeed[] = [];
    const ran: BackgroundFeed[] = [];
    const factory: FeedFactory = {
        name: "counter-feed",
        create() {
            const feed: BackgroundFeed = {
                name: "counter-feed",
                async run() {
                    ran.push(feed);
                },
            };
            created.push(feed);
            return feed;
        },
    };
    // Two behaviors share the factory; each agent still builds exactly one feed
    const behaviors = new BehaviorRegistry([
        { ...behavior("a", async () => true), feeds: [factory] },
        { ...behavior("b", async () => true), feeds: [factory] },
    ]);
    const build = () => new Agent(agentDefinition({ tasks: [{ name: "a", weight: 1 }, { name: "b", weight: 1 }] }), {
        registry: registryWith(false).registry,
        behaviors,
        log,
        sleep: recordingSleep().sleep,
    });

    const first = build();
    const second = build();
    assert.equal(created.length, 2);
    assert.notEqual(created[0], created[1]);

    for (const agent of [first, second]) {
        const controller = new AbortController();
        const running = agent.loop(controller.signal);
        await assert.rejects(
            agent.loop(controller.signal),
            (err: unknown) => err instanceof ConfigurationError && err.message === "Agent 'Ada' is already running",
        );
        controller.abort();
        await running;
    }
    assert.equal(ran.length, 2);
    assert.equal(ran[0], created[0]);
    assert.equal(ran[1], created[1]);
}

async function runTimeBasedSelectionTests(): Promise<void> {
    const picked: string[] = [];
    const behaviors = new BehaviorRegistry([
        behavior("post-echochambers", async () => {
            picked.push("post");
            return true;
        }),
        behavior("reply-echochambers", async () => {
            picked.push("reply");
            return true;
        }),
    ]);
    const tasks = [{ name: "post-echochambers", weight: 10 }, { name: "reply-echochambers", weight: 10 }];
    const opts = {
        registry: registryWith(false).registry,
        behaviors,
        log,
        random: () => 0.35,
        clock: () => new Date(2026, 0, 15, 3, 0),
    };

    // Night rule: weights 4 / 10, 0.35 * 14 = 4.9 lands on the reply task
    await new Agent(agentDefinition({ tasks, use_time_based_weights: true }), opts).runIteration();
    // Base weights: 0.35 * 20 = 7 lands on the post task
    await new Agent(agentDefinition({ tasks }), opts).runIteration();
    assert.deepEqual(picked, ["reply", "post"]);
}

await runResilienceTests();
await runSleepScheduleTests();
await runPromptTests();
await runStartupTests();
await runIterationTests();
await runInboxBoundTests();
await runFeedPerAgentTests();
await runTimeBasedSelectionTests();
console.log("Agent runtime tests passed.");
