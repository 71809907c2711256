import assert from "node:assert/strict";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigurationError } from "../errors/RuntimeError.js";
import { DotenvSecretStore, formatDotenvValue } from "./secrets.js";

async function runSecretStoreTests(): Promise<void> {
    assert.equal(formatDotenvValue("abc123"), "abc123");
    assert.equal(formatDotenvValue("has space"), "'has space'");
    assert.equal(formatDotenvValue("it's here"), "\"it's here\"");
    assert.equal(formatDotenvValue("it's\nbroken"), "\"it's\\nbroken\"");
    assert.equal(formatDotenvValue("line one\r\nline two"), "\"line one\\r\\nline two\"");
    assert.throws(() => formatDotenvValue("it's \"quoted\""), ConfigurationError);
    assert.throws(() => formatDotenvValue("it's C:\\temp"), ConfigurationError);

    const dir = await mkdtemp(join(tmpdir(), "secrets-test-"));
    try {
        const path = join(dir, ".env");
        const env: NodeJS.ProcessEnv = { FROM_ENV: "env-value" };
        const store = new DotenvSecretStore(path, env);

        // Missing file reads as empty and falls back to the environment
        assert.equal(await store.get("OPENAI_API_KEY"), undefined);
        assert.equal(await store.get("FROM_ENV"), "env-value");
        assert.equal(await store.has("FROM_ENV"), true);

        await writeFile(path, "# credentials\nexport OPENAI_API_KEY=old\nOTHER=keep\n", "utf8");
        await store.set("OPENAI_API_KEY", "test-secret");
        await store.set("GROQ_API_KEY", "test secret two");

        assert.equal(
            await readFile(path, "utf8"),
            "# credentials\nOPENAI_API_KEY=test-secret\nOTHER=keep\nGROQ_API_KEY='test secret two'\n",
        );
        assert.equal(await store.get("OPENAI_API_KEY"), "test-secret");
        assert.equal(await store.get("GROQ_API_KEY"), "test secret two");
        assert.equal(env.OPENAI_API_KEY, "test-secret");

        await assert.rejects(store.set("BAD-KEY", "x"), ConfigurationError);

        // Double-quoted values round-trip through dotenv.parse
        await store.set("QUOTED", "it's fine");
        await store.set("MULTI", "it's one\nand two");
        const written = (await readFile(path, "utf8")).split("\n");
        assert.equal(written[4], "QUOTED=\"it's fine\"");
        assert.equal(written[5], "MULTI=\"it's one\\nand two\"");
        assert.equal(await store.get("QUOTED"), "it's fine");
        assert.equal(await store.get("MULTI"), "it's one\nand two");
    } finally {
        await rm(dir, { recursive: true, force: true });
    }
}

await runSecretStoreTests();
console.log("Secret store tests passed.");
