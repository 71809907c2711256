import assert from "node:assert/strict";
import {
    AgentRuntimeError,
    ConfigurationError,
    InvalidParametersError,
    NotFoundError,
    ProviderError,
    withRetry,
} from "./RuntimeError.js";

async function runRuntimeErrorTests(): Promise<void> {
    const wrapped = AgentRuntimeError.from(new Error("socket hang up"), { provider: "openai", operation: "generate-text" });
    assert.ok(wrapped instanceof ProviderError);
    assert.equal(wrapped.kind, "provider");
    assert.equal(wrapped.message, "openai.generate-text failed: socket hang up");
    assert.equal(wrapped.userMessage, "The operation failed. See runner logs for details.");

    const typed = new NotFoundError("ghost");
    assert.equal(AgentRuntimeError.from(typed, { provider: "x", operation: "y" }), typed);
    assert.equal(typed.userMessage, "Unknown connection 'ghost'");


    const invalid = new InvalidParametersError("echo", "add", [
        { parameter: "a", reason: "missing", message: "Missing required parameter: a" },
        { parameter: "b", reason: "invalid_type", message: "Invalid type for b. Expected integer" },
    ]);
    assert.deepEqual(invalid.parameters, ["a", "b"]);
    assert.deepEqual(invalid.toJSON(), {
        kind: "invalid_parameters",
        message: "Invalid parameters for echo.add: Missing required parameter: a, Invalid type for b. Expected integer",
        violations: ["Missing required parameter: a", "Invalid type for b. Expected integer"],
    });

    // Transient failures are retried, then the value comes through
    let attempts = 0;
    const retried: number[] = [];
    const value = await withRetry(async () => {
        attempts++;
        if (attempts < 3) throw new Error("fetch failed");
        return "done";
    }, { baseDelayMs: 1, onRetry: (attempt) => retried.push(attempt) });
    assert.equal(value, "done");
    assert.deepEqual(retried, [1, 2]);

    // Non-transient failures surface immediately
    attempts = 0;
    await assert.rejects(
        withRetry(async () => {
            attempts++;
            throw new ConfigurationError("bad key format");
        }, { baseDelayMs: 1 }),
        ConfigurationError,
    );
    assert.equal(attempts, 1);
}

await runRuntimeErrorTests();
console.log("Runtime error tests passed.");
