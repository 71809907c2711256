import assert from "node:assert/strict";
import { err, ok, type Result } from "./result.js";

function describe(result: Result<number, string>): string {
    return result.ok ? `value ${result.value}` : `error ${result.error}`;
}

function runResultTests(): void {
    assert.deepEqual(ok(2), { ok: true, value: 2 });
    assert.deepEqual(err("boom"), { ok: false, error: "boom" });
    assert.equal(describe(ok(2)), "value 2");
    assert.equal(describe(err("boom")), "error boom");
}

runResultTests();
console.log("Result tests passed.");
