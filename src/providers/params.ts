/**
 * Parameter validation and coercion for provider operations.
 *
 * - Required parameters must be present (undefined counts as absent).
 * - Present values are converted to their declared kind (e.g. "42" → 42).
 * - Every problem is collected before failing, so one rejected call
 *   reports all of them at once.
 * - Coercion works on a copy: the caller's map is never modified, and the
 *   copy only reaches a handler when there were no errors.
 */

import { err, ok, type Result } from "../result.js";
import type { ParameterIssue } from "../errors/RuntimeError.js";
import { PARAMETER_KINDS, type OperationParams, type ParameterKind, type ParameterSpec } from "./interface.js";

type Coercion = { ok: true; value: unknown } | { ok: false };

const INVALID: Coercion = { ok: false };

function coerced(value: unknown): Coercion {
    return { ok: true, value };
}

// ═══════════════════════════════════════════════════════
//                  Per-kind coercers
// ═══════════════════════════════════════════════════════

function toStringValue(raw: unknown): Coercion {
    if (typeof raw === "string") return coerced(raw);
    if (typeof raw === "number" && Number.isFinite(raw)) return coerced(String(raw));
    if (typeof raw === "boolean" || typeof raw === "bigint") return coerced(String(raw));
    return INVALID;
}

function toFloat(raw: unknown): Coercion {
    if (typeof raw === "number") return Number.isFinite(raw) ? coerced(raw) : INVALID;
    if (typeof raw === "string" && raw.trim() !== "") {
        const value = Number(raw.trim());
        return Number.isFinite(value) ? coerced(value) : INVALID;
    }
    return INVALID;
}

function toInteger(raw: unknown): Coercion {
    if (typeof raw === "string" && !/^[+-]?\d+$/.test(raw.trim())) return INVALID;
    const asFloat = toFloat(raw);
    if (!asFloat.ok || typeof asFloat.value !== "number") return INVALID;
    return Number.isSafeInteger(asFloat.value) ? asFloat : INVALID;
}

function toBoolean(raw: unknown): Coercion {
    if (typeof raw === "boolean") return coerced(raw);
    if (raw === 1 || raw === 0) return coerced(raw === 1);
    if (typeof raw === "string") {
        const text = raw.trim().toLowerCase();
        if (text === "true" || text === "1" || text === "yes") return coerced(true);
        if (text === "false" || text === "0" || text === "no") return coerced(false);
    }
    return INVALID;
}

function toStringList(raw: unknown): Coercion {
    if (typeof raw === "string") {
        return coerced(raw.split(",").map((part) => part.trim()).filter(Boolean));
    }
    if (Array.isArray(raw)) {
        const items: string[] = [];
        for (const item of raw) {
            const text = toStringValue(item);
            if (!text.ok || typeof text.value !== "string") return INVALID;
            items.push(text.value);
        }
        return coerced(items);
    }
    return INVALID;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toMap(raw: unknown): Coercion {
    if (isPlainObject(raw)) return coerced({ ...raw });
    if (typeof raw === "string") {
        try {
            const parsed: unknown = JSON.parse(raw);
            return isPlainObject(parsed) ? coerced(parsed) : INVALID;
        } catch {
            return INVALID;
        }
    }
    return INVALID;
}

const COERCERS: Record<ParameterKind, (raw: unknown) => Coercion> = {
    string: toStringValue,
    integer: toInteger,
    float: toFloat,
    boolean: toBoolean,
    string_list: toStringList,
    map: toMap,
};

export function isParameterKind(kind: string): kind is ParameterKind {
    return PARAMETER_KINDS.some((known) => known === kind);
}

/** Convert one raw value to `kind` */
export function coerceParameter(kind: ParameterKind, raw: unknown): Coercion {
    return COERCERS[kind](raw);
}

// ═══════════════════════════════════════════════════════
//                  Validation
// ═══════════════════════════════════════════════════════

/**
 * Validate and coerce `params` against `specs`.
 * Keys that are not declared pass through untouched.
 */
export function validateParams(
    specs: readonly ParameterSpec[],
    params: OperationParams,
): Result<OperationParams, ParameterIssue[]> {
    const issues: ParameterIssue[] = [];
    const next: OperationParams = { ...params };

    for (const spec of specs) {
        const raw = params[spec.name];
        if (raw === undefined) {
            delete next[spec.name];
            if (spec.required) {
                issues.push({
                    parameter: spec.name,
                    reason: "missing",
                    message: `Missing required parameter: ${spec.name}`,
                });
            }
            continue;
        }

        const result = coerceParameter(spec.kind, raw);
        if (!result.ok) {
            issues.push({
                parameter: spec.name,
                reason: "invalid_type",
                message: `Invalid type for ${spec.name}. Expected ${spec.kind}`,
            });
            continue;
        }
        next[spec.name] = result.value;
    }

    return issues.length > 0 ? err(issues) : ok(next);
}

/**
 * Map positional values onto declared parameters in declaration order.
 * Values beyond the declared count are dropped; unfilled trailing
 * parameters are simply omitted.
 */
export function mapPositional(
    specs: readonly ParameterSpec[],
    values: readonly unknown[],
): OperationParams {
    const params: OperationParams = {};
    specs.forEach((spec, index) => {
        if (index < values.length) {
            params[spec.name] = values[index];
        }
    });
    return params;
}

/** Names of required parameters absent from `params` */
export function missingRequired(
    specs: readonly ParameterSpec[],
    params: OperationParams,
): string[] {
    return specs
        .filter((spec) => spec.required && params[spec.name] === undefined)
        .map((spec) => spec.name);
}

// ═══════════════════════════════════════════════════════
//                  Handler accessors
// ═══════════════════════════════════════════════════════
// Handlers only receive validated params, so these read values that are
// already of the declared kind.

export function stringParam(params: OperationParams, name: string): string {
    const value = params[name];
    if (typeof value !== "string") throw new TypeError(`Parameter '${name}' is not a string`);
    return value;
}

export function optionalStringParam(params: OperationParams, name: string): string | undefined {
    const value = params[name];
    if (value === undefined) return undefined;
    if (typeof value !== "string") throw new TypeError(`Parameter '${name}' is not a string`);
    return value || undefined;
}

export function numberParam(params: OperationParams, name: string): number {
    const value = params[name];
    if (typeof value !== "number") throw new TypeError(`Parameter '${name}' is not a number`);
    return value;
}
