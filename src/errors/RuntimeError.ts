/**
 * AgentRuntimeError: typed failures of the provider registry and dispatcher.
 *
 * Every error that leaves `ProviderRegistry.dispatch` is one of these kinds:
 *   - configuration       missing or invalid credentials / settings
 *   - not_found           no provider registered under the requested name
 *   - not_configured      provider known but not usable right now
 *   - unknown_operation   provider has no operation with that name
 *   - invalid_parameters  every parameter violation of one call
 *   - provider            downstream / third-party failure
 */

import { extractErrorMessage, isTransientError, sanitizeForUser } from "../errors.js";

export type RuntimeErrorKind =
    | "configuration"
    | "not_found"
    | "not_configured"
    | "unknown_operation"
    | "invalid_parameters"
    | "provider";

export abstract class AgentRuntimeError extends Error {
    abstract readonly kind: RuntimeErrorKind;
    constructor(message: string, opts?: { cause?: unknown }) {
        super(message, { cause: opts?.cause });
    }

    /** Text safe to return over the control API */
    get userMessage(): string {
        return this.message;
    }

    /** Wrap any unknown caught value; typed runtime errors pass through. */
    static from(
        err: unknown,
        context: { provider: string; operation: string },
    ): AgentRuntimeError {
        if (err instanceof AgentRuntimeError) return err;
        return new ProviderError(
            context.provider,
            context.operation,
            extractErrorMessage(err),
            { cause: err },
        );
    }

    toJSON(): Record<string, unknown> {
        return { kind: this.kind, message: this.message };
    }
}

export class ConfigurationError extends AgentRuntimeError {
    readonly kind = "configuration";

    constructor(message: string, opts?: { cause?: unknown }) {
        super(message, opts);
        this.name = "ConfigurationError";
    }
}

export class NotFoundError extends AgentRuntimeError {
    readonly kind = "not_found";

    constructor(readonly provider: string) {
        super(`Unknown connection '${provider}'`);
        this.name = "NotFoundError";
    }
}

export class NotConfiguredError extends AgentRuntimeError {
    readonly kind = "not_configured";

    constructor(readonly provider: string) {
        super(`Connection '${provider}' is not configured`);
        this.name = "NotConfiguredError";
    }
}

export class UnknownOperationError extends AgentRuntimeError {
    readonly kind = "unknown_operation";

    constructor(readonly provider: string, readonly operation: string) {
        super(`Unknown action '${operation}' for connection '${provider}'`);
        this.name = "UnknownOperationError";
    }
}

export interface ParameterIssue {
    parameter: string;
    reason: "missing" | "invalid_type";
    message: string;
}

export class InvalidParametersError extends AgentRuntimeError {
    readonly kind = "invalid_parameters";

    constructor(
        readonly provider: string,
        readonly operation: string,
        readonly issues: readonly ParameterIssue[],
    ) {
        super(`Invalid parameters for ${provider}.${operation}: ${issues.map((i) => i.message).join(", ")}`);
        this.name = "InvalidParametersError";
    }

    /** Every violation message, in parameter declaration order */
    get violations(): string[] {
        return this.issues.map((i) => i.message);
    }

    /** Names of the offending parameters */
    get parameters(): string[] {
        return this.issues.map((i) => i.parameter);
    }

    override toJSON(): Record<string, unknown> {
        return { ...super.toJSON(), violations: this.violations };
    }
}

export class ProviderError extends AgentRuntimeError {
    readonly kind = "provider";

    constructor(
        readonly provider: string,
        readonly operation: string,
        detail: string,
        opts?: { cause?: unknown },
    ) {
        super(`${provider}.${operation} failed: ${detail}`, opts);
        this.name = "ProviderError";
    }

    /** Downstream detail stays in the logs */
    override get userMessage(): string {
        return sanitizeForUser(this.message);
    }
}

// ═══════════════════════════════════════════════════════
//                  Retry Utility
// ═══════════════════════════════════════════════════════

export interface RetryOptions {
    /** Maximum number of attempts (including the first one). Default: 3 */
    maxAttempts?: number;
    /** Base delay in ms between retries. Default: 1000 */
    baseDelayMs?: number;
    /** Whether to use exponential backoff. Default: true */
    exponential?: boolean;
    /** Decides whether a failure is worth another attempt. Default: transient network errors */
    isRetryable?: (err: unknown) => boolean;
    /** Called before each retry, e.g. for logging */
    onRetry?: (attempt: number, delayMs: number, err: unknown) => void;
}

/**
 * Retry wrapper for transient failures (rate limits, timeouts, network).
 * Providers own their use of it; the core never retries on their behalf.
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    opts?: RetryOptions,
): Promise<T> {
    const maxAttempts = opts?.maxAttempts ?? 3;
    const baseDelayMs = opts?.baseDelayMs ?? 1000;
    const exponential = opts?.exponential ?? true;
    const isRetryable = opts?.isRetryable
        ?? ((err: unknown) => isTransientError(extractErrorMessage(err)));

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn();
        } catch (err) {
            if (attempt >= maxAttempts || !isRetryable(err)) {
                throw err;
            }
            const delay = exponential
                ? baseDelayMs * Math.pow(2, attempt - 1)
                : baseDelayMs;
            opts?.onRetry?.(attempt, delay, err);
            await new Promise((resolve) => setTimeout(resolve, delay));
        }
    }
}
