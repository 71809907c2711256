/**
 * ICapabilityProvider: uniform contract for every external capability.
 *
 * A provider adapts one external system (an LLM API, an EVM wallet, a chat
 * room) and exposes it as a fixed table of named operations with declared
 * parameters. The registry only ever talks to providers through this
 * interface; operation names are data, so tasks and API calls can bind to
 * them by configuration.
 */

import type { Logger } from "../logger.js";
import type { SecretStore } from "./secrets.js";
import type { CredentialPrompt } from "./prompt.js";

// ═══════════════════════════════════════════════════════
//                   Parameters
// ═══════════════════════════════════════════════════════

/** Supported parameter kinds; anything else is rejected when an operation is defined */
export const PARAMETER_KINDS = [
    "string",
    "integer",
    "float",
    "boolean",
    "string_list",
    "map",
] as const;

export type ParameterKind = (typeof PARAMETER_KINDS)[number];

export interface ParameterSpec {
    name: string;
    required: boolean;
    kind: ParameterKind;
    description: string;
}

/** Named parameter map; values are coerced to their declared kind before a handler sees them */
export type OperationParams = Record<string, unknown>;

export type OperationHandler = (params: OperationParams) => Promise<unknown>;

// ═══════════════════════════════════════════════════════
//                   Operations
// ═══════════════════════════════════════════════════════

export interface Operation {
    /** Unique within its provider, e.g. "generate-text" */
    readonly name: string;
    readonly description: string;
    /** Declaration order is the order positional arguments are mapped in */
    readonly parameters: readonly ParameterSpec[];
    readonly handler: OperationHandler;
}

/** Serializable view of an operation (no handler) */
export interface OperationDescriptor {
    name: string;
    description: string;
    parameters: ParameterSpec[];
}

// ═══════════════════════════════════════════════════════
//                   Provider
// ═══════════════════════════════════════════════════════

/** One named configuration block from an agent definition */
export type ProviderConfig = Record<string, unknown>;

export interface ConfigureContext {
    /** Interactive prompt; absent in env-driven (non-interactive) mode */
    prompt?: CredentialPrompt;
}

export interface ICapabilityProvider {
    readonly name: string;
    /** Static capability tag used to pick a text-generation backend */
    readonly isLlmProvider: boolean;
    readonly config: Readonly<ProviderConfig>;
    readonly operations: ReadonlyMap<string, Operation>;

    /**
     * Acquire and persist credentials. Idempotent: when already configured
     * and reconfiguration is declined, nothing is written and `true` is returned.
     */
    configure(ctx: ConfigureContext): Promise<boolean>;

    /** Liveness and validity check; never throws */
    isConfigured(verbose?: boolean): Promise<boolean>;

    /**
     * Execute one operation with named parameters.
     * @throws UnknownOperationError | InvalidParametersError | ProviderError
     */
    performAction(name: string, params: OperationParams): Promise<unknown>;
}

// ═══════════════════════════════════════════════════════
//                   Construction
// ═══════════════════════════════════════════════════════

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface ProviderDeps {
    secrets: SecretStore;
    log: Logger;
    /** HTTP transport; defaults to global fetch */
    fetch?: FetchLike;
    /** How long a positive isConfigured() result is reused. Default: 0 (always re-checked) */
    statusCacheMs?: number;
}

export type ProviderFactory = (config: ProviderConfig, deps: ProviderDeps) => ICapabilityProvider;

/** Provider identity → factory. Built once and handed to the registry. */
export type ProviderCatalog = ReadonlyMap<string, ProviderFactory>;
