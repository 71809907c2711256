/**
 * ProviderRegistry: owns every capability provider of one agent and routes
 * operation invocations to them.
 *
 * Built once from the agent's configuration blocks and handed by reference
 * to the loop, behaviors and control API. Lookup and dispatch failures come
 * back as `Result` errors and are logged here; nothing untyped escapes.
 */

import {
    AgentRuntimeError,
    ConfigurationError,
    InvalidParametersError,
    NotConfiguredError,
    NotFoundError,
    UnknownOperationError,
} from "../errors/RuntimeError.js";
import { extractErrorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import {
    metrics,
    METRIC_DISPATCH_FAILURES,
    METRIC_DISPATCH_SUCCESS,
    METRIC_REGISTERED_PROVIDERS,
} from "../metrics.js";
import { err, ok, type Result } from "../result.js";
import type {
    ConfigureContext,
    FetchLike,
    ICapabilityProvider,
    OperationDescriptor,
    OperationParams,
    ParameterSpec,
    ProviderCatalog,
    ProviderConfig,
} from "./interface.js";
import { mapPositional, missingRequired } from "./params.js";
import type { SecretStore } from "./secrets.js";

export interface ProviderRegistryOptions {
    catalog: ProviderCatalog;
    secrets: SecretStore;
    log: Logger;
    fetch?: FetchLike;
    statusCacheMs?: number;
}

export interface ProviderStatus {
    name: string;
    configured: boolean;
    isLlmProvider: boolean;
}

export type DispatchResult = Result<unknown, AgentRuntimeError>;

export class ProviderRegistry {
    private readonly providers = new Map<string, ICapabilityProvider>();
    private readonly log: Logger;

    constructor(private readonly opts: ProviderRegistryOptions) {
        this.log = opts.log.child("registry");
    }

    /** Registry holding one provider per named configuration block */
    static fromConfig(blocks: readonly ProviderConfig[], opts: ProviderRegistryOptions): ProviderRegistry {
        const registry = new ProviderRegistry(opts);
        for (const block of blocks) {
            const name = block.name;
            if (typeof name !== "string" || !name) {
                registry.log.error("Skipping configuration block without a name");
                continue;
            }
            registry.register(name, block);
        }
        return registry;
    }

    /**
     * Construct the provider bound to `name` in the catalog.
     * Failures are logged and leave the provider absent.
     */
    register(name: string, config: ProviderConfig): boolean {
        const factory = this.opts.catalog.get(name);
        if (!factory) {
            this.log.error(`No provider implementation for '${name}'`);
            return false;
        }
        try {
            const provider = factory(config, {
                secrets: this.opts.secrets,
                log: this.opts.log,
                fetch: this.opts.fetch,
                statusCacheMs: this.opts.statusCacheMs,
            });
            this.providers.set(name, provider);
            metrics.set(METRIC_REGISTERED_PROVIDERS, this.providers.size);
            this.log.debug(`Registered provider '${name}'`);
            return true;
        } catch (e) {
            const reason = e instanceof ConfigurationError ? e.message : extractErrorMessage(e);
            this.log.error(`Failed to initialize provider '${name}': ${reason}`);
            return false;
        }
    }

    get(name: string): Result<ICapabilityProvider, NotFoundError> {
        const provider = this.providers.get(name);
        return provider ? ok(provider) : err(new NotFoundError(name));
    }

    has(name: string): boolean {
        return this.providers.has(name);
    }

    /** Registered names, in registration order */
    get names(): string[] {
        return [...this.providers.keys()];
    }

    /** Configured LLM providers, in registration order */
    async listLlmProviders(): Promise<string[]> {
        const names: string[] = [];
        for (const [name, provider] of this.providers) {
            if (provider.isLlmProvider && await provider.isConfigured()) {
                names.push(name);
            }
        }
        return names;
    }

    async listProviders(): Promise<ProviderStatus[]> {
        const statuses: ProviderStatus[] = [];
        for (const [name, provider] of this.providers) {
            statuses.push({
                name,
                configured: await provider.isConfigured(),
                isLlmProvider: provider.isLlmProvider,
            });
        }
        return statuses;
    }

    describe(name: string): Result<OperationDescriptor[], NotFoundError> {
        const found = this.get(name);
        if (!found.ok) return found;
        return ok([...found.value.operations.values()].map((op) => ({
            name: op.name,
            description: op.description,
            parameters: op.parameters.map((p) => ({ ...p })),
        })));
    }

    async configure(name: string, ctx: ConfigureContext): Promise<Result<boolean, NotFoundError>> {
        const found = this.get(name);
        if (!found.ok) {
            this.log.error(found.error.message);
            return found;
        }
        const configured = await found.value.configure(ctx);
        if (!configured) this.log.error(`Failed to configure '${name}'`);
        return ok(configured);
    }

    // ═══════════════════════════════════════════════════════
    //                  Dispatch
    // ═══════════════════════════════════════════════════════

    /** Invoke with positional values, mapped onto parameters in declaration order */
    dispatch(provider: string, operation: string, values: readonly unknown[]): Promise<DispatchResult> {
        return this.run(provider, operation, (specs) => mapPositional(specs, values));
    }

    /** Invoke with a named parameter map */
    dispatchNamed(provider: string, operation: string, params: OperationParams): Promise<DispatchResult> {
        return this.run(provider, operation, () => ({ ...params }));
    }

    private async run(
        providerName: string,
        operationName: string,
        bind: (specs: readonly ParameterSpec[]) => OperationParams,
    ): Promise<DispatchResult> {
        const found = this.get(providerName);
        if (!found.ok) return this.fail(found.error);
        const provider = found.value;

        if (!await provider.isConfigured()) {
            return this.fail(new NotConfiguredError(providerName));
        }

        const operation = provider.operations.get(operationName);
        if (!operation) {
            return this.fail(new UnknownOperationError(providerName, operationName));
        }

        const params = bind(operation.parameters);
        const missing = missingRequired(operation.parameters, params);
        if (missing.length > 0) {
            return this.fail(new InvalidParametersError(
                providerName,
                operationName,
                missing.map((parameter) => ({
                    parameter,
                    reason: "missing",
                    message: `Missing required parameter: ${parameter}`,
                })),
            ));
        }

        try {
            const value = await provider.performAction(operationName, params);
            metrics.inc(METRIC_DISPATCH_SUCCESS);
            return ok(value);
        } catch (e) {
            return this.fail(AgentRuntimeError.from(e, { provider: providerName, operation: operationName }));
        }
    }

    private fail(error: AgentRuntimeError): DispatchResult {
        metrics.inc(METRIC_DISPATCH_FAILURES);
        this.log.error(error.message);
        return err(error);
    }
}
