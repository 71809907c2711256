/**
 * BaseProvider: shared plumbing for concrete capability providers.
 *
 * Subclasses supply three things:
 *   - validateConfig(raw)       pure check of their configuration block
 *   - registerActions()         defineOperation(...) once per operation
 *   - checkConfigured()         throw with a reason when not usable
 * and may override acquireCredentials() to persist keys on configure().
 *
 * validateConfig() and registerActions() run inside the base constructor,
 * before subclass field initializers, so they must not read or assign
 * subclass fields. Resolve per-provider data from `this.name` instead.
 */

import {
    AgentRuntimeError,
    ConfigurationError,
    InvalidParametersError,
    UnknownOperationError,
} from "../errors/RuntimeError.js";
import { extractErrorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import { isParameterKind, validateParams } from "./params.js";
import type {
    ConfigureContext,
    FetchLike,
    ICapabilityProvider,
    Operation,
    OperationHandler,
    OperationParams,
    ParameterSpec,
    ProviderConfig,
    ProviderDeps,
} from "./interface.js";
import type { SecretStore } from "./secrets.js";

export abstract class BaseProvider<TConfig extends ProviderConfig = ProviderConfig>
    implements ICapabilityProvider {
    abstract readonly isLlmProvider: boolean;

    readonly config: Readonly<TConfig>;
    protected readonly log: Logger;
    protected readonly secrets: SecretStore;
    protected readonly fetchFn: FetchLike;

    private readonly operationTable = new Map<string, Operation>();
    private readonly statusCacheMs: number;
    private configuredUntil = 0;

    constructor(readonly name: string, rawConfig: ProviderConfig, deps: ProviderDeps) {
        this.log = deps.log.child(`provider:${name}`);
        this.secrets = deps.secrets;
        this.fetchFn = deps.fetch ?? ((input, init) => fetch(input, init));
        this.statusCacheMs = deps.statusCacheMs ?? 0;
        this.config = this.validateConfig(rawConfig);
        this.registerActions();
    }

    get operations(): ReadonlyMap<string, Operation> {
        return this.operationTable;
    }

    // ═══════════════════════════════════════════════════════
    //                  Subclass hooks
    // ═══════════════════════════════════════════════════════

    /** @throws ConfigurationError when the block is unusable */
    protected abstract validateConfig(raw: ProviderConfig): TConfig;

    protected abstract registerActions(): void;

    /** Resolve when usable; throw an Error describing why not */
    protected abstract checkConfigured(): Promise<void>;

    /** Acquire and persist credentials. Default: nothing to acquire. */
    protected async acquireCredentials(_ctx: ConfigureContext): Promise<void> {
        return;
    }

    protected defineOperation(
        name: string,
        description: string,
        parameters: ParameterSpec[],
        handler: OperationHandler,
    ): void {
        if (this.operationTable.has(name)) {
            throw new ConfigurationError(`Duplicate operation '${name}' on provider '${this.name}'`);
        }
        for (const spec of parameters) {
            if (!isParameterKind(spec.kind)) {
                throw new ConfigurationError(
                    `Unsupported parameter kind '${spec.kind}' for ${this.name}.${name}.${spec.name}`,
                );
            }
        }
        this.operationTable.set(name, { name, description, parameters, handler });
    }

    // ═══════════════════════════════════════════════════════
    //                  Contract
    // ═══════════════════════════════════════════════════════

    async isConfigured(verbose = false): Promise<boolean> {
        if (Date.now() < this.configuredUntil) return true;
        try {
            await this.checkConfigured();
            this.configuredUntil = Date.now() + this.statusCacheMs;
            return true;
        } catch (err) {
            const reason = extractErrorMessage(err);
            if (verbose) {
                this.log.error(`Not configured: ${reason}`);
            } else {
                this.log.debug(`Not configured: ${reason}`);
            }
            return false;
        }
    }

    async configure(ctx: ConfigureContext): Promise<boolean> {
        if (await this.isConfigured()) {
            const reconfigure = ctx.prompt
                ? await ctx.prompt.confirm(`${this.name} is already configured. Reconfigure?`)
                : false;
            if (!reconfigure) {
                this.log.info("Already configured, keeping existing credentials");
                return true;
            }
        }

        try {
            await this.acquireCredentials(ctx);
        } catch (err) {
            this.log.error(`Configuration failed: ${extractErrorMessage(err)}`);
            return false;
        } finally {
            this.configuredUntil = 0;
        }
        return this.isConfigured(true);
    }

    async performAction(name: string, params: OperationParams): Promise<unknown> {
        const operation = this.operationTable.get(name);
        if (!operation) {
            throw new UnknownOperationError(this.name, name);
        }

        const validated = validateParams(operation.parameters, params);
        if (!validated.ok) {
            throw new InvalidParametersError(this.name, name, validated.error);
        }

        try {
            return await operation.handler(validated.value);
        } catch (err) {
            throw AgentRuntimeError.from(err, { provider: this.name, operation: name });
        }
    }

    // ═══════════════════════════════════════════════════════
    //                  Helpers
    // ═══════════════════════════════════════════════════════

    /**
     * Read a credential: from the operator when prompting, otherwise from
     * the secret store (which falls back to the environment).
     */
    protected async obtain(ctx: ConfigureContext, key: string, question: string): Promise<string> {
        if (ctx.prompt) {
            const answer = await ctx.prompt.ask(question);
            if (!answer) throw new ConfigurationError(`No value entered for ${key}`);
            return answer;
        }
        const stored = await this.secrets.get(key);
        if (!stored) throw new ConfigurationError(`${key} is not set`);
        return stored;
    }

    /** Secret value or a ConfigurationError naming the missing key */
    protected async requireSecret(key: string): Promise<string> {
        const value = await this.secrets.get(key);
        if (!value) throw new ConfigurationError(`${key} is not set`);
        return value;
    }
}
