/**
 * EVM wallet providers: balance reads and plain transfers on one chain.
 *
 * Presets pin a chain and the secret holding the wallet key
 * (`<PREFIX>_PRIVATE_KEY`). The generic `evm` preset takes `rpc` and
 * `chain_id` from its configuration block.
 */

import {
    createPublicClient,
    createWalletClient,
    defineChain,
    erc20Abi,
    formatEther,
    formatUnits,
    http,
    isAddress,
    parseEther,
    parseUnits,
    type Address,
    type Chain,
    type Hex,
} from "viem";
import { privateKeyToAccount, type PrivateKeyAccount } from "viem/accounts";
import { mainnet } from "viem/chains";
import { z } from "zod";
import { ConfigurationError } from "../errors/RuntimeError.js";
import { BaseProvider } from "./base.js";
import type { ConfigureContext, OperationParams, ProviderConfig, ProviderFactory } from "./interface.js";
import { numberParam, optionalStringParam, stringParam } from "./params.js";

// ═══════════════════════════════════════════════════════
//                  Chains
// ═══════════════════════════════════════════════════════

export const sonic = defineChain({
    id: 146,
    name: "Sonic",
    nativeCurrency: { name: "Sonic", symbol: "S", decimals: 18 },
    rpcUrls: { default: { http: ["https://rpc.soniclabs.com"] } },
    blockExplorers: { default: { name: "SonicScan", url: "https://sonicscan.org" } },
});

export const monadTestnet = defineChain({
    id: 10143,
    name: "Monad Testnet",
    nativeCurrency: { name: "Monad", symbol: "MON", decimals: 18 },
    rpcUrls: { default: { http: ["https://testnet-rpc.monad.xyz"] } },
    blockExplorers: { default: { name: "Monad Explorer", url: "https://testnet.monadexplorer.com" } },
    testnet: true,
});

export interface EvmPreset {
    /** Fixed chain; absent for the generic preset */
    chain?: Chain;
    keyEnv: string;
    label: string;
}

export const EVM_PRESETS = {
    ethereum: { chain: mainnet, keyEnv: "ETH_PRIVATE_KEY", label: "Ethereum" },
    sonic: { chain: sonic, keyEnv: "SONIC_PRIVATE_KEY", label: "Sonic" },
    monad: { chain: monadTestnet, keyEnv: "MONAD_PRIVATE_KEY", label: "Monad" },
    evm: { keyEnv: "EVM_PRIVATE_KEY", label: "EVM" },
} satisfies Record<string, EvmPreset>;

export type EvmPresetName = keyof typeof EVM_PRESETS;

function isPresetName(name: string): name is EvmPresetName {
    return Object.prototype.hasOwnProperty.call(EVM_PRESETS, name);
}

function presetFor(name: string): EvmPreset {
    if (!isPresetName(name)) throw new ConfigurationError(`Unknown EVM preset '${name}'`);
    return EVM_PRESETS[name];
}

const PRIVATE_KEY_PATTERN = /^0x[0-9a-fA-F]{64}$/;

/** Accepts keys with or without the 0x prefix */
export function normalizePrivateKey(raw: string): Hex {
    const key = raw.trim().startsWith("0x") ? raw.trim() : `0x${raw.trim()}`;
    if (!isHexKey(key)) throw new ConfigurationError("Invalid private key format");
    return key;
}

function isHexKey(value: string): value is Hex {
    return PRIVATE_KEY_PATTERN.test(value);
}

/** Plain decimal text for parseUnits (no exponent notation) */
function decimalString(amount: number): string {
    const text = String(amount);
    return /e/i.test(text) ? amount.toFixed(20).replace(/\.?0+$/, "") : text;
}

// ═══════════════════════════════════════════════════════
//                  Config
// ═══════════════════════════════════════════════════════

const evmConfigSchema = z.object({
    name: z.string().optional(),
    rpc: z.string().url().optional(),
    chain_id: z.number().int().positive().optional(),
    tx_timeout_ms: z.number().int().positive().default(120_000),
});

export type EvmConfig = z.infer<typeof evmConfigSchema>;

export interface BalanceResult {
    address: Address;
    token: Address | "native";
    symbol: string;
    balance: string;
}

export interface TransferResult {
    hash: Hex;
    status: "success" | "reverted";
    explorerUrl?: string;
}

// ═══════════════════════════════════════════════════════
//                  Provider
// ═══════════════════════════════════════════════════════

export class EvmProvider extends BaseProvider<EvmConfig> {
    readonly isLlmProvider = false;

    protected validateConfig(raw: ProviderConfig): EvmConfig {
        const preset = presetFor(this.name);
        const parsed = evmConfigSchema.safeParse(raw);
        if (!parsed.success) {
            const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "config"}: ${i.message}`).join("; ");
            throw new ConfigurationError(`Invalid ${this.name} config: ${detail}`);
        }
        if (!preset.chain && (!parsed.data.rpc || parsed.data.chain_id === undefined)) {
            throw new ConfigurationError(`${this.name} config must contain 'rpc' and 'chain_id'`);
        }
        return parsed.data;
    }

    protected registerActions(): void {
        this.defineOperation(
            "get-address",
            "Get the wallet address",
            [],
            async () => (await this.account()).address,
        );
        this.defineOperation(
            "get-balance",
            "Get the native or ERC-20 balance of an address",
            [
                { name: "address", required: false, kind: "string", description: "Address to check (defaults to the wallet)" },
                { name: "token_address", required: false, kind: "string", description: "ERC-20 token (native when omitted)" },
            ],
            (params) => this.getBalance(params),
        );
        this.defineOperation(
            "transfer",
            "Transfer native currency or an ERC-20 token",
            [
                { name: "to_address", required: true, kind: "string", description: "Recipient address" },
                { name: "amount", required: true, kind: "float", description: "Amount in whole units" },
                { name: "token_address", required: false, kind: "string", description: "ERC-20 token (native when omitted)" },
            ],
            (params) => this.transfer(params),
        );
    }

    get chain(): Chain {
        const preset = presetFor(this.name);
        if (preset.chain) return preset.chain;
        const rpc = this.config.rpc ?? "";
        return defineChain({
            id: this.config.chain_id ?? 0,
            name: "EVM",
            nativeCurrency: { name: "Ether", symbol: "ETH", decimals: 18 },
            rpcUrls: { default: { http: [rpc] } },
        });
    }

    get rpcUrl(): string {
        return this.config.rpc ?? this.chain.rpcUrls.default.http[0] ?? "";
    }

    protected async checkConfigured(): Promise<void> {
        const account = await this.account();
        const chainId = await this.publicClient().getChainId();
        if (chainId !== this.chain.id) {
            throw new Error(`Connected to wrong chain. Expected ${this.chain.id}, got ${chainId}`);
        }
        this.log.debug(`Wallet ${account.address} on chain ${chainId}`);
    }

    protected override async acquireCredentials(ctx: ConfigureContext): Promise<void> {
        const { keyEnv, label } = presetFor(this.name);
        const raw = await this.obtain(ctx, keyEnv, `Enter your ${label} wallet private key:`);
        const key = normalizePrivateKey(raw);
        const account = privateKeyToAccount(key);
        this.log.info(`Derived address: ${account.address}`);
        await this.secrets.set(keyEnv, key);
    }

    // ═══════════════════════════════════════════════════════
    //                  Operations
    // ═══════════════════════════════════════════════════════

    private async getBalance(params: OperationParams): Promise<BalanceResult> {
        const address = this.parseAddress(optionalStringParam(params, "address") ?? (await this.account()).address, "address");
        const tokenRaw = optionalStringParam(params, "token_address");
        const client = this.publicClient();

        if (!tokenRaw) {
            const wei = await client.getBalance({ address });
            return {
                address,
                token: "native",
                symbol: this.chain.nativeCurrency.symbol,
                balance: formatEther(wei),
            };
        }

        const token = this.parseAddress(tokenRaw, "token_address");
        const [raw, decimals, symbol] = await Promise.all([
            client.readContract({ address: token, abi: erc20Abi, functionName: "balanceOf", args: [address] }),
            client.readContract({ address: token, abi: erc20Abi, functionName: "decimals" }),
            client.readContract({ address: token, abi: erc20Abi, functionName: "symbol" }),
        ]);
        return { address, token, symbol, balance: formatUnits(raw, decimals) };
    }

    private async transfer(params: OperationParams): Promise<TransferResult> {
        const to = this.parseAddress(stringParam(params, "to_address"), "to_address");
        const amount = numberParam(params, "amount");
        if (!(amount > 0)) throw new Error("amount must be greater than 0");

        const account = await this.account();
        const client = this.publicClient();
        const wallet = createWalletClient({ account, chain: this.chain, transport: http(this.rpcUrl) });
        const tokenRaw = optionalStringParam(params, "token_address");

        let hash: Hex;
        if (!tokenRaw) {
            hash = await wallet.sendTransaction({ to, value: parseEther(decimalString(amount)) });
        } else {
            const token = this.parseAddress(tokenRaw, "token_address");
            const decimals = await client.readContract({ address: token, abi: erc20Abi, functionName: "decimals" });
            hash = await wallet.writeContract({
                address: token,
                abi: erc20Abi,
                functionName: "transfer",
                args: [to, parseUnits(decimalString(amount), decimals)],
            });
        }

        this.log.info(`Transfer submitted: ${hash}`);
        const receipt = await client.waitForTransactionReceipt({ hash, timeout: this.config.tx_timeout_ms });
        const explorer = this.chain.blockExplorers?.default.url;
        return {
            hash,
            status: receipt.status,
            explorerUrl: explorer ? `${explorer}/tx/${hash}` : undefined,
        };
    }

    // ═══════════════════════════════════════════════════════
    //                  Helpers
    // ═══════════════════════════════════════════════════════

    private publicClient() {
        return createPublicClient({ chain: this.chain, transport: http(this.rpcUrl) });
    }

    private async account(): Promise<PrivateKeyAccount> {
        const raw = await this.requireSecret(presetFor(this.name).keyEnv);
        return privateKeyToAccount(normalizePrivateKey(raw));
    }

    private parseAddress(value: string, field: string): Address {
        if (!isAddress(value)) throw new Error(`Invalid ${field}: ${value}`);
        return value;
    }
}

export function evmFactory(preset: EvmPresetName): ProviderFactory {
    return (config, deps) => new EvmProvider(preset, config, deps);
}
