import type { AgentBehavior, AgentContext } from "./interface.js";

/** First registered, configured provider that can report a balance */
async function findWallet(ctx: AgentContext): Promise<string | undefined> {
    for (const name of ctx.registry.names) {
        const provider = ctx.registry.get(name);
        if (!provider.ok || !provider.value.operations.has("get-balance")) continue;
        if (await provider.value.isConfigured()) return name;
    }
    return undefined;
}

export const checkWalletBalance: AgentBehavior = {
    name: "check-wallet-balance",
    description: "Read and log the wallet's native balance",
    usesLlm: false,

    async run(ctx) {
        const wallet = await findWallet(ctx);
        if (!wallet) {
            ctx.log.warn("No configured wallet provider");
            return false;
        }

        const result = await ctx.performAction(wallet, "get-balance", {});
        if (!result.ok) return false;

        ctx.state.lastBalance = result.value;
        ctx.log.info(`${wallet} balance: ${JSON.stringify(result.value)}`);
        return true;
    },
};
