/**
 * Mentions listener: background feed that polls the account's mentions and
 * pushes the ones that arrived after it started onto the agent's channel.
 *
 * The first poll only marks what is already there as seen, so a restarted
 * agent does not answer old mentions again.
 */

import type { BackgroundFeed, FeedContext } from "../behaviors/interface.js";
import { metrics, METRIC_LISTENER_RECORDS } from "../metrics.js";
import { tweetSchema } from "../providers/twitter.js";
import type { InboundRecord } from "./state.js";

const MAX_SEEN_IDS = 1_000;

export const MENTION_SOURCE = "twitter";

export class MentionsListener implements BackgroundFeed {
    readonly name = "twitter-mentions";
    private readonly seen = new Set<string>();
    private primed = false;

    async run(ctx: FeedContext, signal: AbortSignal): Promise<void> {
        ctx.log.info(`Mentions listener started (every ${ctx.intervalMs}ms)`);
        while (!signal.aborted) {
            await this.poll(ctx);
            await ctx.sleep(ctx.intervalMs, signal);
        }
        ctx.log.info("Mentions listener stopped");
    }

    /** One poll; returns how many records were pushed */
    async poll(ctx: FeedContext): Promise<number> {
        const mentions = await ctx.registry.dispatchNamed(MENTION_SOURCE, "get-mentions", {});
        if (!mentions.ok) return 0;
        if (!Array.isArray(mentions.value)) {
            ctx.log.warn("Mentions response is not a list");
            return 0;
        }

        const fresh: InboundRecord[] = [];
        // Mentions arrive newest first
        for (const entry of [...mentions.value].reverse()) {
            const parsed = tweetSchema.safeParse(entry);
            if (!parsed.success) continue;
            const tweet = parsed.data;
            if (this.seen.has(tweet.id)) continue;
            this.remember(tweet.id);
            if (!this.primed || tweet.own || !tweet.text) continue;

            fresh.push({
                source: MENTION_SOURCE,
                id: tweet.id,
                author: tweet.author_username,
                content: tweet.text,
                receivedAt: Date.now(),
            });
        }

        if (!this.primed) {
            this.primed = true;
            ctx.log.debug(`Skipping ${this.seen.size} mention(s) from before start`);
        }
        for (const record of fresh) ctx.channel.push(record);
        if (fresh.length > 0) {
            metrics.inc(METRIC_LISTENER_RECORDS, fresh.length);
            ctx.log.debug(`Queued ${fresh.length} mention(s)`);
        }
        return fresh.length;
    }

    private remember(id: string): void {
        this.seen.add(id);
        if (this.seen.size > MAX_SEEN_IDS) {
            const oldest = this.seen.values().next();
            if (!oldest.done) this.seen.delete(oldest.value);
        }
    }
}
