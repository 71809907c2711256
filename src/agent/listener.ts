/**
 * Room listener: background feed that polls an Echochambers room and
 * pushes messages it has not seen before onto the agent's channel.
 *
 * It owns nothing but its seen-id set; Agent State is only ever updated by
 * the loop when it drains the channel.
 */

import type { BackgroundFeed, FeedContext } from "../behaviors/interface.js";
import { metrics, METRIC_LISTENER_RECORDS } from "../metrics.js";
import { roomMessageSchema } from "../providers/echochambers.js";
import type { InboundRecord } from "./state.js";

const MAX_SEEN_IDS = 1_000;

export const ROOM_SOURCE = "echochambers";

export class RoomListener implements BackgroundFeed {
    readonly name = "echochambers-room";
    private readonly seen = new Set<string>();

    async run(ctx: FeedContext, signal: AbortSignal): Promise<void> {
        ctx.log.info(`Room listener started (every ${ctx.intervalMs}ms)`);
        while (!signal.aborted) {
            await this.poll(ctx);
            await ctx.sleep(ctx.intervalMs, signal);
        }
        ctx.log.info("Room listener stopped");
    }

    /** One poll; returns how many records were pushed */
    async poll(ctx: FeedContext): Promise<number> {
        const history = await ctx.registry.dispatchNamed(ROOM_SOURCE, "get-room-history", {});
        if (!history.ok) return 0;
        if (!Array.isArray(history.value)) {
            ctx.log.warn("Room history is not a list");
            return 0;
        }

        const ownUsername = ctx.providerSetting(ROOM_SOURCE, "sender_username");
        const fresh: InboundRecord[] = [];
        // History arrives newest first
        for (const entry of [...history.value].reverse()) {
            const parsed = roomMessageSchema.safeParse(entry);
            if (!parsed.success) continue;
            const message = parsed.data;
            if (!message.id || this.seen.has(message.id)) continue;
            this.remember(message.id);
            if (message.sender.username === ownUsername || !message.content) continue;

            fresh.push({
                source: ROOM_SOURCE,
                id: message.id,
                author: message.sender.username,
                content: message.content,
                receivedAt: Date.now(),
            });
        }

        for (const record of fresh) ctx.channel.push(record);
        if (fresh.length > 0) {
            metrics.inc(METRIC_LISTENER_RECORDS, fresh.length);
            ctx.log.debug(`Queued ${fresh.length} room message(s)`);
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
