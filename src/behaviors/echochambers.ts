/**
 * Room behaviors: posting to and replying in an Echochambers room.
 */

import { ROOM_SOURCE, RoomListener } from "../agent/listener.js";
import type { AgentState, InboundRecord } from "../agent/state.js";
import { roomInfoSchema, roomMessageSchema } from "../providers/echochambers.js";
import type { AgentBehavior, AgentContext, FeedFactory, InputSource } from "./interface.js";
import { buildRoomPostPrompt, buildRoomReplyPrompt } from "./prompts.js";

const DEFAULT_MESSAGE_INTERVAL_S = 60;
const DEFAULT_POST_HISTORY = 50;
/** Chance a reply addresses the sender by @username */
const REFER_SENDER_PROBABILITY = 0.7;

// ═══════════════════════════════════════════════════════
//                  Shared inputs
// ═══════════════════════════════════════════════════════

export const roomInfoInput: InputSource = {
    name: "room-info",
    isMissing: (state: AgentState) => state.roomInfo === undefined,
    async replenish(ctx: AgentContext): Promise<void> {
        ctx.log.info("Reading room info");
        const result = await ctx.performAction(ROOM_SOURCE, "get-room-info", {});
        if (!result.ok) return;
        const parsed = roomInfoSchema.safeParse(result.value);
        if (parsed.success) {
            ctx.state.roomInfo = parsed.data;
        } else {
            ctx.log.warn("Room info response has an unexpected shape");
        }
    },
};

export const roomListenerFeed: FeedFactory = {
    name: "echochambers-room",
    create: () => new RoomListener(),
};

function numberSetting(ctx: AgentContext, key: string, fallback: number): number {
    const value = ctx.providerSetting(ROOM_SOURCE, key);
    return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

// ═══════════════════════════════════════════════════════
//                  post-echochambers
// ═══════════════════════════════════════════════════════

export const postEchochambers: AgentBehavior = {
    name: "post-echochambers",
    description: "Post a new message about the room topic",
    usesLlm: true,
    inputs: [roomInfoInput],

    async run(ctx) {
        const room = ctx.state.roomInfo;
        if (!room) {
            ctx.log.warn("Room info unavailable, skipping post");
            return false;
        }

        const intervalMs = numberSetting(ctx, "message_interval", DEFAULT_MESSAGE_INTERVAL_S) * 1000;
        const now = ctx.now().getTime();
        const last = ctx.state.lastRoomPostAt;
        if (last !== undefined && now - last <= intervalMs) {
            ctx.log.debug("Message interval not elapsed, skipping post");
            return false;
        }

        ctx.log.info("Generating new room message");
        const message = await ctx.promptLlm(buildRoomPostPrompt(room, ctx.state.sentMessages));
        if (!message) return false;

        const sent = await ctx.performAction(ROOM_SOURCE, "send-message", [message]);
        if (!sent.ok) return false;

        ctx.state.lastRoomPostAt = now;
        ctx.state.rememberSent(message, numberSetting(ctx, "post_history_track", DEFAULT_POST_HISTORY));
        ctx.log.info(`Posted: '${message.slice(0, 69)}'`);
        return true;
    },
};

// ═══════════════════════════════════════════════════════
//                  reply-echochambers
// ═══════════════════════════════════════════════════════

/** Messages the listener queued, or a fresh history read when nothing is queued */
async function replyCandidates(ctx: AgentContext): Promise<InboundRecord[]> {
    const queued = ctx.state.takeInbox(ROOM_SOURCE);
    if (queued.length > 0) return queued;

    const history = await ctx.performAction(ROOM_SOURCE, "get-room-history", {});
    if (!history.ok || !Array.isArray(history.value)) return [];

    const records: InboundRecord[] = [];
    for (const entry of history.value) {
        const parsed = roomMessageSchema.safeParse(entry);
        if (!parsed.success) continue;
        records.push({
            source: ROOM_SOURCE,
            id: parsed.data.id,
            author: parsed.data.sender.username,
            content: parsed.data.content,
            receivedAt: ctx.now().getTime(),
        });
    }
    return records;
}

export const replyEchochambers: AgentBehavior = {
    name: "reply-echochambers",
    description: "Reply to one message in the room",
    usesLlm: true,
    inputs: [roomInfoInput],
    feeds: [roomListenerFeed],
    consumes: [ROOM_SOURCE],

    async run(ctx) {
        const room = ctx.state.roomInfo;
        if (!room) {
            ctx.log.warn("Room info unavailable, skipping reply");
            return false;
        }

        const ownUsername = ctx.providerSetting(ROOM_SOURCE, "sender_username");
        const candidates = await replyCandidates(ctx);
        ctx.log.info(`Checking ${candidates.length} message(s) for replies`);

        for (let i = 0; i < candidates.length; i++) {
            const candidate = candidates[i];
            if (!candidate) continue;
            if (!candidate.id || !candidate.author || !candidate.content) {
                ctx.log.warn("Skipping message with missing fields");
                continue;
            }
            if (candidate.author === ownUsername || ctx.state.hasReplied(candidate.id)) {
                continue;
            }

            const referToSender = ctx.random() < REFER_SENDER_PROBABILITY;
            const reply = await ctx.promptLlm(buildRoomReplyPrompt(room, candidate, referToSender));
            if (!reply) {
                ctx.state.returnToInbox(candidates.slice(i));
                return false;
            }

            const sent = await ctx.performAction(ROOM_SOURCE, "send-message", [reply]);
            if (!sent.ok) {
                ctx.state.returnToInbox(candidates.slice(i));
                return false;
            }

            ctx.state.markReplied(candidate.id);
            ctx.state.rememberSent(reply, numberSetting(ctx, "post_history_track", DEFAULT_POST_HISTORY));
            ctx.state.returnToInbox(candidates.slice(i + 1));
            ctx.log.info(`Replied to @${candidate.author}`);
            return true;
        }

        ctx.log.info("No messages to reply to");
        return false;
    },
};
