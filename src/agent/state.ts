/**
 * AgentState: scratch space shared by behaviors across iterations.
 *
 * Lives as long as its agent and is only written from the loop; background
 * feeds reach it through the channel, never directly. Every collection in
 * it is bounded.
 */

import type { RoomInfo } from "../providers/echochambers.js";
import type { Tweet } from "../providers/twitter.js";

export const MAX_INBOX_RECORDS = 500;
export const MAX_REPLIED_IDS = 1_000;

/** One message picked up by a background feed */
export interface InboundRecord {
    /** Feed source that produced it, e.g. "echochambers" */
    source: string;
    id: string;
    author: string;
    content: string;
    receivedAt: number;
}

export interface AgentStateSnapshot {
    roomInfo: RoomInfo | null;
    inbox: number;
    replied: number;
    sentMessages: string[];
    lastRoomPostAt: number | null;
    timeline: number;
    lastTweetAt: number | null;
    lastBalance: unknown;
}

export class AgentState {
    roomInfo?: RoomInfo;
    lastRoomPostAt?: number;
    lastTweetAt?: number;
    lastBalance?: unknown;
    /** Home timeline as read, newest first; tasks take tweets from the front */
    timeline: Tweet[] = [];

    private inbox: InboundRecord[] = [];
    private readonly repliedIds = new Set<string>();
    private sent: string[] = [];

    /** Queue records, dropping the oldest beyond MAX_INBOX_RECORDS */
    receive(records: readonly InboundRecord[]): void {
        this.inbox.push(...records);
        if (this.inbox.length > MAX_INBOX_RECORDS) {
            this.inbox = this.inbox.slice(this.inbox.length - MAX_INBOX_RECORDS);
        }
    }

    /** Remove and return every queued record from `source` */
    takeInbox(source: string): InboundRecord[] {
        const taken = this.inbox.filter((r) => r.source === source);
        this.inbox = this.inbox.filter((r) => r.source !== source);
        return taken;
    }

    /** Put records back at the front, ahead of anything received since */
    returnToInbox(records: readonly InboundRecord[]): void {
        this.inbox.unshift(...records);
    }

    get inboxSize(): number {
        return this.inbox.length;
    }

    markReplied(id: string): void {
        this.repliedIds.add(id);
        if (this.repliedIds.size > MAX_REPLIED_IDS) {
            const oldest = this.repliedIds.values().next();
            if (!oldest.done) this.repliedIds.delete(oldest.value);
        }
    }

    hasReplied(id: string): boolean {
        return this.repliedIds.has(id);
    }

    /** Remember one sent message, keeping only the latest `limit` */
    rememberSent(content: string, limit: number): void {
        this.sent.push(content);
        if (this.sent.length > limit) {
            this.sent = this.sent.slice(this.sent.length - limit);
        }
    }

    get sentMessages(): readonly string[] {
        return this.sent;
    }

    snapshot(): AgentStateSnapshot {
        return {
            roomInfo: this.roomInfo ?? null,
            inbox: this.inbox.length,
            replied: this.repliedIds.size,
            sentMessages: [...this.sent],
            lastRoomPostAt: this.lastRoomPostAt ?? null,
            timeline: this.timeline.length,
            lastTweetAt: this.lastTweetAt ?? null,
            lastBalance: this.lastBalance ?? null,
        };
    }
}
