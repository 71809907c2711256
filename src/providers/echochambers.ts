/**
 * Echochambers provider: one chat room on an Echochambers server.
 *
 * Every request carries the `x-api-key` header. Responses are validated
 * with zod and normalized, so behaviors can re-parse results with the
 * exported schemas.
 */

import { z } from "zod";
import { ConfigurationError, withRetry } from "../errors/RuntimeError.js";
import { BaseProvider } from "./base.js";
import type { ProviderConfig, ProviderFactory } from "./interface.js";
import { stringParam } from "./params.js";

// ═══════════════════════════════════════════════════════
//                  Schemas
// ═══════════════════════════════════════════════════════

const echochambersConfigSchema = z.object({
    name: z.string().optional(),
    api_url: z.string().url(),
    api_key: z.string().min(1),
    room: z.string().min(1),
    sender_username: z.string().min(1),
    sender_model: z.string().min(1),
    history_read_count: z.number().int().positive(),
    post_history_track: z.number().int().positive().default(50),
    message_interval: z.number().nonnegative().default(60),
    timeout_ms: z.number().int().positive().default(10_000),
    retry_delay_ms: z.number().int().nonnegative().default(1_000),
});

export type EchochambersConfig = z.infer<typeof echochambersConfigSchema>;

export const roomInfoSchema = z.object({
    id: z.string(),
    name: z.string(),
    topic: z.string(),
    tags: z.array(z.string()),
    messageCount: z.number(),
});

export type RoomInfo = z.infer<typeof roomInfoSchema>;

export const roomMessageSchema = z.object({
    id: z.string(),
    content: z.string(),
    sender: z.object({ username: z.string(), model: z.string() }),
    timestamp: z.string(),
    roomId: z.string(),
});

export type RoomMessage = z.infer<typeof roomMessageSchema>;

const roomsResponseSchema = z.object({
    rooms: z.array(z.object({
        id: z.string(),
        name: z.string(),
        topic: z.string().optional(),
        tags: z.array(z.string()).default([]),
        messageCount: z.number().default(0),
    }).passthrough()),
});

const historyResponseSchema = z.object({
    messages: z.array(z.unknown()).default([]),
});

const rawMessageSchema = z.object({
    id: z.string().default(""),
    content: z.string().default(""),
    sender: z.object({
        username: z.string().default(""),
        model: z.string().default(""),
    }).default({}),
    timestamp: z.string().default(""),
    roomId: z.string().default(""),
});

// ═══════════════════════════════════════════════════════
//                  Provider
// ═══════════════════════════════════════════════════════

export class EchochambersProvider extends BaseProvider<EchochambersConfig> {
    readonly isLlmProvider = false;

    protected validateConfig(raw: ProviderConfig): EchochambersConfig {
        const parsed = echochambersConfigSchema.safeParse(raw);
        if (!parsed.success) {
            const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "config"}: ${i.message}`).join("; ");
            throw new ConfigurationError(`Invalid echochambers config: ${detail}`);
        }
        return parsed.data;
    }

    protected registerActions(): void {
        this.defineOperation("get-room-info", "Get information about the configured room", [], () => this.getRoomInfo());
        this.defineOperation("get-room-history", "Get recent messages of the room", [], () => this.getRoomHistory());
        this.defineOperation(
            "send-message",
            "Send a message to the room",
            [{ name: "content", required: true, kind: "string", description: "Message content" }],
            (params) => this.sendMessage(stringParam(params, "content")),
        );
    }

    protected async checkConfigured(): Promise<void> {
        await this.getRoomInfo();
    }

    // ═══════════════════════════════════════════════════════
    //                  Operations
    // ═══════════════════════════════════════════════════════

    async getRoomInfo(): Promise<RoomInfo> {
        const body = roomsResponseSchema.parse(await this.request("GET", "/api/rooms"));
        const room = body.rooms.find((r) => r.id === this.config.room);
        if (!room) throw new Error(`Room '${this.config.room}' not found`);
        return {
            id: room.id,
            name: room.name,
            topic: room.topic ?? "General Discussion",
            tags: room.tags,
            messageCount: room.messageCount,
        };
    }

    async getRoomHistory(): Promise<RoomMessage[]> {
        const body = historyResponseSchema.parse(
            await this.request("GET", `/api/rooms/${encodeURIComponent(this.config.room)}/history`),
        );
        const messages: RoomMessage[] = [];
        for (const entry of body.messages.slice(0, this.config.history_read_count)) {
            const parsed = rawMessageSchema.safeParse(entry);
            if (parsed.success) messages.push(parsed.data);
        }
        return messages;
    }

    async sendMessage(content: string): Promise<unknown> {
        const response = await this.request("POST", `/api/rooms/${encodeURIComponent(this.config.room)}/message`, {
            content,
            sender: {
                username: this.config.sender_username,
                model: this.config.sender_model,
            },
        });
        this.log.info(`Message sent to ${this.config.room}`);
        return response;
    }

    // ═══════════════════════════════════════════════════════
    //                  Transport
    // ═══════════════════════════════════════════════════════

    private async request(method: "GET" | "POST", path: string, body?: unknown): Promise<unknown> {
        const url = `${this.config.api_url.replace(/\/+$/, "")}${path}`;
        return withRetry(async () => {
            const res = await this.fetchFn(url, {
                method,
                headers: {
                    "Content-Type": "application/json",
                    "x-api-key": this.config.api_key,
                },
                body: body === undefined ? undefined : JSON.stringify(body),
                signal: AbortSignal.timeout(this.config.timeout_ms),
            });
            if (!res.ok) {
                const text = await res.text().catch(() => "");
                throw new Error(`Echochambers API ${res.status}: ${text.slice(0, 200)}`);
            }
            return res.json();
        }, {
            maxAttempts: 3,
            baseDelayMs: this.config.retry_delay_ms,
            onRetry: (attempt, delayMs, err) =>
                this.log.warn(`${method} ${path} attempt ${attempt} failed, retrying in ${delayMs}ms`, err),
        });
    }
}

export function echochambersFactory(): ProviderFactory {
    return (config, deps) => new EchochambersProvider("echochambers", config, deps);
}
