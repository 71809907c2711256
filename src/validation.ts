/**
 * Request payload validation for the control API.
 */

import { z } from "zod";

const nameSchema = z.string().regex(/^[A-Za-z0-9_-]+$/, "must be alphanumeric, '-' or '_'");

export const actionRequestSchema = z.object({
    connection: z.string().min(1),
    action: z.string().min(1),
    /** Positional values in declaration order, or a named map */
    params: z.union([z.array(z.unknown()), z.record(z.string(), z.unknown())]).default([]),
});

export type ActionRequestPayload = z.infer<typeof actionRequestSchema>;

const runsQuerySchema = z.object({
    limit: z.string().regex(/^\d+$/).optional(),
});

export function parseActionRequest(body: unknown): ActionRequestPayload {
    return actionRequestSchema.parse(body);
}

export function parseAgentName(raw: string): string {
    return nameSchema.parse(decodeURIComponent(raw));
}

export function parseRunsLimit(url: URL, fallback: number): number {
    const query = runsQuerySchema.parse({
        limit: url.searchParams.get("limit") ?? undefined,
    });
    if (query.limit === undefined) return fallback;
    return Math.min(Math.max(Number.parseInt(query.limit, 10), 1), 500);
}
