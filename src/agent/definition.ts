/**
 * Agent definition: the JSON file describing one agent.
 *
 * Loaded from `<AGENTS_DIR>/<name>.json` and validated here before anything
 * is constructed from it.
 */

import { z } from "zod";

const taskSchema = z.object({
    name: z.string().min(1),
    weight: z.number().finite().nonnegative(),
});

const timeRuleSchema = z.object({
    name: z.string().min(1),
    start_hour: z.number().int().min(0).max(23),
    end_hour: z.number().int().min(0).max(23),
    multiplier: z.number().finite().nonnegative(),
    tasks: z.array(z.string()).default([]),
});

/** One provider configuration block; `name` selects the catalog entry */
const providerBlockSchema = z.object({ name: z.string().min(1) }).passthrough();

export const agentDefinitionSchema = z.object({
    name: z.string().min(1),
    bio: z.array(z.string()),
    traits: z.array(z.string()),
    examples: z.array(z.string()),
    /** Seconds between successful iterations */
    loop_delay: z.number().nonnegative(),
    config: z.array(providerBlockSchema),
    tasks: z.array(taskSchema).min(1),
    use_time_based_weights: z.boolean().default(false),
    time_based_multipliers: z.record(z.string(), z.number().finite().nonnegative()).default({}),
    time_rules: z.array(timeRuleSchema).optional(),
});

export type AgentDefinition = z.infer<typeof agentDefinitionSchema>;
