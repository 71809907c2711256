/**
 * BehaviorRegistry: task name → behavior, built explicitly at startup.
 */

import { ConfigurationError } from "../errors/RuntimeError.js";
import { postEchochambers, replyEchochambers } from "./echochambers.js";
import type { AgentBehavior } from "./interface.js";
import { likeTweet, postTweet, replyToTweet, respondToMentions } from "./twitter.js";
import { checkWalletBalance } from "./wallet.js";

export class BehaviorRegistry {
    private readonly behaviors = new Map<string, AgentBehavior>();

    constructor(behaviors: readonly AgentBehavior[] = []) {
        for (const behavior of behaviors) this.register(behavior);
    }

    register(behavior: AgentBehavior): void {
        if (this.behaviors.has(behavior.name)) {
            throw new ConfigurationError(`Behavior '${behavior.name}' is already registered`);
        }
        this.behaviors.set(behavior.name, behavior);
    }

    get(name: string): AgentBehavior | undefined {
        return this.behaviors.get(name);
    }

    has(name: string): boolean {
        return this.behaviors.has(name);
    }

    list(): AgentBehavior[] {
        return [...this.behaviors.values()];
    }
}

export function createDefaultBehaviors(): BehaviorRegistry {
    return new BehaviorRegistry([
        postEchochambers,
        replyEchochambers,
        postTweet,
        replyToTweet,
        likeTweet,
        respondToMentions,
        checkWalletBalance,
    ]);
}
