/**
 * Twitter behaviors: posting, replying, liking and answering mentions.
 *
 * Replies and likes work through the home timeline kept in Agent State;
 * the loop reads a new page whenever those tasks find it empty.
 */

import { MENTION_SOURCE, MentionsListener } from "../agent/mentions.js";
import type { AgentState, InboundRecord } from "../agent/state.js";
import { tweetSchema, type Tweet } from "../providers/twitter.js";
import type { AgentBehavior, AgentContext, FeedFactory, InputSource } from "./interface.js";
import { buildTweetPrompt, buildTweetReplyPrompt } from "./prompts.js";

const TWITTER = "twitter";
const DEFAULT_OWN_TWEET_REPLIES = 2;

function numberSetting(ctx: AgentContext, key: string, fallback: number): number {
    const value = ctx.providerSetting(TWITTER, key);
    return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

function parseTweets(ctx: AgentContext, value: unknown): Tweet[] {
    if (!Array.isArray(value)) {
        ctx.log.warn("Tweet list has an unexpected shape");
        return [];
    }
    const tweets: Tweet[] = [];
    for (const entry of value) {
        const parsed = tweetSchema.safeParse(entry);
        if (parsed.success) tweets.push(parsed.data);
    }
    return tweets;
}

// ═══════════════════════════════════════════════════════
//                  Shared inputs
// ═══════════════════════════════════════════════════════

export const timelineInput: InputSource = {
    name: "timeline",
    isMissing: (state: AgentState) => state.timeline.length === 0,
    async replenish(ctx: AgentContext): Promise<void> {
        ctx.log.info("Reading timeline");
        const result = await ctx.performAction(TWITTER, "read-timeline", {});
        if (!result.ok) return;
        ctx.state.timeline = parseTweets(ctx, result.value);
        ctx.log.info(`Read ${ctx.state.timeline.length} timeline tweet(s)`);
    },
};

export const mentionsFeed: FeedFactory = {
    name: "twitter-mentions",
    create: () => new MentionsListener(),
};

/** Generate a reply to `tweet` and send it; false when either step fails */
async function replyTo(ctx: AgentContext, tweet: { id: string; author: string; content: string }): Promise<boolean> {
    ctx.log.info(`Generating reply to: ${tweet.content.slice(0, 50)}`);
    const reply = await ctx.promptLlm(buildTweetReplyPrompt(tweet));
    if (!reply) return false;

    const sent = await ctx.performAction(TWITTER, "reply-to-tweet", [tweet.id, reply]);
    if (!sent.ok) return false;

    ctx.state.markReplied(tweet.id);
    ctx.log.info(`Replied to @${tweet.author}`);
    return true;
}

// ═══════════════════════════════════════════════════════
//                  post-tweet
// ═══════════════════════════════════════════════════════

export const postTweet: AgentBehavior = {
    name: "post-tweet",
    description: "Post a new tweet once the tweet interval has passed",
    usesLlm: true,

    async run(ctx) {
        const intervalMs = numberSetting(ctx, "tweet_interval", 0) * 1000;
        const now = ctx.now().getTime();
        const last = ctx.state.lastTweetAt;
        if (last !== undefined && now - last < intervalMs) {
            ctx.log.debug("Tweet interval not elapsed, skipping post");
            return false;
        }

        ctx.log.info("Generating new tweet");
        const text = await ctx.promptLlm(buildTweetPrompt(ctx.name));
        if (!text) return false;

        const posted = await ctx.performAction(TWITTER, "post-tweet", [text]);
        if (!posted.ok) return false;

        ctx.state.lastTweetAt = now;
        ctx.log.info(`Tweeted: '${text.slice(0, 69)}'`);
        return true;
    },
};

// ═══════════════════════════════════════════════════════
//                  reply-to-tweet / like-tweet
// ═══════════════════════════════════════════════════════

export const replyToTweet: AgentBehavior = {
    name: "reply-to-tweet",
    description: "Reply to the next tweet on the timeline",
    usesLlm: true,
    inputs: [timelineInput],

    async run(ctx) {
        const tweet = ctx.state.timeline.shift();
        if (!tweet) {
            ctx.log.info("No tweets to reply to");
            return false;
        }
        if (tweet.own || ctx.state.hasReplied(tweet.id)) {
            ctx.log.debug(`Skipping tweet ${tweet.id}`);
            return false;
        }
        return replyTo(ctx, { id: tweet.id, author: tweet.author_username, content: tweet.text });
    },
};

export const likeTweet: AgentBehavior = {
    name: "like-tweet",
    description: "Like the next tweet on the timeline, or queue replies to the agent's own",
    usesLlm: false,
    inputs: [timelineInput],

    async run(ctx) {
        const tweet = ctx.state.timeline.shift();
        if (!tweet) {
            ctx.log.info("No tweets to like");
            return false;
        }

        if (tweet.own) {
            const replies = await ctx.performAction(TWITTER, "get-tweet-replies", [tweet.id]);
            if (!replies.ok) return false;
            const limit = numberSetting(ctx, "own_tweet_replies_count", DEFAULT_OWN_TWEET_REPLIES);
            const queued = parseTweets(ctx, replies.value).slice(0, limit);
            ctx.state.timeline.push(...queued);
            ctx.log.info(`Queued ${queued.length} repl(ies) to own tweet ${tweet.id}`);
            return true;
        }

        const liked = await ctx.performAction(TWITTER, "like-tweet", [tweet.id]);
        if (!liked.ok) return false;
        ctx.log.info(`Liked: ${tweet.text.slice(0, 50)}`);
        return true;
    },
};

// ═══════════════════════════════════════════════════════
//                  respond-to-mentions
// ═══════════════════════════════════════════════════════

export const respondToMentions: AgentBehavior = {
    name: "respond-to-mentions",
    description: "Reply to one mention picked up by the mentions listener",
    usesLlm: true,
    feeds: [mentionsFeed],
    consumes: [MENTION_SOURCE],

    async run(ctx) {
        const mentions: InboundRecord[] = ctx.state.takeInbox(MENTION_SOURCE);
        for (let i = 0; i < mentions.length; i++) {
            const mention = mentions[i];
            if (!mention || ctx.state.hasReplied(mention.id)) continue;

            const replied = await replyTo(ctx, mention);
            ctx.state.returnToInbox(mentions.slice(replied ? i + 1 : i));
            return replied;
        }

        ctx.log.info("No new mentions");
        return false;
    },
};
