/**
 * Twitter provider: the agent's account on the Twitter v2 API.
 *
 * User-context calls are signed with OAuth 1.0a from four secrets. The
 * account's user id and username are stored next to them when the provider
 * is configured. Read operations join authors from `includes.users` and
 * flag the account's own tweets, so behaviors never need the secrets.
 */

import { z } from "zod";
import { ConfigurationError, withRetry } from "../errors/RuntimeError.js";
import { BaseProvider } from "./base.js";
import type {
    ConfigureContext,
    OperationParams,
    ParameterSpec,
    ProviderConfig,
    ProviderFactory,
} from "./interface.js";
import { oauthHeader, type OAuthCredentials } from "./oauth1.js";
import { numberParam, stringParam } from "./params.js";

export const TWEET_MAX_LENGTH = 280;

export const TWITTER_SECRETS = {
    consumerKey: "TWITTER_CONSUMER_KEY",
    consumerSecret: "TWITTER_CONSUMER_SECRET",
    accessToken: "TWITTER_ACCESS_TOKEN",
    accessTokenSecret: "TWITTER_ACCESS_TOKEN_SECRET",
    userId: "TWITTER_USER_ID",
    username: "TWITTER_USERNAME",
} as const;

// ═══════════════════════════════════════════════════════
//                  Schemas
// ═══════════════════════════════════════════════════════

const twitterConfigSchema = z.object({
    name: z.string().optional(),
    timeline_read_count: z.number().int().positive(),
    tweet_interval: z.number().int().positive(),
    own_tweet_replies_count: z.number().int().nonnegative().default(2),
    mentions_read_count: z.number().int().positive().default(10),
    api_url: z.string().url().default("https://api.twitter.com/2"),
    timeout_ms: z.number().int().positive().default(10_000),
    retry_delay_ms: z.number().int().nonnegative().default(1_000),
});

export type TwitterConfig = z.infer<typeof twitterConfigSchema>;

export const tweetSchema = z.object({
    id: z.string(),
    text: z.string(),
    created_at: z.string().nullable(),
    author_id: z.string().nullable(),
    author_name: z.string(),
    author_username: z.string(),
    /** Posted by the configured account */
    own: z.boolean(),
});

export type Tweet = z.infer<typeof tweetSchema>;

const tweetListResponseSchema = z.object({
    data: z.array(z.object({
        id: z.string(),
        text: z.string(),
        created_at: z.string().optional(),
        author_id: z.string().optional(),
    })).default([]),
    includes: z.object({
        users: z.array(z.object({ id: z.string(), name: z.string(), username: z.string() })).default([]),
    }).default({}),
});

const dataResponseSchema = z.object({ data: z.record(z.unknown()) });

const meResponseSchema = z.object({
    data: z.object({ id: z.string(), name: z.string(), username: z.string() }),
});

const TWEET_LIST_FIELDS = {
    "tweet.fields": "created_at,author_id,text",
    "expansions": "author_id",
    "user.fields": "name,username",
};

interface TwitterAccount extends OAuthCredentials {
    userId: string;
}

type Query = Record<string, string>;

/** Non-empty and within the length limit, or an Error saying which */
export function checkTweetText(text: string): string {
    if (!text.trim()) throw new Error("Tweet text cannot be empty");
    if ([...text].length > TWEET_MAX_LENGTH) {
        throw new Error(`Tweet text exceeds ${TWEET_MAX_LENGTH} character limit`);
    }
    return text;
}

/** Page size clamped to what the endpoint takes: at most 100, at least `min` */
function pageSize(count: number, min: number): string {
    return String(Math.min(100, Math.max(min, count)));
}

// ═══════════════════════════════════════════════════════
//                  Provider
// ═══════════════════════════════════════════════════════

export class TwitterProvider extends BaseProvider<TwitterConfig> {
    readonly isLlmProvider = false;

    protected validateConfig(raw: ProviderConfig): TwitterConfig {
        const parsed = twitterConfigSchema.safeParse(raw);
        if (!parsed.success) {
            const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "config"}: ${i.message}`).join("; ");
            throw new ConfigurationError(`Invalid twitter config: ${detail}`);
        }
        return parsed.data;
    }

    protected registerActions(): void {
        const count: ParameterSpec = { name: "count", required: false, kind: "integer", description: "Number of tweets" };
        const tweetId: ParameterSpec = { name: "tweet_id", required: true, kind: "string", description: "Tweet id" };
        const message: ParameterSpec = { name: "message", required: true, kind: "string", description: "Tweet text" };

        this.defineOperation(
            "get-latest-tweets",
            "Get the latest original tweets of a user",
            [{ name: "username", required: true, kind: "string", description: "Username without @" }, count],
            (params) => this.getLatestTweets(stringParam(params, "username"), countParam(params, 10)),
        );
        this.defineOperation(
            "post-tweet",
            "Post a new tweet",
            [message],
            (params) => this.postTweet(stringParam(params, "message")),
        );
        this.defineOperation(
            "read-timeline",
            "Read the home timeline",
            [count],
            (params) => this.readTimeline(countParam(params, this.config.timeline_read_count)),
        );
        this.defineOperation(
            "like-tweet",
            "Like a tweet",
            [tweetId],
            (params) => this.likeTweet(stringParam(params, "tweet_id")),
        );
        this.defineOperation(
            "reply-to-tweet",
            "Reply to a tweet",
            [tweetId, message],
            (params) => this.replyToTweet(stringParam(params, "tweet_id"), stringParam(params, "message")),
        );
        this.defineOperation(
            "get-tweet-replies",
            "Get replies to a tweet",
            [tweetId, count],
            (params) => this.getTweetReplies(stringParam(params, "tweet_id"), countParam(params, 10)),
        );
        this.defineOperation(
            "get-mentions",
            "Get recent tweets mentioning the account",
            [count],
            (params) => this.getMentions(countParam(params, this.config.mentions_read_count)),
        );
    }

    protected async checkConfigured(): Promise<void> {
        await this.me(await this.account());
    }

    protected override async acquireCredentials(ctx: ConfigureContext): Promise<void> {
        const credentials: OAuthCredentials = {
            consumerKey: await this.obtain(ctx, TWITTER_SECRETS.consumerKey, "Enter your Twitter API key:"),
            consumerSecret: await this.obtain(ctx, TWITTER_SECRETS.consumerSecret, "Enter your Twitter API key secret:"),
            accessToken: await this.obtain(ctx, TWITTER_SECRETS.accessToken, "Enter your Twitter access token:"),
            accessTokenSecret: await this.obtain(
                ctx,
                TWITTER_SECRETS.accessTokenSecret,
                "Enter your Twitter access token secret:",
            ),
        };
        // Fails before anything is stored when the keys are rejected
        const user = await this.me(credentials);

        await this.secrets.set(TWITTER_SECRETS.consumerKey, credentials.consumerKey);
        await this.secrets.set(TWITTER_SECRETS.consumerSecret, credentials.consumerSecret);
        await this.secrets.set(TWITTER_SECRETS.accessToken, credentials.accessToken);
        await this.secrets.set(TWITTER_SECRETS.accessTokenSecret, credentials.accessTokenSecret);
        await this.secrets.set(TWITTER_SECRETS.userId, user.id);
        await this.secrets.set(TWITTER_SECRETS.username, user.username);
        this.log.info(`Twitter credentials saved for @${user.username}`);
    }

    // ═══════════════════════════════════════════════════════
    //                  Operations
    // ═══════════════════════════════════════════════════════

    async getLatestTweets(username: string, count: number): Promise<Tweet[]> {
        const tweets = await this.readTweets("tweets/search/recent", {
            query: `from:${username} -is:retweet -is:reply`,
            max_results: pageSize(count, 10),
        });
        return tweets.slice(0, count);
    }

    async postTweet(text: string): Promise<Record<string, unknown>> {
        const data = await this.write("tweets", { text: checkTweetText(text) });
        this.log.info("Tweet posted");
        return data;
    }

    async readTimeline(count: number): Promise<Tweet[]> {
        const account = await this.account();
        const tweets = await this.readTweets(
            `users/${encodeURIComponent(account.userId)}/timelines/reverse_chronological`,
            { max_results: pageSize(count, 1) },
            account,
        );
        return tweets.slice(0, count);
    }

    async likeTweet(tweetId: string): Promise<Record<string, unknown>> {
        const account = await this.account();
        return this.write(`users/${encodeURIComponent(account.userId)}/likes`, { tweet_id: tweetId }, account);
    }

    async replyToTweet(tweetId: string, text: string): Promise<Record<string, unknown>> {
        const data = await this.write("tweets", {
            text: checkTweetText(text),
            reply: { in_reply_to_tweet_id: tweetId },
        });
        this.log.info(`Replied to tweet ${tweetId}`);
        return data;
    }

    async getTweetReplies(tweetId: string, count: number): Promise<Tweet[]> {
        const tweets = await this.readTweets("tweets/search/recent", {
            query: `conversation_id:${tweetId} is:reply`,
            max_results: pageSize(count, 10),
        });
        return tweets.slice(0, count);
    }

    /** Mentions by other accounts, newest first */
    async getMentions(count: number): Promise<Tweet[]> {
        const account = await this.account();
        const tweets = await this.readTweets(
            `users/${encodeURIComponent(account.userId)}/mentions`,
            { max_results: pageSize(count, 5) },
            account,
        );
        return tweets.filter((tweet) => !tweet.own).slice(0, count);
    }

    // ═══════════════════════════════════════════════════════
    //                  Helpers
    // ═══════════════════════════════════════════════════════

    private async account(): Promise<TwitterAccount> {
        return {
            consumerKey: await this.requireSecret(TWITTER_SECRETS.consumerKey),
            consumerSecret: await this.requireSecret(TWITTER_SECRETS.consumerSecret),
            accessToken: await this.requireSecret(TWITTER_SECRETS.accessToken),
            accessTokenSecret: await this.requireSecret(TWITTER_SECRETS.accessTokenSecret),
            userId: await this.requireSecret(TWITTER_SECRETS.userId),
        };
    }

    private async me(credentials: OAuthCredentials): Promise<z.infer<typeof meResponseSchema>["data"]> {
        return meResponseSchema.parse(await this.request("GET", "users/me", credentials)).data;
    }

    private async readTweets(path: string, query: Query, known?: TwitterAccount): Promise<Tweet[]> {
        const account = known ?? await this.account();
        const body = tweetListResponseSchema.parse(
            await this.request("GET", path, account, { ...TWEET_LIST_FIELDS, ...query }),
        );
        const users = new Map(body.includes.users.map((user) => [user.id, user]));
        return body.data.map((raw) => {
            const author = raw.author_id ? users.get(raw.author_id) : undefined;
            return {
                id: raw.id,
                text: raw.text,
                created_at: raw.created_at ?? null,
                author_id: raw.author_id ?? null,
                author_name: author?.name ?? "Unknown",
                author_username: author?.username ?? "Unknown",
                own: raw.author_id !== undefined && raw.author_id === account.userId,
            };
        });
    }

    private async write(path: string, body: unknown, known?: TwitterAccount): Promise<Record<string, unknown>> {
        const account = known ?? await this.account();
        return dataResponseSchema.parse(await this.request("POST", path, account, {}, body)).data;
    }

    // ═══════════════════════════════════════════════════════
    //                  Transport
    // ═══════════════════════════════════════════════════════

    private async request(
        method: "GET" | "POST",
        path: string,
        credentials: OAuthCredentials,
        query: Query = {},
        body?: unknown,
    ): Promise<unknown> {
        const url = new URL(`${this.config.api_url.replace(/\/+$/, "")}/${path}`);
        for (const [key, value] of Object.entries(query)) url.searchParams.set(key, value);

        return withRetry(async () => {
            const res = await this.fetchFn(url.href, {
                method,
                headers: {
                    "Content-Type": "application/json",
                    // Signed per attempt so every retry carries a fresh nonce
                    "Authorization": oauthHeader(method, url.href, credentials),
                },
                body: body === undefined ? undefined : JSON.stringify(body),
                signal: AbortSignal.timeout(this.config.timeout_ms),
            });
            if (!res.ok) {
                const text = await res.text().catch(() => "");
                throw new Error(`Twitter API ${res.status}: ${text.slice(0, 200)}`);
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

function countParam(params: OperationParams, fallback: number): number {
    return params.count === undefined ? fallback : Math.max(1, numberParam(params, "count"));
}

export function twitterFactory(): ProviderFactory {
    return (config, deps) => new TwitterProvider("twitter", config, deps);
}
