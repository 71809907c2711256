/**
 * OAuth 1.0a request signing (HMAC-SHA1), as the Twitter v2 API expects for
 * user-context calls. Query parameters are signed; JSON bodies are not.
 */

import { createHmac, randomBytes } from "node:crypto";

export interface OAuthCredentials {
    consumerKey: string;
    consumerSecret: string;
    accessToken: string;
    accessTokenSecret: string;
}

/** RFC 3986 percent-encoding */
export function percentEncode(value: string): string {
    return encodeURIComponent(value).replace(
        /[!'()*]/g,
        (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`,
    );
}

/** METHOD&base-url&sorted-params, each part percent-encoded */
export function signatureBaseString(method: string, url: URL, oauthParams: Readonly<Record<string, string>>): string {
    const pairs: Array<[string, string]> = [];
    url.searchParams.forEach((value, key) => pairs.push([percentEncode(key), percentEncode(value)]));
    for (const [key, value] of Object.entries(oauthParams)) {
        pairs.push([percentEncode(key), percentEncode(value)]);
    }
    pairs.sort(([ak, av], [bk, bv]) => (ak === bk ? compare(av, bv) : compare(ak, bk)));

    const paramString = pairs.map(([key, value]) => `${key}=${value}`).join("&");
    const baseUrl = `${url.origin}${url.pathname}`;
    return [method.toUpperCase(), percentEncode(baseUrl), percentEncode(paramString)].join("&");
}

function compare(a: string, b: string): number {
    if (a < b) return -1;
    return a > b ? 1 : 0;
}

export interface SignOptions {
    nonce?: string;
    /** Seconds since the epoch */
    timestamp?: number;
}

/** `Authorization` header value for one request */
export function oauthHeader(
    method: string,
    url: string,
    credentials: OAuthCredentials,
    opts: SignOptions = {},
): string {
    const oauthParams: Record<string, string> = {
        oauth_consumer_key: credentials.consumerKey,
        oauth_nonce: opts.nonce ?? randomBytes(16).toString("hex"),
        oauth_signature_method: "HMAC-SHA1",
        oauth_timestamp: String(opts.timestamp ?? Math.floor(Date.now() / 1000)),
        oauth_token: credentials.accessToken,
        oauth_version: "1.0",
    };

    const signingKey = `${percentEncode(credentials.consumerSecret)}&${percentEncode(credentials.accessTokenSecret)}`;
    const signature = createHmac("sha1", signingKey)
        .update(signatureBaseString(method, new URL(url), oauthParams))
        .digest("base64");

    const fields = { ...oauthParams, oauth_signature: signature };
    return "OAuth " + Object.entries(fields)
        .sort(([a], [b]) => compare(a, b))
        .map(([key, value]) => `${percentEncode(key)}="${percentEncode(value)}"`)
        .join(", ");
}
