/**
 * Error sanitization: keep provider internals out of operator-facing text.
 *
 * Raw errors (RPC URLs, API responses, stack traces) are logged as-is but
 * replaced with short messages wherever they are reported back over the API.
 */

/** Known error patterns → operator-friendly replacements */
const ERROR_PATTERNS: Array<[RegExp, string]> = [
    // Network
    [/Too many request/i, "Service is rate limiting requests, retrying shortly."],
    [/\b429\b/, "Service is rate limiting requests, retrying shortly."],
    [/getaddrinfo|ENOTFOUND/i, "Unable to reach the service."],
    [/ECONNREFUSED/i, "Service temporarily unavailable."],
    [/ETIMEDOUT|ESOCKETTIMEDOUT|timed? ?out|aborted/i, "Request timed out."],
    [/fetch failed/i, "Network request failed."],

    // Chain
    [/insufficient funds/i, "Insufficient funds for this transfer."],
    [/execution reverted/i, "Transaction was rejected by the contract."],
    [/nonce too low|replacement transaction underpriced/i, "Transaction conflict detected."],

    // Credentials
    [/api key|unauthorized|\b401\b/i, "Credentials were rejected. Reconfigure the connection."],
    [/model.*not.*found/i, "Requested model is unavailable."],
];

/**
 * Sanitize an error for operator-facing display.
 */
export function sanitizeForUser(rawError: string): string {
    for (const [pattern, friendly] of ERROR_PATTERNS) {
        if (pattern.test(rawError)) {
            return friendly;
        }
    }
    return "The operation failed. See runner logs for details.";
}

/**
 * Extract error message from unknown catch value.
 */
export function extractErrorMessage(err: unknown): string {
    if (err instanceof Error) return err.message;
    if (typeof err === "string") return err;
    return String(err);
}

/** Errors worth retrying: rate limits, timeouts and transport failures. */
export function isTransientError(rawError: string): boolean {
    return /too many request|\b429\b|\b50[234]\b|getaddrinfo|ECONNREFUSED|ECONNRESET|ETIMEDOUT|timed? ?out|fetch failed/i
        .test(rawError);
}
