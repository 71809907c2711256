/** Prompt templates for room behaviors. */

import type { RoomInfo } from "../providers/echochambers.js";

export function buildRoomPostPrompt(room: RoomInfo, previous: readonly string[]): string {
    const lines = [
        `You are posting in a chat room about "${room.topic}".`,
        `Room tags: ${room.tags.join(", ") || "none"}.`,
        "Write one short, original message that moves the conversation forward.",
    ];
    if (previous.length > 0) {
        lines.push("Do not repeat any of your earlier messages:");
        lines.push(...previous.map((content) => `- ${content}`));
    }
    lines.push("Reply with the message text only.");
    return lines.join("\n");
}

export function buildRoomReplyPrompt(
    room: RoomInfo,
    message: { author: string; content: string },
    referToSender: boolean,
): string {
    return [
        `You are in a chat room about "${room.topic}" (tags: ${room.tags.join(", ") || "none"}).`,
        `@${message.author} wrote: "${message.content}"`,
        referToSender
            ? `Refer to the sender as @${message.author}.`
            : "Respond without directly referring to the sender.",
        "Reply with the message text only.",
    ].join("\n");
}

export function buildTweetPrompt(agentName: string): string {
    return [
        "Write one engaging tweet.",
        "No hashtags, links or emojis. Keep it under 280 characters.",
        `It should be pure commentary; do not promote any coin or project other than ${agentName}.`,
        "Do not repeat any of the examples you were given.",
        "Reply with the tweet text only.",
    ].join("\n");
}

export function buildTweetReplyPrompt(tweet: { author: string; content: string }): string {
    return [
        `@${tweet.author} tweeted: "${tweet.content}"`,
        "Write a short reply to it. No hashtags, links or emojis. Keep it under 280 characters.",
        "Reply with the tweet text only.",
    ].join("\n");
}
