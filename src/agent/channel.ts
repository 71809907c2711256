/**
 * MessageChannel: append-only hand-off from a background producer to the
 * agent loop. The producer only pushes; the loop takes everything queued
 * at the top of each iteration.
 */
export class MessageChannel<T> {
    private messages: T[] = [];

    push(message: T): void {
        this.messages.push(message);
    }

    drain(): T[] {
        return this.messages.splice(0);
    }

    get pending(): number {
        return this.messages.length;
    }
}
