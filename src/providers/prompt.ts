/**
 * CredentialPrompt: how a provider asks the operator for credentials.
 *
 * Interactive runs use the terminal; the control API configures providers
 * without a prompt, from values already present in the environment.
 */

import { createInterface } from "node:readline/promises";

export interface CredentialPrompt {
    ask(question: string): Promise<string>;
    confirm(question: string): Promise<boolean>;
}

export class TerminalPrompt implements CredentialPrompt {
    async ask(question: string): Promise<string> {
        const rl = createInterface({ input: process.stdin, output: process.stdout });
        try {
            return (await rl.question(`${question} `)).trim();
        } finally {
            rl.close();
        }
    }

    async confirm(question: string): Promise<boolean> {
        const answer = await this.ask(`${question} (y/n):`);
        return answer.toLowerCase() === "y" || answer.toLowerCase() === "yes";
    }
}
