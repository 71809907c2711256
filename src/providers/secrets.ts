/**
 * Secret storage for provider credentials.
 *
 * The runtime treats storage as opaque: providers read and write keys
 * through `SecretStore`. The default store is a dotenv file, so values
 * written by `configure` are picked up by `dotenv/config` on the next start.
 */

import { readFile, writeFile } from "node:fs/promises";
import { parse } from "dotenv";
import { ConfigurationError } from "../errors/RuntimeError.js";

export interface SecretStore {
    get(key: string): Promise<string | undefined>;
    set(key: string, value: string): Promise<void>;
    has(key: string): Promise<boolean>;
}

const KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const PLAIN_VALUE = /^[^\s"'`#\\]*$/;

/** Serialize a value the way dotenv.parse reads it back */
export function formatDotenvValue(value: string): string {
    if (PLAIN_VALUE.test(value)) return value;
    if (!value.includes("'") && !/[\r\n]/.test(value)) return `'${value}'`;
    // dotenv expands \n and \r inside double quotes, so a literal backslash would not survive
    if (!value.includes('"') && !value.includes("\\")) {
        return `"${value.replace(/\r/g, "\\r").replace(/\n/g, "\\n")}"`;
    }
    throw new ConfigurationError("Secret value cannot be written to a dotenv file");
}

export class DotenvSecretStore implements SecretStore {
    constructor(
        private readonly path: string,
        private readonly env: NodeJS.ProcessEnv = process.env,
    ) { }

    async get(key: string): Promise<string | undefined> {
        const stored = (await this.readParsed())[key];
        if (stored) return stored;
        const fromEnv = this.env[key];
        return fromEnv ? fromEnv : undefined;
    }

    async has(key: string): Promise<boolean> {
        return (await this.get(key)) !== undefined;
    }

    /**
     * Write one key, keeping every other line (comments included) as it was.
     * The value is mirrored into the process environment.
     */
    async set(key: string, value: string): Promise<void> {
        if (!KEY_PATTERN.test(key)) {
            throw new ConfigurationError(`Invalid secret key '${key}'`);
        }
        const line = `${key}=${formatDotenvValue(value)}`;
        const lines = (await this.readRaw()).split(/\r?\n/);
        while (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
        const matcher = new RegExp(`^\\s*(export\\s+)?${key}\\s*=`);

        let replaced = false;
        const next = lines.map((existing) => {
            if (matcher.test(existing)) {
                replaced = true;
                return line;
            }
            return existing;
        });
        if (!replaced) next.push(line);

        await writeFile(this.path, next.join("\n") + "\n", "utf8");
        this.env[key] = value;
    }

    private async readRaw(): Promise<string> {
        try {
            return await readFile(this.path, "utf8");
        } catch (err) {
            if (err instanceof Error && "code" in err && err.code === "ENOENT") return "";
            throw err;
        }
    }

    private async readParsed(): Promise<Record<string, string>> {
        return parse(await this.readRaw());
    }
}
