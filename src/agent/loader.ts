import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { ConfigurationError } from "../errors/RuntimeError.js";
import { agentDefinitionSchema, type AgentDefinition } from "./definition.js";

const AGENT_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Read and validate `<dir>/<name>.json`.
 * @throws ConfigurationError on a missing file, bad JSON, or schema violations
 */
export async function loadAgentDefinition(dir: string, name: string): Promise<AgentDefinition> {
    if (!AGENT_NAME_PATTERN.test(name)) {
        throw new ConfigurationError(`Invalid agent name '${name}'`);
    }
    const path = join(dir, `${name}.json`);

    let raw: string;
    try {
        raw = await readFile(path, "utf8");
    } catch (err) {
        throw new ConfigurationError(`Agent definition not found: ${path}`, { cause: err });
    }

    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (err) {
        throw new ConfigurationError(`Agent definition ${path} is not valid JSON`, { cause: err });
    }

    const parsed = agentDefinitionSchema.safeParse(json);
    if (!parsed.success) {
        const detail = parsed.error.issues
            .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
            .join("; ");
        throw new ConfigurationError(`Invalid agent definition ${path}: ${detail}`);
    }
    return parsed.data;
}

/** Agent names available in `dir`, sorted */
export async function listAgentDefinitions(dir: string): Promise<string[]> {
    let entries: string[];
    try {
        entries = await readdir(dir);
    } catch (err) {
        if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
        throw err;
    }
    return entries
        .filter((file) => file.endsWith(".json"))
        .map((file) => file.slice(0, -".json".length))
        .filter((name) => AGENT_NAME_PATTERN.test(name))
        .sort();
}
