export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
    debug: (...args: unknown[]) => void;
    info: (...args: unknown[]) => void;
    warn: (...args: unknown[]) => void;
    error: (...args: unknown[]) => void;
    /** Logger tagging every line with `scope` (e.g. "registry", "provider:openai") */
    child: (scope: string) => Logger;
}

export interface LoggerOptions {
    level?: string;
    /** Output JSON lines instead of human-readable text. Default: LOG_FORMAT=json */
    json?: boolean;
    scope?: string;
}

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

function parseLevel(raw: string | undefined): LogLevel {
    const value = raw?.toLowerCase();
    return value === "debug" || value === "info" || value === "warn"
        || value === "error" || value === "silent"
        ? value
        : "info";
}

export function createLogger(levelOrOpts: string | LoggerOptions): Logger {
    const opts: LoggerOptions = typeof levelOrOpts === "string"
        ? { level: levelOrOpts }
        : levelOrOpts;
    const level = parseLevel(opts.level);
    const json = opts.json ?? (process.env.LOG_FORMAT === "json");
    const enabled = (target: LogLevel) => LEVEL_RANK[target] >= LEVEL_RANK[level];

    const write = json ? emitJson : emitText;
    const make = (scope: string | undefined): Logger => ({
        debug: (...args) => {
            if (enabled("debug")) write("debug", scope, args);
        },
        info: (...args) => {
            if (enabled("info")) write("info", scope, args);
        },
        warn: (...args) => {
            if (enabled("warn")) write("warn", scope, args);
        },
        error: (...args) => {
            if (enabled("error")) write("error", scope, args);
        },
        child: (childScope) => make(scope ? `${scope}:${childScope}` : childScope),
    });

    return make(opts.scope);
}

function emitText(level: Exclude<LogLevel, "silent">, scope: string | undefined, args: unknown[]): void {
    const prefix = `[${new Date().toISOString()}] [${level.toUpperCase()}]${scope ? ` [${scope}]` : ""}`;
    switch (level) {
        case "error":
            console.error(prefix, ...args);
            break;
        case "warn":
            console.warn(prefix, ...args);
            break;
        default:
            console.log(prefix, ...args);
    }
}

/** JSON structured logger: one JSON object per line */
function emitJson(level: Exclude<LogLevel, "silent">, scope: string | undefined, args: unknown[]): void {
    const entry: Record<string, unknown> = {
        ts: new Date().toISOString(),
        level,
        msg: args.map((a) =>
            typeof a === "string" ? a : a instanceof Error ? a.message : JSON.stringify(a)
        ).join(" "),
    };
    if (scope) entry.scope = scope;

    const line = JSON.stringify(entry);
    if (level === "error") {
        process.stderr.write(line + "\n");
    } else {
        process.stdout.write(line + "\n");
    }
}
