import type { IncomingMessage, ServerResponse } from "node:http";

const MAX_BODY_BYTES = 1_000_000;

export class PayloadTooLargeError extends Error {
    constructor() {
        super(`Request body exceeds ${MAX_BODY_BYTES} bytes`);
        this.name = "PayloadTooLargeError";
    }
}

/** JSON body of a request; an empty body parses as `{}` */
export function parseBody(req: IncomingMessage): Promise<unknown> {
    return new Promise((resolve, reject) => {
        const chunks: Buffer[] = [];
        let size = 0;
        req.on("data", (chunk: Buffer | string) => {
            const buf = Buffer.from(chunk);
            size += buf.length;
            if (size > MAX_BODY_BYTES) {
                reject(new PayloadTooLargeError());
                req.destroy();
                return;
            }
            chunks.push(buf);
        });
        req.on("end", () => {
            try {
                const body = Buffer.concat(chunks).toString("utf8");
                resolve(body ? JSON.parse(body) : {});
            } catch (err) {
                reject(err);
            }
        });
        req.on("error", reject);
    });
}

export function withCors(res: ServerResponse): void {
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type,x-api-key");
}

export function writeJson(
    res: ServerResponse,
    statusCode: number,
    payload: unknown,
): void {
    withCors(res);
    res.statusCode = statusCode;
    res.setHeader("Content-Type", "application/json");
    res.end(
        JSON.stringify(payload, (_key, value: unknown) =>
            typeof value === "bigint" ? value.toString() : value,
        ),
    );
}

export function writeText(res: ServerResponse, statusCode: number, body: string): void {
    withCors(res);
    res.statusCode = statusCode;
    res.setHeader("Content-Type", "text/plain; version=0.0.4");
    res.end(body);
}

export function getUrl(req: IncomingMessage, fallbackHost: string): URL {
    return new URL(req.url ?? "/", `http://${fallbackHost}`);
}
