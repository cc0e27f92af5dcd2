import { FetchError, errorMessage, fail, ok, type Result } from "../errors.ts";
import type { Logger } from "../logger.ts";
import type { EventMetadata, PosterFeed } from "../types.ts";
import { normalizePosterFeed } from "./payload.ts";

export interface ApiClient {
    fetchPosters(): Promise<Result<PosterFeed, FetchError>>;
    fetchEventMetadata(): Promise<Result<EventMetadata, FetchError>>;
    downloadImage(url: string): Promise<Result<Buffer, FetchError>>;
}

export type ApiClientOptions = {
    baseUrl: string;
    token: string;
    postersPath: string;
    eventPath: string;
    deviceId: string;
    tokenParam?: string;
    requestTimeoutMs?: number;
    fetchImpl?: typeof fetch;
    logger?: Logger;
    now?: () => number;
};

const classifyStatus = (status: number, url: string): FetchError => {
    if (status === 401 || status === 403) {
        return new FetchError("unauthorized", `token rejected (${status}) by ${url}`, { status });
    }
    return new FetchError("transient", `request failed (${status}) for ${url}`, { status });
};

const normalizedBaseUrl = (baseUrl: string): string => {
    if (!baseUrl) {
        throw new Error("baseUrl is required for ApiClient");
    }
    return baseUrl.endsWith("/") ? baseUrl.slice(0, -1) : baseUrl;
};

/**
 * One request per call and no retries; the refresh scheduler owns the cadence.
 * Every failure comes back as a value, never as a rejection.
 */
export function createApiClient(options: ApiClientOptions): ApiClient {
    const baseUrl = normalizedBaseUrl(options.baseUrl);
    const fetchImpl = options.fetchImpl ?? fetch;
    const timeoutMs = options.requestTimeoutMs ?? 10_000;
    const now = options.now ?? Date.now;

    const buildUrl = (path: string) => {
        const url = new URL(`${baseUrl}${path.startsWith("/") ? path : `/${path}`}`);
        if (options.tokenParam) {
            url.searchParams.set(options.tokenParam, options.token);
        }
        return url.toString();
    };

    // Image URLs may point at another host, so only API calls carry the token.
    const send = async (url: string, headers: Record<string, string>): Promise<Result<Response, FetchError>> => {
        try {
            const response = await fetchImpl(url, {
                method: "GET",
                headers: { "cache-control": "no-cache", ...headers },
                signal: AbortSignal.timeout(timeoutMs),
            });
            if (!response.ok) {
                return fail(classifyStatus(response.status, redact(url)));
            }
            return ok(response);
        } catch (err) {
            return fail(new FetchError("transient", `request to ${redact(url)} failed: ${errorMessage(err)}`, { cause: err }));
        }
    };

    // The query string carries the token form-encoded.
    const secrets = [
        ...new Set([
            new URLSearchParams([["", options.token]]).toString().slice(1),
            encodeURIComponent(options.token),
            options.token,
        ]),
    ].filter((secret) => secret !== "");
    const redact = (url: string) =>
        options.tokenParam ? secrets.reduce((text, secret) => text.split(secret).join("[HIDDEN]"), url) : url;

    const getJson = async (path: string): Promise<Result<unknown, FetchError>> => {
        const url = buildUrl(path);
        const sent = await send(url, {
            accept: "application/json",
            authorization: `Bearer ${options.token}`,
        });
        if (!sent.ok) return sent;
        try {
            return ok(await sent.value.json());
        } catch (err) {
            return fail(new FetchError("malformed", `unparsable JSON from ${redact(url)}`, { cause: err }));
        }
    };

    return {
        async fetchPosters() {
            const body = await getJson(options.postersPath);
            if (!body.ok) return body;
            return normalizePosterFeed(body.value, {
                deviceId: options.deviceId,
                now: now(),
                logger: options.logger,
            });
        },
        async fetchEventMetadata() {
            return getJson(options.eventPath);
        },
        async downloadImage(url: string) {
            const sent = await send(url, { accept: "image/*" });
            if (!sent.ok) return sent;
            try {
                const bytes = Buffer.from(await sent.value.arrayBuffer());
                if (bytes.length === 0) {
                    return fail(new FetchError("malformed", `empty image body from ${url}`));
                }
                return ok(bytes);
            } catch (err) {
                return fail(new FetchError("transient", `image download from ${url} interrupted`, { cause: err }));
            }
        },
    };
}
