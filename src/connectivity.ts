import type { Logger } from "./logger.ts";

export interface ConnectivityCheck {
    isOnline(): Promise<boolean>;
    lastResult(): { online: boolean; checkedAt: number } | null;
}

export type ConnectivityCheckOptions = {
    url: string;
    timeoutMs?: number;
    fetchImpl?: typeof fetch;
    logger?: Logger;
    now?: () => number;
};

/**
 * Reachability check against a single URL. Any HTTP response means the network
 * path works, whatever the status; a timeout or socket error means it does not.
 */
export function createConnectivityCheck(options: ConnectivityCheckOptions): ConnectivityCheck {
    const timeoutMs = options.timeoutMs ?? 5_000;
    const fetchImpl = options.fetchImpl ?? fetch;
    const now = options.now ?? Date.now;
    let last: { online: boolean; checkedAt: number } | null = null;

    const isOnline = async () => {
        let online: boolean;
        try {
            await fetchImpl(options.url, {
                method: "HEAD",
                headers: { "cache-control": "no-cache" },
                signal: AbortSignal.timeout(timeoutMs),
            });
            online = true;
        } catch (err) {
            options.logger?.debug({ err, url: options.url }, "connectivity check failed");
            online = false;
        }
        if (last?.online !== online) {
            options.logger?.info({ online, url: options.url }, online ? "network reachable" : "network unreachable");
        }
        last = { online, checkedAt: now() };
        return online;
    };

    return {
        isOnline,
        lastResult: () => last,
    };
}
