import { existsSync, readFileSync } from "node:fs";
import path from "node:path";
import { FatalConfigError, errorMessage } from "./errors.ts";
import type { Geometry, Orientation } from "./types.ts";

export type AppConfig = Readonly<{
    api: Readonly<{
        token: string;
        baseUrl: string;
        postersPath: string;
        eventPath: string;
        tokenParam?: string;
        requestTimeoutMs: number;
    }>;
    display: Readonly<{
        displayTimeSeconds: number;
        deviceId: string;
        geometry: Readonly<Geometry>;
        fps: number;
        pinnedTimeoutSeconds: number;
        scheduleWindow: boolean;
    }>;
    cache: Readonly<{
        dir: string;
        refreshSeconds: number;
        graceCycles: number;
    }>;
    connectivity: Readonly<{
        url: string;
        timeoutMs: number;
    }>;
    server: Readonly<{
        host: string;
        port: number;
    }>;
    logLevel: string;
}>;

export type LoadConfigOptions = {
    env?: NodeJS.ProcessEnv;
    configPath?: string;
    cwd?: string;
};

const DEFAULT_CONFIG_FILE = "config.json";
const DEFAULT_BASE_URL = "https://posterbridge.example.com";

type Section = Record<string, unknown>;

const isRecord = (value: unknown): value is Section =>
    typeof value === "object" && value !== null && !Array.isArray(value);

const section = (file: Section, name: string): Section => {
    const value = file[name];
    return isRecord(value) ? value : {};
};

const readString = (envValue: string | undefined, fileValue: unknown, field: string): string | undefined => {
    if (envValue !== undefined && envValue.trim() !== "") return envValue.trim();
    if (fileValue === undefined || fileValue === null) return undefined;
    if (typeof fileValue === "string") return fileValue.trim() || undefined;
    if (typeof fileValue === "number" || typeof fileValue === "boolean") return String(fileValue);
    throw new FatalConfigError(`${field} must be a string`);
};

const readInteger = (
    envValue: string | undefined,
    fileValue: unknown,
    field: string,
    fallback: number,
    min: number,
): number => {
    const raw = readString(envValue, fileValue, field);
    if (raw === undefined) return fallback;
    const parsed = Number(raw);
    if (!Number.isInteger(parsed) || parsed < min) {
        const expected = min > 0 ? "a positive integer" : "a non-negative integer";
        throw new FatalConfigError(`${field} must be ${expected} (got "${raw}")`);
    }
    return parsed;
};

const readBoolean = (envValue: string | undefined, fileValue: unknown, field: string, fallback: boolean): boolean => {
    const raw = readString(envValue, fileValue, field);
    if (raw === undefined) return fallback;
    const normalized = raw.toLowerCase();
    if (["true", "1", "yes", "on"].includes(normalized)) return true;
    if (["false", "0", "no", "off"].includes(normalized)) return false;
    throw new FatalConfigError(`${field} must be a boolean (got "${raw}")`);
};

const readOrientation = (raw: string | undefined, width: number, height: number): Orientation => {
    if (raw === undefined) return height >= width ? "portrait" : "landscape";
    const normalized = raw.toLowerCase();
    if (normalized === "portrait" || normalized === "landscape") return normalized;
    throw new FatalConfigError(`display.orientation must be "portrait" or "landscape" (got "${raw}")`);
};

const readConfigFile = (filePath: string, explicit: boolean): Section => {
    if (!existsSync(filePath)) {
        if (explicit) {
            throw new FatalConfigError(`config file not found: ${filePath}`);
        }
        return {};
    }
    let raw: string;
    try {
        raw = readFileSync(filePath, "utf8");
    } catch (err) {
        throw new FatalConfigError(`config file unreadable: ${filePath}: ${errorMessage(err)}`, { cause: err });
    }
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (err) {
        throw new FatalConfigError(`config file is not valid JSON: ${filePath}`, { cause: err });
    }
    if (!isRecord(parsed)) {
        throw new FatalConfigError(`config file must contain a JSON object: ${filePath}`);
    }
    return parsed;
};

/**
 * Builds the immutable configuration. Precedence per field: environment, then
 * the JSON config file, then the built-in default.
 *
 * @throws FatalConfigError on a missing token, an unreadable file or an invalid value.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
    const env = options.env ?? process.env;
    const cwd = options.cwd ?? process.cwd();
    const explicitPath = options.configPath ?? env.CONFIG_FILE;
    const filePath = path.resolve(cwd, explicitPath ?? DEFAULT_CONFIG_FILE);
    const file = readConfigFile(filePath, explicitPath !== undefined);

    const api = section(file, "api");
    const display = section(file, "display");
    const cache = section(file, "cache");
    const connectivity = section(file, "connectivity");
    const server = section(file, "server");

    const token = readString(env.POSTER_TOKEN, api.poster_token, "api.poster_token");
    if (!token) {
        throw new FatalConfigError("poster token is required (set POSTER_TOKEN or api.poster_token)");
    }

    const baseUrl = readString(env.API_BASE_URL, api.base_url, "api.base_url") ?? DEFAULT_BASE_URL;
    const width = readInteger(env.DISPLAY_WIDTH, display.width, "display.width", 1080, 1);
    const height = readInteger(env.DISPLAY_HEIGHT, display.height, "display.height", 1920, 1);
    const orientation = readOrientation(
        readString(env.DISPLAY_ORIENTATION, display.orientation, "display.orientation"),
        width,
        height,
    );

    const config: AppConfig = {
        api: {
            token,
            baseUrl,
            postersPath:
                readString(env.API_POSTERS_PATH, api.posters_path, "api.posters_path") ?? "/api/v1/eposter-list",
            eventPath: readString(env.API_EVENT_PATH, api.event_path, "api.event_path") ?? "/api/v1/event",
            tokenParam: readString(env.API_TOKEN_PARAM, api.token_param, "api.token_param"),
            requestTimeoutMs: readInteger(
                env.REQUEST_TIMEOUT_MS,
                api.request_timeout_ms,
                "api.request_timeout_ms",
                10_000,
                1,
            ),
        },
        display: {
            displayTimeSeconds: readInteger(env.DISPLAY_TIME, display.display_time, "display.display_time", 5, 1),
            deviceId: readString(env.DEVICE_ID, display.device_id, "display.device_id") ?? "default_device",
            geometry: { width, height, orientation },
            fps: readInteger(env.DISPLAY_FPS, display.fps, "display.fps", 10, 1),
            pinnedTimeoutSeconds: readInteger(
                env.PINNED_TIMEOUT,
                display.pinned_timeout,
                "display.pinned_timeout",
                0,
                0,
            ),
            scheduleWindow: readBoolean(
                env.SCHEDULE_WINDOW,
                display.schedule_window,
                "display.schedule_window",
                false,
            ),
        },
        cache: {
            dir: path.resolve(cwd, readString(env.CACHE_DIR, cache.dir, "cache.dir") ?? "poster_cache"),
            refreshSeconds: readInteger(env.CACHE_REFRESH, cache.refresh, "cache.refresh", 60, 1),
            graceCycles: readInteger(env.CACHE_GRACE_CYCLES, cache.grace_cycles, "cache.grace_cycles", 0, 0),
        },
        connectivity: {
            url: readString(env.CONNECTIVITY_URL, connectivity.url, "connectivity.url") ?? baseUrl,
            timeoutMs: readInteger(
                env.CONNECTIVITY_TIMEOUT_MS,
                connectivity.timeout_ms,
                "connectivity.timeout_ms",
                5_000,
                1,
            ),
        },
        server: {
            host: readString(env.HOST, server.host, "server.host") ?? "127.0.0.1",
            port: readInteger(env.PORT, server.port, "server.port", 8080, 1),
        },
        logLevel: readString(env.LOG_LEVEL, file.log_level, "log_level") ?? "info",
    };

    return deepFreeze(config);
}

const deepFreeze = <T>(value: T): T => {
    if (typeof value === "object" && value !== null) {
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
        Object.freeze(value);
    }
    return value;
};

export const redactConfig = (config: AppConfig) => ({
    ...config,
    api: { ...config.api, token: "[HIDDEN]" },
});
