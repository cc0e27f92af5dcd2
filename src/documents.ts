import { promises as fs, constants as fsConstants } from "node:fs";
import path from "node:path";
import { CacheWriteError } from "./errors.ts";
import type { Logger } from "./logger.ts";
import type { EventMetadata, PosterFeed, PosterRecord } from "./types.ts";

export const POSTERS_DOCUMENT = "posters.json";
export const EVENT_DOCUMENT = "event.json";

/**
 * Writes JSON next to its destination and renames it into place, so a crash
 * mid-write leaves the previous document intact.
 *
 * @throws CacheWriteError
 */
export async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
    const tmpPath = `${filePath}.tmp`;
    try {
        await fs.mkdir(path.dirname(filePath), { recursive: true });
        await fs.writeFile(tmpPath, JSON.stringify(value, null, 2), "utf8");
        await fs.rename(tmpPath, filePath);
    } catch (err) {
        const cleanupErr = await fs.rm(tmpPath, { force: true }).then(
            () => null,
            (rmErr: unknown) => rmErr,
        );
        throw new CacheWriteError(filePath, {
            cause: cleanupErr ? new AggregateError([err, cleanupErr], "write and cleanup failed") : err,
        });
    }
}

/** `null` when the file is absent; rejects when it exists but is not JSON. */
export async function readJson(filePath: string): Promise<unknown> {
    try {
        await fs.access(filePath, fsConstants.R_OK);
    } catch {
        return null;
    }
    const raw = await fs.readFile(filePath, "utf8");
    return JSON.parse(raw);
}

type StoredPosters = {
    savedAt: number;
    displayTimeSeconds?: number;
    records: PosterRecord[];
};

export const isObject = (value: unknown): value is Record<string, unknown> =>
    typeof value === "object" && value !== null && !Array.isArray(value);

const isOptionalNumber = (value: unknown) => value === undefined || typeof value === "number";

const isRecord = (value: unknown): value is PosterRecord =>
    isObject(value) &&
    typeof value.id === "string" &&
    typeof value.remoteUrl === "string" &&
    typeof value.lastSeen === "number" &&
    isObject(value.metadata) &&
    (value.title === undefined || typeof value.title === "string") &&
    isOptionalNumber(value.startsAt) &&
    isOptionalNumber(value.endsAt);

const parseStoredPosters = (raw: unknown): PosterFeed | null => {
    if (!isObject(raw) || !Array.isArray(raw.records)) return null;
    const records = raw.records.filter(isRecord);
    const displayTimeSeconds =
        typeof raw.displayTimeSeconds === "number" && raw.displayTimeSeconds > 0 ? raw.displayTimeSeconds : undefined;
    return { records, displayTimeSeconds };
};

export interface MirrorDocuments {
    loadPosters(): Promise<PosterFeed | null>;
    savePosters(feed: PosterFeed, savedAt: number): Promise<void>;
    loadEvent(): Promise<EventMetadata | null>;
    saveEvent(event: EventMetadata): Promise<void>;
}

// Mirrors of the last good API responses, read back when the kiosk boots offline.
export function createMirrorDocuments(dir: string, logger?: Logger): MirrorDocuments {
    const postersPath = path.join(dir, POSTERS_DOCUMENT);
    const eventPath = path.join(dir, EVENT_DOCUMENT);

    const load = async (filePath: string): Promise<unknown> => {
        try {
            return await readJson(filePath);
        } catch (err) {
            logger?.warn({ err, path: filePath }, "ignoring unreadable mirror document");
            return null;
        }
    };

    return {
        async loadPosters() {
            const raw = await load(postersPath);
            if (raw === null) return null;
            const feed = parseStoredPosters(raw);
            if (!feed) {
                logger?.warn({ path: postersPath }, "ignoring poster mirror with unexpected shape");
            }
            return feed;
        },
        async savePosters(feed, savedAt) {
            const stored: StoredPosters = {
                savedAt,
                displayTimeSeconds: feed.displayTimeSeconds,
                records: feed.records,
            };
            await writeJsonAtomic(postersPath, stored);
        },
        async loadEvent() {
            const raw = await load(eventPath);
            if (!isObject(raw) || !("event" in raw)) return null;
            return raw.event;
        },
        async saveEvent(event) {
            await writeJsonAtomic(eventPath, { event });
        },
    };
}
