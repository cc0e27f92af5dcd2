import { FetchError, fail, ok, type Result } from "../errors.ts";
import type { Logger } from "../logger.ts";
import type { PosterFeed, PosterRecord } from "../types.ts";

// Feed shapes seen in the wild:
//   { screens: [{ screen_number, minutes_per_record, records: [...] }] }
//   { status, message, data: [...] } | { eposters: [...] } | [...]

type Row = Record<string, unknown>;

export type NormalizeOptions = {
    deviceId: string;
    now: number;
    logger?: Logger;
};

const isRow = (value: unknown): value is Row => typeof value === "object" && value !== null && !Array.isArray(value);

const toText = (value: unknown): string | undefined => {
    if (typeof value === "string" && value.trim().length > 0) return value.trim();
    return undefined;
};

const toId = (value: unknown): string | undefined => {
    if (typeof value === "number" && Number.isFinite(value)) return String(value);
    return toText(value);
};

const toPositiveSeconds = (value: unknown): number | undefined => {
    const parsed = typeof value === "string" ? Number(value.trim()) : value;
    if (typeof parsed !== "number" || !Number.isFinite(parsed) || parsed <= 0) return undefined;
    return Math.max(1, Math.round(parsed));
};

const FEED_DATE = /^(\d{1,2})-(\d{1,2})-(\d{4}) (\d{1,2}):(\d{2}):(\d{2})$/;

/**
 * Parses the feed's `DD-MM-YYYY HH:MM:SS` timestamps, interpreted in the
 * kiosk's local time zone.
 */
export const parseFeedDate = (value: unknown): number | undefined => {
    const text = toText(value);
    if (!text) return undefined;
    const match = FEED_DATE.exec(text);
    if (!match) return undefined;
    const [day, month, year, hours, minutes, seconds] = match.slice(1).map(Number);
    if (
        day === undefined ||
        month === undefined ||
        year === undefined ||
        hours === undefined ||
        minutes === undefined ||
        seconds === undefined
    ) {
        return undefined;
    }
    const date = new Date(year, month - 1, day, hours, minutes, seconds);
    if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
        return undefined;
    }
    return date.getTime();
};

const toRecord = (row: Row, now: number): PosterRecord | null => {
    const id = toId(row.id);
    const remoteUrl = toText(row.eposter_file) ?? toText(row.file);
    if (!id || !remoteUrl) return null;
    return {
        id,
        remoteUrl,
        title: toText(row.poster_title) ?? toText(row.title),
        metadata: { ...row },
        lastSeen: now,
        startsAt: parseFeedDate(row.start_date_time),
        endsAt: parseFeedDate(row.end_date_time),
    };
};

const toRecords = (rows: unknown[], options: NormalizeOptions): PosterRecord[] => {
    const seen = new Set<string>();
    const records: PosterRecord[] = [];
    for (const row of rows) {
        const record = isRow(row) ? toRecord(row, options.now) : null;
        if (!record) {
            options.logger?.warn({ row }, "dropping poster row without id or image url");
            continue;
        }
        if (seen.has(record.id)) {
            options.logger?.warn({ posterId: record.id }, "dropping duplicate poster id");
            continue;
        }
        seen.add(record.id);
        records.push(record);
    }
    return records;
};

const fromScreens = (screens: unknown, options: NormalizeOptions): Result<PosterFeed, FetchError> => {
    if (!Array.isArray(screens)) {
        return fail(new FetchError("malformed", "screens is not a list"));
    }
    const screen = screens.find((item) => isRow(item) && toId(item.screen_number) === options.deviceId);
    // A feed that does not know this device says nothing about its posters.
    if (!isRow(screen)) {
        return fail(new FetchError("malformed", `no screen configured for device ${options.deviceId}`));
    }
    const rows = screen.records ?? [];
    if (!Array.isArray(rows)) {
        return fail(new FetchError("malformed", `records for screen ${options.deviceId} is not a list`));
    }
    return ok({
        records: toRecords(rows, options),
        displayTimeSeconds: toPositiveSeconds(screen.minutes_per_record),
    });
};

export function normalizePosterFeed(payload: unknown, options: NormalizeOptions): Result<PosterFeed, FetchError> {
    if (Array.isArray(payload)) {
        return ok({ records: toRecords(payload, options) });
    }
    if (!isRow(payload)) {
        return fail(new FetchError("malformed", "poster feed is not an object or list"));
    }
    if ("screens" in payload) {
        return fromScreens(payload.screens, options);
    }
    const rows = payload.data ?? payload.eposters;
    if (Array.isArray(rows)) {
        return ok({ records: toRecords(rows, options) });
    }
    return fail(new FetchError("malformed", "poster feed has no screens, data or eposters list"));
}
