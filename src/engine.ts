import type { ApiClient } from "./api/client.ts";
import type { CacheStore } from "./cache.ts";
import type { ConnectivityCheck } from "./connectivity.ts";
import type { MirrorDocuments } from "./documents.ts";
import { CacheWriteError, DecodeError, errorMessage, type FetchError } from "./errors.ts";
import type { Logger } from "./logger.ts";
import { buildSnapshot, type SnapshotHandle } from "./snapshot.ts";
import type {
    CacheEntry,
    CycleReport,
    EventMetadata,
    PosterListSnapshot,
    PosterRecord,
    RefreshScheduler,
    SchedulerStatus,
} from "./types.ts";

type SchedulerOptions = {
    connectivity: ConnectivityCheck;
    api: ApiClient;
    cache: CacheStore;
    documents: MirrorDocuments;
    snapshots: SnapshotHandle;
    intervalMs: number;
    logger: Logger;
    now?: () => number;
    /** Run one cycle immediately instead of waiting for the first interval. */
    runOnStart?: boolean;
};

type DownloadOutcome = { entry: CacheEntry | null; downloaded: boolean };

const logFetchFailure = (logger: Logger, what: string, error: FetchError) => {
    const fields = { err: error, kind: error.kind, status: error.status };
    if (error.kind === "unauthorized") {
        logger.error(fields, `${what} rejected the poster token; check POSTER_TOKEN`);
    } else if (error.kind === "malformed") {
        logger.warn(fields, `${what} returned an unusable payload, keeping cached data`);
    } else {
        logger.warn(fields, `${what} unavailable, will retry next cycle`);
    }
};

const needsDownload = (record: PosterRecord, entry: CacheEntry | null) =>
    !entry || entry.sourceUrl !== record.remoteUrl;

/**
 * Warm start: rebuilds a snapshot from the mirrored poster list and whatever
 * the cache already holds, without touching the network.
 */
export async function warmStart(deps: {
    cache: CacheStore;
    documents: MirrorDocuments;
    snapshots: SnapshotHandle;
    logger: Logger;
    now?: () => number;
}): Promise<PosterListSnapshot | null> {
    const now = deps.now ?? Date.now;
    const feed = await deps.documents.loadPosters();
    if (!feed) {
        deps.logger.info("no mirrored poster list, waiting for the first refresh");
        return null;
    }
    const event = await deps.documents.loadEvent();
    const snapshot = buildSnapshot({
        version: 1,
        publishedAt: now(),
        source: "warm-start",
        records: feed.records,
        lookup: (id) => deps.cache.get(id),
        displayTimeSeconds: feed.displayTimeSeconds,
        event,
    });
    deps.snapshots.publish(snapshot);
    deps.logger.info({ posters: snapshot.posters.length, records: feed.records.length }, "warm start snapshot published");
    return snapshot;
}

export function startRefreshScheduler(options: SchedulerOptions): RefreshScheduler {
    const { connectivity, api, cache, documents, snapshots, logger } = options;
    const now = options.now ?? Date.now;
    const intervalMs = options.intervalMs;

    const inflightDownloads = new Map<string, Promise<DownloadOutcome>>();
    let inflightCycle: Promise<CycleReport> | null = null;
    let lastAttemptAt: number | null = null;
    let lastReport: CycleReport | null = null;
    let event: EventMetadata | null = snapshots.current()?.event ?? null;
    let timer: ReturnType<typeof setInterval> | null = null;

    // At most one download per poster id, however many callers ask.
    const download = (record: PosterRecord): Promise<DownloadOutcome> => {
        const pending = inflightDownloads.get(record.id);
        if (pending) return pending;

        const work = (async (): Promise<DownloadOutcome> => {
            const bytes = await api.downloadImage(record.remoteUrl);
            if (!bytes.ok) {
                logger.warn({ err: bytes.error, posterId: record.id, url: record.remoteUrl }, "poster download failed");
                return { entry: null, downloaded: false };
            }
            try {
                const entry = await cache.putIfAbsent(record, bytes.value);
                logger.info({ posterId: record.id, bytes: entry.byteSize }, "poster cached");
                return { entry, downloaded: true };
            } catch (err) {
                if (err instanceof DecodeError) {
                    logger.warn({ err, posterId: record.id }, "downloaded poster is not a readable image");
                    return { entry: null, downloaded: false };
                }
                throw err;
            }
        })().finally(() => {
            inflightDownloads.delete(record.id);
        });

        inflightDownloads.set(record.id, work);
        return work;
    };

    const cycle = async (): Promise<CycleReport> => {
        const startedAt = now();
        lastAttemptAt = startedAt;
        const finish = (report: Omit<CycleReport, "startedAt" | "finishedAt">): CycleReport => ({
            ...report,
            startedAt,
            finishedAt: now(),
        });

        const online = await connectivity.isOnline();
        if (!online) {
            logger.debug("offline, keeping current snapshot");
            return finish({ status: "offline" });
        }

        const feed = await api.fetchPosters();
        if (!feed.ok) {
            logFetchFailure(logger, "poster list", feed.error);
            return finish({ status: "fetch-failed", error: feed.error.message, errorKind: feed.error.kind });
        }

        const eventResult = await api.fetchEventMetadata();
        if (eventResult.ok) {
            event = eventResult.value;
        } else {
            logFetchFailure(logger, "event metadata", eventResult.error);
        }

        const { records, displayTimeSeconds } = feed.value;
        const eviction = cache.reconcile(records, snapshots.liveIds());

        let downloaded = 0;
        const failedDownloads: string[] = [];
        for (const record of records) {
            const current = cache.get(record.id);
            if (!needsDownload(record, current)) continue;
            const outcome = await download(record);
            if (outcome.downloaded) downloaded += 1;
            if (!outcome.entry) failedDownloads.push(record.id);
        }

        await cache.persist();
        await documents.savePosters(feed.value, startedAt);
        if (eventResult.ok) {
            await documents.saveEvent(eventResult.value);
        }

        const previous = snapshots.current();
        const snapshot = buildSnapshot({
            version: (previous?.version ?? 0) + 1,
            publishedAt: now(),
            source: "remote",
            records,
            lookup: (id) => cache.get(id),
            displayTimeSeconds,
            event,
        });
        snapshots.publish(snapshot);
        const flushed = cache.flushDeferred(snapshots.liveIds());
        if (flushed.length) {
            eviction.evicted.push(...flushed);
        }

        logger.info(
            {
                version: snapshot.version,
                posters: snapshot.posters.length,
                downloaded,
                failedDownloads: failedDownloads.length,
                evicted: eviction.evicted.length,
            },
            "poster snapshot published",
        );

        return finish({
            status: "published",
            version: snapshot.version,
            posters: snapshot.posters.length,
            downloaded,
            failedDownloads,
            eviction,
        });
    };

    // Nothing escapes a cycle: the display only ever sees the last good snapshot.
    const runCycle = (): Promise<CycleReport> => {
        if (inflightCycle) return inflightCycle;

        const startedAt = now();
        inflightCycle = cycle()
            .catch((err: unknown): CycleReport => {
                if (err instanceof CacheWriteError) {
                    logger.error({ err, path: err.path }, "cache write failed, previous snapshot kept");
                } else {
                    logger.error({ err }, "refresh cycle failed, previous snapshot kept");
                }
                return {
                    status: "error",
                    startedAt,
                    finishedAt: now(),
                    error: errorMessage(err),
                    errorKind: err instanceof Error ? err.name : "unknown",
                };
            })
            .then((report) => {
                lastReport = report;
                inflightCycle = null;
                return report;
            });

        return inflightCycle;
    };

    const ready = options.runOnStart === false ? Promise.resolve(null) : runCycle();

    timer = setInterval(() => {
        void runCycle();
    }, intervalMs);

    const stop = () => {
        if (timer) clearInterval(timer);
        timer = null;
    };

    const status = (): SchedulerStatus => ({
        lastAttemptAt,
        lastReport,
        running: inflightCycle !== null,
        intervalMs,
    });

    return { runCycle, status, stop, ready };
}
