import { existsSync } from "node:fs";
import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import type { ApiClient } from "../src/api/client.ts";
import { normalizePosterFeed } from "../src/api/payload.ts";
import { CacheStore } from "../src/cache.ts";
import type { ConnectivityCheck } from "../src/connectivity.ts";
import { createMirrorDocuments, type MirrorDocuments } from "../src/documents.ts";
import { startRefreshScheduler, warmStart } from "../src/engine.ts";
import { CacheWriteError, FetchError, fail, ok } from "../src/errors.ts";
import { createSnapshotHandle, type SnapshotHandle } from "../src/snapshot.ts";
import type { PosterRecord, RefreshScheduler } from "../src/types.ts";
import { makeTempDir, record, removeDir, silentLogger } from "./helpers.ts";

const ids = (snapshots: SnapshotHandle) => snapshots.current()?.posters.map((poster) => poster.record.id);

describe("refresh scheduler", () => {
    let dir: string;
    let online: boolean;
    let feed: PosterRecord[];
    let connectivity: ConnectivityCheck;
    let api: {
        fetchPosters: Mock<ApiClient["fetchPosters"]>;
        fetchEventMetadata: Mock<ApiClient["fetchEventMetadata"]>;
        downloadImage: Mock<ApiClient["downloadImage"]>;
    };
    let cache: CacheStore;
    let documents: MirrorDocuments;
    let snapshots: SnapshotHandle;
    let scheduler: RefreshScheduler | null;

    const start = (overrides: { documents?: MirrorDocuments } = {}) => {
        scheduler = startRefreshScheduler({
            connectivity,
            api,
            cache,
            documents: overrides.documents ?? documents,
            snapshots,
            intervalMs: 60_000,
            logger: silentLogger,
            now: () => 5_000,
            runOnStart: false,
        });
        return scheduler;
    };

    const imageContents = async () => {
        const imagesDir = path.join(dir, "images");
        const names = (await readdir(imagesDir)).sort();
        return Promise.all(names.map(async (name) => [name, await readFile(path.join(imagesDir, name), "utf8")]));
    };

    beforeEach(async () => {
        dir = await makeTempDir();
        online = true;
        feed = [record("A"), record("B"), record("C")];
        connectivity = { isOnline: vi.fn(async () => online), lastResult: () => null };
        api = {
            fetchPosters: vi.fn<ApiClient["fetchPosters"]>(async () => ok({ records: feed })),
            fetchEventMetadata: vi.fn<ApiClient["fetchEventMetadata"]>(async () => ok({ name: "Expo" })),
            downloadImage: vi.fn<ApiClient["downloadImage"]>(async (url) => ok(Buffer.from(`image at ${url}`))),
        };
        cache = new CacheStore({
            dir,
            inspect: async () => ({ width: 100, height: 200, orientation: "portrait" }),
            logger: silentLogger,
        });
        await cache.open();
        documents = createMirrorDocuments(dir, silentLogger);
        snapshots = createSnapshotHandle();
        scheduler = null;
    });

    afterEach(async () => {
        scheduler?.stop();
        await removeDir(dir);
    });

    it("downloads the feed and publishes a snapshot", async () => {
        const report = await start().runCycle();

        expect(report).toMatchObject({
            status: "published",
            version: 1,
            posters: 3,
            downloaded: 3,
            failedDownloads: [],
            startedAt: 5_000,
            finishedAt: 5_000,
        });
        expect(ids(snapshots)).toEqual(["A", "B", "C"]);
        expect(snapshots.current()?.source).toBe("remote");
        expect(snapshots.current()?.event).toEqual({ name: "Expo" });
        expect(existsSync(path.join(dir, "posters.json"))).toBe(true);
        expect(existsSync(path.join(dir, "manifest.json"))).toBe(true);
    });

    it("does not download again when nothing changed", async () => {
        const scheduler = start();
        await scheduler.runCycle();
        const before = await imageContents();

        const report = await scheduler.runCycle();

        expect(report).toMatchObject({ status: "published", version: 2, downloaded: 0 });
        expect(api.downloadImage).toHaveBeenCalledTimes(3);
        expect(await imageContents()).toEqual(before);
    });

    it("downloads again when a poster's image url changes", async () => {
        const scheduler = start();
        await scheduler.runCycle();
        feed = [record("A", { remoteUrl: "https://cdn.example/A-v2.png" }), record("B"), record("C")];

        const report = await scheduler.runCycle();

        expect(report.downloaded).toBe(1);
        expect(api.downloadImage).toHaveBeenLastCalledWith("https://cdn.example/A-v2.png");
        expect(snapshots.current()?.posters[0]?.entry.sourceUrl).toBe("https://cdn.example/A-v2.png");
    });

    it("leaves everything untouched while offline", async () => {
        const scheduler = start();
        await scheduler.runCycle();
        const previous = snapshots.current();
        online = false;

        const report = await scheduler.runCycle();

        expect(report.status).toBe("offline");
        expect(api.fetchPosters).toHaveBeenCalledTimes(1);
        expect(snapshots.current()).toBe(previous);
        expect(scheduler.status()).toMatchObject({ lastAttemptAt: 5_000, running: false, lastReport: report });
    });

    it("keeps the previous snapshot when the feed is malformed", async () => {
        const scheduler = start();
        await scheduler.runCycle();
        const previous = snapshots.current();
        api.fetchPosters.mockResolvedValueOnce(fail(new FetchError("malformed", "poster feed is not an object or list")));

        const report = await scheduler.runCycle();

        expect(report).toMatchObject({ status: "fetch-failed", errorKind: "malformed" });
        expect(snapshots.current()).toBe(previous);
        expect(ids(snapshots)).toEqual(["A", "B", "C"]);
    });

    it("keeps posters and files when the feed has no screen for this device", async () => {
        let screens = [
            {
                screen_number: "kiosk-1",
                records: [
                    { id: "A", eposter_file: "https://cdn.example/A.png" },
                    { id: "B", eposter_file: "https://cdn.example/B.png" },
                ],
            },
        ];
        api.fetchPosters.mockImplementation(async () => normalizePosterFeed({ screens }, { deviceId: "kiosk-1", now: 0 }));
        const scheduler = start();
        await scheduler.runCycle();
        const previous = snapshots.current();
        const files = await imageContents();
        screens = [{ screen_number: "kiosk-2", records: [] }];

        const first = await scheduler.runCycle();
        const second = await scheduler.runCycle();

        expect(first).toMatchObject({ status: "fetch-failed", errorKind: "malformed" });
        expect(second).toMatchObject({ status: "fetch-failed", errorKind: "malformed" });
        expect(snapshots.current()).toBe(previous);
        expect(ids(snapshots)).toEqual(["A", "B"]);
        expect(files).toHaveLength(2);
        expect(await imageContents()).toEqual(files);
    });

    it("removes a dropped poster once the new snapshot is published", async () => {
        const scheduler = start();
        await scheduler.runCycle();
        feed = [record("A"), record("B")];

        const report = await scheduler.runCycle();

        expect(report.eviction).toEqual({ evicted: ["C"], deferred: ["C"], grace: [], retained: ["A", "B"] });
        expect(ids(snapshots)).toEqual(["A", "B"]);
        expect(existsSync(path.join(dir, "images", "A.png"))).toBe(true);
        expect(existsSync(path.join(dir, "images", "B.png"))).toBe(true);
        expect(existsSync(path.join(dir, "images", "C.png"))).toBe(false);
    });

    it("publishes without the posters that failed to download", async () => {
        api.downloadImage.mockImplementation(async (url) =>
            url.endsWith("/B.png")
                ? fail(new FetchError("transient", "request failed (503)", { status: 503 }))
                : ok(Buffer.from(url)),
        );

        const report = await start().runCycle();

        expect(report.failedDownloads).toEqual(["B"]);
        expect(ids(snapshots)).toEqual(["A", "C"]);
    });

    it("keeps the last event metadata when the event endpoint fails", async () => {
        const scheduler = start();
        await scheduler.runCycle();
        api.fetchEventMetadata.mockResolvedValueOnce(fail(new FetchError("transient", "request failed (500)")));

        await scheduler.runCycle();

        expect(snapshots.current()?.version).toBe(2);
        expect(snapshots.current()?.event).toEqual({ name: "Expo" });
    });

    it("reports a cache write failure and keeps the previous snapshot", async () => {
        const failing: MirrorDocuments = {
            ...documents,
            savePosters: async () => {
                throw new CacheWriteError(path.join(dir, "posters.json"));
            },
        };
        const scheduler = start({ documents: failing });

        const report = await scheduler.runCycle();

        expect(report).toMatchObject({ status: "error", errorKind: "CacheWriteError" });
        expect(snapshots.current()).toBeNull();
    });

    it("shares one cycle between concurrent callers", async () => {
        const scheduler = start();

        const first = scheduler.runCycle();
        const second = scheduler.runCycle();

        expect(second).toBe(first);
        await first;
        expect(api.fetchPosters).toHaveBeenCalledTimes(1);
    });

    it("runs a cycle on start unless told not to", async () => {
        scheduler = startRefreshScheduler({
            connectivity,
            api,
            cache,
            documents,
            snapshots,
            intervalMs: 60_000,
            logger: silentLogger,
        });

        const report = await scheduler.ready;
        scheduler.stop();

        expect(report?.status).toBe("published");
        await expect(start().ready).resolves.toBeNull();
    });
});

describe("warm start", () => {
    let dir: string;

    beforeEach(async () => {
        dir = await makeTempDir();
    });

    afterEach(async () => {
        await removeDir(dir);
    });

    it("rebuilds a snapshot from the mirrors without the network", async () => {
        const cache = new CacheStore({
            dir,
            inspect: async () => ({ width: 100, height: 200, orientation: "portrait" }),
            logger: silentLogger,
        });
        await cache.open();
        await cache.putIfAbsent(record("A"), Buffer.from("alpha"));
        const documents = createMirrorDocuments(dir, silentLogger);
        await documents.savePosters({ records: [record("A"), record("B")], displayTimeSeconds: 6 }, 1);
        await documents.saveEvent({ name: "Expo" });
        const snapshots = createSnapshotHandle();

        const snapshot = await warmStart({ cache, documents, snapshots, logger: silentLogger, now: () => 9 });

        expect(snapshot).toBe(snapshots.current());
        expect(snapshot).toMatchObject({ version: 1, source: "warm-start", publishedAt: 9, displayTimeSeconds: 6 });
        expect(ids(snapshots)).toEqual(["A"]);
        expect(snapshot?.event).toEqual({ name: "Expo" });
    });

    it("publishes nothing on a first boot", async () => {
        const cache = new CacheStore({
            dir,
            inspect: async () => ({ width: 1, height: 1, orientation: "portrait" }),
            logger: silentLogger,
        });
        await cache.open();
        const snapshots = createSnapshotHandle();

        const snapshot = await warmStart({
            cache,
            documents: createMirrorDocuments(dir, silentLogger),
            snapshots,
            logger: silentLogger,
        });

        expect(snapshot).toBeNull();
        expect(snapshots.current()).toBeNull();
    });
});
