import { existsSync } from "node:fs";
import { readdir, readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { CacheStore, fileNameFor, type GeometryInspector } from "../src/cache.ts";
import { DecodeError } from "../src/errors.ts";
import type { Geometry } from "../src/types.ts";
import { makeTempDir, record, removeDir, silentLogger } from "./helpers.ts";

const geometry: Geometry = { width: 100, height: 200, orientation: "portrait" };

describe("fileNameFor", () => {
    it("keeps safe ids and the url extension", () => {
        expect(fileNameFor({ id: "A", remoteUrl: "https://cdn.example/posters/a.PNG?v=2" })).toBe("A.png");
        expect(fileNameFor({ id: "7", remoteUrl: "https://cdn.example/download" })).toBe("7.img");
    });

    it("adds a hash suffix when the id had to be rewritten", () => {
        expect(fileNameFor({ id: "a/b c", remoteUrl: "https://cdn.example/p.jpg" })).toMatch(/^a_b_c-[0-9a-f]{8}\.jpg$/);
    });
});

describe("CacheStore", () => {
    let dir: string;
    let inspect: Mock<GeometryInspector>;
    let store: CacheStore;

    const open = async (graceCycles = 0) => {
        const next = new CacheStore({ dir, inspect, graceCycles, logger: silentLogger, now: () => 1_000 });
        await next.open();
        return next;
    };

    const fill = async (...ids: string[]) => {
        for (const id of ids) {
            await store.putIfAbsent(record(id), Buffer.from(`bytes-${id}`));
        }
    };

    const imagePath = (id: string) => path.join(dir, "images", `${id}.png`);

    beforeEach(async () => {
        dir = await makeTempDir();
        inspect = vi.fn<GeometryInspector>(async () => geometry);
        store = await open();
    });

    afterEach(async () => {
        await removeDir(dir);
    });

    it("writes a downloaded poster and indexes it", async () => {
        const entry = await store.putIfAbsent(record("A"), Buffer.from("alpha"));

        expect(entry).toMatchObject({
            id: "A",
            localPath: imagePath("A"),
            byteSize: 5,
            fetchedAt: 1_000,
            geometry,
            sourceUrl: "https://cdn.example/A.png",
        });
        expect(await readFile(imagePath("A"), "utf8")).toBe("alpha");
        expect(store.get("A")).toEqual(entry);
        expect(await readdir(path.join(dir, "images"))).toEqual(["A.png"]);
    });

    it("does not rewrite identical content", async () => {
        const first = await store.putIfAbsent(record("A"), Buffer.from("alpha"));
        const second = await store.putIfAbsent(record("A"), Buffer.from("alpha"));

        expect(second).toBe(first);
        expect(inspect).toHaveBeenCalledTimes(1);
    });

    it("replaces content that changed", async () => {
        const first = await store.putIfAbsent(record("A"), Buffer.from("alpha"));
        const second = await store.putIfAbsent(record("A"), Buffer.from("alpha-2"));

        expect(second.digest).not.toBe(first.digest);
        expect(await readFile(imagePath("A"), "utf8")).toBe("alpha-2");
    });

    it("refuses bytes that are not an image and writes nothing", async () => {
        inspect.mockRejectedValueOnce(new DecodeError("unreadable image"));

        await expect(store.putIfAbsent(record("A"), Buffer.from("junk"))).rejects.toBeInstanceOf(DecodeError);
        expect(store.has("A")).toBe(false);
        expect(await readdir(path.join(dir, "images"))).toEqual([]);
    });

    it("removes posters the feed dropped and keeps the rest", async () => {
        await fill("A", "B", "C");

        const report = store.reconcile([record("A"), record("B")], new Set());

        expect(report).toEqual({ evicted: ["C"], deferred: [], grace: [], retained: ["A", "B"] });
        expect(existsSync(imagePath("A"))).toBe(true);
        expect(existsSync(imagePath("B"))).toBe(true);
        expect(existsSync(imagePath("C"))).toBe(false);
        expect(store.get("C")).toBeNull();
    });

    it("never deletes a file the published snapshot still shows", async () => {
        await fill("A", "B", "C");
        const live = new Set(["A", "B", "C"]);

        const report = store.reconcile([record("A"), record("B")], live);

        expect(report.deferred).toEqual(["C"]);
        expect(report.evicted).toEqual([]);
        expect(existsSync(imagePath("C"))).toBe(true);
        expect(store.get("C")).toBeNull();
        expect((await store.readBytes("C"))?.toString()).toBe("bytes-C");

        expect(store.flushDeferred(live)).toEqual([]);
        expect(existsSync(imagePath("C"))).toBe(true);

        expect(store.flushDeferred(new Set(["A", "B"]))).toEqual(["C"]);
        expect(existsSync(imagePath("C"))).toBe(false);
        expect(store.pendingEvictions()).toEqual([]);
    });

    it("keeps missing posters for the configured number of refreshes", async () => {
        store = await open(1);
        await fill("A", "B");

        expect(store.reconcile([record("A")], new Set()).grace).toEqual(["B"]);
        expect(existsSync(imagePath("B"))).toBe(true);

        // Reappearing resets the count.
        expect(store.reconcile([record("A"), record("B")], new Set()).retained).toEqual(["A", "B"]);
        expect(store.reconcile([record("A")], new Set()).grace).toEqual(["B"]);

        expect(store.reconcile([record("A")], new Set()).evicted).toEqual(["B"]);
        expect(existsSync(imagePath("B"))).toBe(false);
    });

    it("survives a restart through the manifest", async () => {
        const entry = await store.putIfAbsent(record("A"), Buffer.from("alpha"));
        await store.persist();

        const reopened = await open();

        expect(reopened.get("A")).toEqual(entry);
        expect((await reopened.readBytes("A"))?.toString()).toBe("alpha");
    });

    it("cleans up temp files, strays and entries without a file on open", async () => {
        await fill("A", "B");
        await store.persist();
        await rm(imagePath("B"));
        await writeFile(path.join(dir, "images", "A.png.tmp"), "partial");
        await writeFile(path.join(dir, "images", "stray.jpg"), "old");

        const reopened = await open();

        expect(reopened.has("A")).toBe(true);
        expect(reopened.has("B")).toBe(false);
        expect(await readdir(path.join(dir, "images"))).toEqual(["A.png"]);
    });
});
