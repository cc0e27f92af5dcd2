import { promises as fs, rmSync } from "node:fs";
import path from "node:path";
import { createHash } from "node:crypto";
import { CacheWriteError } from "./errors.ts";
import { isObject, readJson, writeJsonAtomic } from "./documents.ts";
import type { Logger } from "./logger.ts";
import type { CacheEntry, EvictionReport, Geometry, PosterRecord } from "./types.ts";

export const IMAGES_DIR = "images";
export const MANIFEST_FILE = "manifest.json";

const MANIFEST_VERSION = 1;
const TMP_SUFFIX = ".tmp";

/** Reads width/height/orientation from image bytes; rejects with DecodeError. */
export type GeometryInspector = (bytes: Buffer) => Promise<Geometry>;

export type CacheStoreOptions = {
    dir: string;
    inspect: GeometryInspector;
    /** Consecutive refreshes an id may be missing from the feed before eviction. */
    graceCycles?: number;
    logger?: Logger;
    now?: () => number;
};

type Manifest = {
    version: number;
    entries: CacheEntry[];
    misses: Record<string, number>;
};

const digestOf = (bytes: Buffer) => createHash("sha256").update(bytes).digest("hex");

const sanitize = (value: string): string => value.replace(/[^a-zA-Z0-9._-]+/g, "_").slice(0, 120);

const extensionOf = (url: string): string => {
    let pathname = url;
    try {
        pathname = new URL(url).pathname;
    } catch {
        pathname = url.split("?")[0] ?? url;
    }
    const ext = path.extname(pathname).toLowerCase();
    return /^\.[a-z0-9]{1,5}$/.test(ext) ? ext : ".img";
};

export const fileNameFor = (record: Pick<PosterRecord, "id" | "remoteUrl">): string => {
    const safe = sanitize(record.id);
    const base = safe === record.id ? safe : `${safe}-${createHash("sha1").update(record.id).digest("hex").slice(0, 8)}`;
    return `${base}${extensionOf(record.remoteUrl)}`;
};

const isGeometry = (value: unknown): value is Geometry =>
    isObject(value) &&
    typeof value.width === "number" &&
    typeof value.height === "number" &&
    (value.orientation === "portrait" || value.orientation === "landscape");

const isCacheEntry = (value: unknown): value is CacheEntry =>
    isObject(value) &&
    typeof value.id === "string" &&
    typeof value.localPath === "string" &&
    typeof value.byteSize === "number" &&
    typeof value.fetchedAt === "number" &&
    typeof value.sourceUrl === "string" &&
    typeof value.digest === "string" &&
    isGeometry(value.geometry);

const parseMisses = (value: unknown): Record<string, number> => {
    const misses: Record<string, number> = {};
    if (!isObject(value)) return misses;
    for (const [id, count] of Object.entries(value)) {
        if (typeof count === "number" && Number.isInteger(count) && count > 0) misses[id] = count;
    }
    return misses;
};

/**
 * Poster images on disk plus an index of what they are.
 *
 * The index is an immutable map replaced on every change, so `get` and
 * `readBytes` never observe a half-applied write. Only the refresh scheduler
 * mutates the store.
 */
export class CacheStore {
    readonly dir: string;
    readonly imagesDir: string;
    private readonly manifestPath: string;
    private readonly inspect: GeometryInspector;
    private readonly graceCycles: number;
    private readonly logger?: Logger;
    private readonly now: () => number;

    private index: ReadonlyMap<string, CacheEntry> = new Map();
    private readonly misses = new Map<string, number>();
    // Evicted while still referenced by the published snapshot; deleted by flushDeferred.
    private readonly deferred = new Map<string, CacheEntry>();
    private dirty = false;

    constructor(options: CacheStoreOptions) {
        this.dir = options.dir;
        this.imagesDir = path.join(options.dir, IMAGES_DIR);
        this.manifestPath = path.join(options.dir, MANIFEST_FILE);
        this.inspect = options.inspect;
        this.graceCycles = Math.max(0, Math.floor(options.graceCycles ?? 0));
        this.logger = options.logger;
        this.now = options.now ?? Date.now;
    }

    /**
     * Loads the manifest and makes the directory agree with it: entries whose
     * file is gone are dropped, temp files and unknown files are deleted.
     */
    async open(): Promise<void> {
        try {
            await fs.mkdir(this.imagesDir, { recursive: true });
        } catch (err) {
            throw new CacheWriteError(this.imagesDir, { cause: err });
        }

        const manifest = await this.loadManifest();
        const next = new Map<string, CacheEntry>();
        for (const entry of manifest.entries) {
            const exists = await fs
                .stat(entry.localPath)
                .then((stat) => stat.isFile())
                .catch(() => false);
            if (!exists) {
                this.logger?.warn({ posterId: entry.id, path: entry.localPath }, "cached file missing, dropping entry");
                this.dirty = true;
                continue;
            }
            next.set(entry.id, entry);
        }
        this.index = next;
        for (const [id, count] of Object.entries(manifest.misses)) {
            if (next.has(id) && Number.isInteger(count) && count > 0) this.misses.set(id, count);
        }

        const known = new Set(Array.from(next.values(), (entry) => path.basename(entry.localPath)));
        const names = await fs.readdir(this.imagesDir);
        for (const name of names) {
            if (name.startsWith(".")) continue;
            if (known.has(name) && !name.endsWith(TMP_SUFFIX)) continue;
            const target = path.join(this.imagesDir, name);
            const stat = await fs.lstat(target);
            if (!stat.isFile()) continue;
            await fs.rm(target, { force: true });
            this.logger?.info({ file: name }, "removed stray cache file");
        }

        this.logger?.info({ entries: next.size, dir: this.dir }, "cache opened");
    }

    get(id: string): CacheEntry | null {
        return this.index.get(id) ?? null;
    }

    has(id: string): boolean {
        return this.index.has(id);
    }

    entries(): CacheEntry[] {
        return Array.from(this.index.values());
    }

    /** Image bytes for a cached or deferred poster; `null` when neither exists. */
    async readBytes(id: string): Promise<Buffer | null> {
        const entry = this.index.get(id) ?? this.deferred.get(id);
        if (!entry) return null;
        try {
            return await fs.readFile(entry.localPath);
        } catch (err) {
            this.logger?.warn({ err, posterId: id }, "cached image unreadable");
            return null;
        }
    }

    /**
     * Registers downloaded bytes for a record. Content identical to what is
     * already cached for the id is not rewritten.
     *
     * @throws DecodeError when the bytes are not an image
     * @throws CacheWriteError when the file cannot be written
     */
    async putIfAbsent(record: PosterRecord, bytes: Buffer): Promise<CacheEntry> {
        const digest = digestOf(bytes);
        const existing = this.index.get(record.id) ?? this.deferred.get(record.id);
        if (existing && existing.digest === digest) {
            const entry = existing.sourceUrl === record.remoteUrl ? existing : { ...existing, sourceUrl: record.remoteUrl };
            if (entry !== existing || !this.index.has(record.id)) {
                this.deferred.delete(record.id);
                this.replace(record.id, entry);
            }
            return entry;
        }

        const geometry = await this.inspect(bytes);
        const localPath = path.join(this.imagesDir, fileNameFor(record));
        const tmpPath = `${localPath}${TMP_SUFFIX}`;
        try {
            await fs.mkdir(this.imagesDir, { recursive: true });
            await fs.writeFile(tmpPath, bytes);
            await fs.rename(tmpPath, localPath);
        } catch (err) {
            const cleanupErr = await fs.rm(tmpPath, { force: true }).then(
                () => null,
                (rmErr: unknown) => rmErr,
            );
            if (cleanupErr) {
                this.logger?.warn({ err: cleanupErr, path: tmpPath }, "temp file cleanup failed");
            }
            throw new CacheWriteError(localPath, { cause: err });
        }

        this.deferred.delete(record.id);
        if (existing && existing.localPath !== localPath) {
            this.deleteFile(existing.id, existing.localPath);
        }

        const entry: CacheEntry = {
            id: record.id,
            localPath,
            byteSize: bytes.length,
            fetchedAt: this.now(),
            geometry,
            sourceUrl: record.remoteUrl,
            digest,
        };
        this.misses.delete(record.id);
        this.replace(record.id, entry);
        return entry;
    }

    /**
     * Evicts cached posters missing from `latest` for more than the grace
     * period. Synchronous and download-free. An evicted id that the published
     * snapshot still shows leaves the index now, but its file stays until
     * `flushDeferred` runs against a snapshot without it.
     */
    reconcile(latest: readonly Pick<PosterRecord, "id">[], liveIds: ReadonlySet<string>): EvictionReport {
        const latestIds = new Set(latest.map((record) => record.id));
        const report: EvictionReport = { evicted: [], deferred: [], grace: [], retained: [] };
        let next: Map<string, CacheEntry> | null = null;

        for (const [id, entry] of this.index) {
            if (latestIds.has(id)) {
                if (this.misses.delete(id)) this.dirty = true;
                report.retained.push(id);
                continue;
            }

            const missed = (this.misses.get(id) ?? 0) + 1;
            this.dirty = true;
            if (missed <= this.graceCycles) {
                this.misses.set(id, missed);
                report.grace.push(id);
                continue;
            }

            this.misses.delete(id);
            next ??= new Map(this.index);
            next.delete(id);
            if (liveIds.has(id)) {
                this.deferred.set(id, entry);
                report.deferred.push(id);
            } else {
                this.deleteFile(id, entry.localPath);
                report.evicted.push(id);
            }
        }

        if (next) this.index = next;
        if (report.evicted.length || report.deferred.length) {
            this.logger?.info(report, "cache reconciled");
        }
        return report;
    }

    /** Deletes deferred files the now-published snapshot no longer references. */
    flushDeferred(liveIds: ReadonlySet<string>): string[] {
        const removed: string[] = [];
        for (const [id, entry] of this.deferred) {
            if (liveIds.has(id)) continue;
            if (this.deleteFile(id, entry.localPath)) {
                this.deferred.delete(id);
                removed.push(id);
            }
        }
        return removed;
    }

    pendingEvictions(): string[] {
        return Array.from(this.deferred.keys());
    }

    /** @throws CacheWriteError */
    async persist(): Promise<void> {
        if (!this.dirty) return;
        const manifest: Manifest = {
            version: MANIFEST_VERSION,
            entries: this.entries(),
            misses: Object.fromEntries(this.misses),
        };
        await writeJsonAtomic(this.manifestPath, manifest);
        this.dirty = false;
    }

    private replace(id: string, entry: CacheEntry) {
        const next = new Map(this.index);
        next.set(id, entry);
        this.index = next;
        this.dirty = true;
    }

    private deleteFile(id: string, filePath: string): boolean {
        try {
            rmSync(filePath, { force: true });
            this.logger?.info({ posterId: id, file: path.basename(filePath) }, "deleted cached poster");
            return true;
        } catch (err) {
            this.logger?.warn({ err, posterId: id, path: filePath }, "failed to delete cached poster");
            return false;
        }
    }

    private async loadManifest(): Promise<Manifest> {
        const empty: Manifest = { version: MANIFEST_VERSION, entries: [], misses: {} };
        let raw: unknown;
        try {
            raw = await readJson(this.manifestPath);
        } catch (err) {
            this.logger?.warn({ err, path: this.manifestPath }, "cache manifest unreadable, starting empty");
            this.dirty = true;
            return empty;
        }
        if (!isObject(raw)) return empty;
        const entries = Array.isArray(raw.entries) ? raw.entries.filter(isCacheEntry) : [];
        return { version: MANIFEST_VERSION, entries, misses: parseMisses(raw.misses) };
    }
}
